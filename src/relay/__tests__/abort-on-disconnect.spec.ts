import { EventEmitter } from 'events';
import { abortOnDisconnect } from '../abort-on-disconnect';

class FakeResponse extends EventEmitter {
  writableEnded = false;
}

describe('abortOnDisconnect', () => {
  it('should abort when the client goes away before the reply', () => {
    const res = new FakeResponse();
    const guard = abortOnDisconnect(res);

    res.emit('close');

    expect(guard.signal.aborted).toBe(true);
  });

  it('should not abort when the response closes after it was written', () => {
    const res = new FakeResponse();
    const guard = abortOnDisconnect(res);

    res.writableEnded = true;
    res.emit('close');

    expect(guard.signal.aborted).toBe(false);
  });

  it('should stop listening once disposed', () => {
    const res = new FakeResponse();
    const guard = abortOnDisconnect(res);

    guard.dispose();
    res.emit('close');

    expect(guard.signal.aborted).toBe(false);
    expect(res.listenerCount('close')).toBe(0);
  });
});
