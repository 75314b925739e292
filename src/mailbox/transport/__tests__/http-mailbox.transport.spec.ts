import { Agent as HttpAgent } from 'http';
import { Agent as HttpsAgent } from 'https';
import { Test } from '@nestjs/testing';
import { HttpService } from '@nestjs/axios';
import { AxiosHeaders, type AxiosResponse } from 'axios';
import { of, throwError } from 'rxjs';
import { HttpMailboxTransport } from '../http-mailbox.transport';
import { createMailMessage } from '../../../../test/helpers/mail-messages';

function response<T>(data: T): AxiosResponse<T> {
  return { data, status: 201, statusText: 'Created', headers: {}, config: { headers: new AxiosHeaders() } };
}

describe('HttpMailboxTransport', () => {
  let httpService: { post: jest.Mock };
  let transport: HttpMailboxTransport;

  beforeEach(async () => {
    httpService = { post: jest.fn() };
    const moduleRef = await Test.createTestingModule({
      providers: [{ provide: HttpService, useValue: httpService }],
    }).compile();

    transport = new HttpMailboxTransport(moduleRef.get(HttpService), 1500);
  });

  describe('open', () => {
    it('should reject locations that are not URLs', () => {
      expect(() => transport.open('mail-saturn')).toThrow("invalid mailbox location 'mail-saturn'");
    });

    it('should reject non-http locations', () => {
      expect(() => transport.open('ftp://mail-saturn')).toThrow(
        "unsupported mailbox location 'ftp://mail-saturn' (expected http or https)",
      );
    });
  });

  describe('deliver', () => {
    it('should post the envelope to the mailbox endpoint through one keep-alive agent', async () => {
      httpService.post.mockReturnValue(of(response({ success: true, message: 'Mail received successfully' })));
      const channel = transport.open('http://mail-saturn:3000/');
      const message = createMailMessage();

      await expect(channel.deliver(message)).resolves.toEqual({ success: true, message: 'Mail received successfully' });
      await channel.deliver(message);

      expect(httpService.post).toHaveBeenCalledTimes(2);
      const [url, body, options] = httpService.post.mock.calls[0];
      expect(url).toBe('http://mail-saturn:3000/api/mailbox/messages');
      expect(body).toEqual({ message });
      expect(options.timeout).toBe(1500);
      expect(options.httpAgent).toBeInstanceOf(HttpAgent);
      expect(httpService.post.mock.calls[1][2].httpAgent).toBe(options.httpAgent);

      channel.close();
    });

    it('should use an https agent for https locations', async () => {
      httpService.post.mockReturnValue(of(response({ success: true, message: 'Mail received successfully' })));
      const channel = transport.open('https://mail-saturn.test');

      await channel.deliver(createMailMessage());

      expect(httpService.post.mock.calls[0][0]).toBe('https://mail-saturn.test/api/mailbox/messages');
      expect(httpService.post.mock.calls[0][2].httpsAgent).toBeInstanceOf(HttpsAgent);
      channel.close();
    });

    it('should pass through a refusal from the mailbox', async () => {
      httpService.post.mockReturnValue(of(response({ success: false, message: 'inbox full' })));
      const channel = transport.open('http://mail-saturn:3000');

      await expect(channel.deliver(createMailMessage())).resolves.toEqual({ success: false, message: 'inbox full' });
      channel.close();
    });

    it('should reject malformed responses', async () => {
      httpService.post.mockReturnValue(of(response('ok')));
      const channel = transport.open('http://mail-saturn:3000');

      await expect(channel.deliver(createMailMessage())).rejects.toThrow(
        'malformed delivery response from http://mail-saturn:3000',
      );
      channel.close();
    });

    it('should propagate transport errors', async () => {
      httpService.post.mockReturnValue(throwError(() => new Error('socket hang up')));
      const channel = transport.open('http://mail-saturn:3000');

      await expect(channel.deliver(createMailMessage())).rejects.toThrow('socket hang up');
      channel.close();
    });

    it('should refuse to deliver once closed', async () => {
      const channel = transport.open('http://mail-saturn:3000');
      channel.close();
      channel.close();

      await expect(channel.deliver(createMailMessage())).rejects.toThrow('channel to http://mail-saturn:3000 is closed');
      expect(httpService.post).not.toHaveBeenCalled();
    });
  });
});
