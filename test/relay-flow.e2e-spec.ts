import { useTestAppLifecycle } from './helpers/test-app';
import { ApiClient, createApiClient } from './helpers/api-client';
import { createMailMessage } from './helpers/mail-messages';

describe('Relay Flow', () => {
  const appLifecycle = useTestAppLifecycle();
  let apiClient: ApiClient;

  beforeAll(() => {
    apiClient = createApiClient(appLifecycle.httpServer);
  });

  it('should deliver a message to a registered recipient exactly once', async () => {
    const message = createMailMessage();

    const response = await apiClient.sendMessage(message).expect(200);
    expect(response.body).toEqual({ success: true, message: 'Mail sent successfully' });

    const inbox = await apiClient.drainInbox('bob@saturn.test').expect(200);
    expect(inbox.body).toEqual({ messages: [message] });
  });

  it('should report an unregistered recipient without delivering', async () => {
    const response = await apiClient.sendMessage(createMailMessage({ recipient: 'nobody@saturn.test' })).expect(200);

    expect(response.body).toEqual({ success: false, message: "Recipient 'nobody@saturn.test' not found" });

    const inbox = await apiClient.drainInbox('nobody@saturn.test').expect(200);
    expect(inbox.body).toEqual({ messages: [] });
  });

  it('should deliver to a recipient registered through the API', async () => {
    await apiClient.registerLocation('grace@earth.test', 'http://mail-earth:3000').expect(200);
    const message = createMailMessage({ sender: 'bob@saturn.test', recipient: 'grace@earth.test', subject: 'Reply' });

    await apiClient.sendMessage(message).expect(200);

    const inbox = await apiClient.drainInbox('grace@earth.test').expect(200);
    expect(inbox.body.messages).toEqual([message]);
  });

  it('should keep the order of messages sent to one recipient', async () => {
    for (const subject of ['one', 'two', 'three']) {
      await apiClient.sendMessage(createMailMessage({ subject })).expect(200);
    }

    const inbox = await apiClient.drainInbox('bob@saturn.test').expect(200);
    expect(inbox.body.messages.map((m: { subject: string }) => m.subject)).toEqual(['one', 'two', 'three']);
  });

  it('should return 400 without a message', async () => {
    const response = await apiClient.sendMessage(undefined).expect(400);

    expect(response.body.message).toEqual(['mail message cannot be empty']);
  });

  it('should return 400 for an empty recipient', async () => {
    const response = await apiClient.sendMessage(createMailMessage({ recipient: '' })).expect(400);

    expect(response.body.message).toBe('recipient email cannot be empty');
  });

  it('should return 400 for a non-integer timestamp', async () => {
    const response = await apiClient.sendMessage(createMailMessage({ timestamp: 1.5 })).expect(400);

    expect(response.body.message).toEqual(['message.timestamp must be an integer number']);
  });
});
