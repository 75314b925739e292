import { Agent as HttpAgent } from 'http';
import { Agent as HttpsAgent } from 'https';
import { HttpService } from '@nestjs/axios';
import { firstValueFrom, timeout } from 'rxjs';
import type { MailMessage } from '../../shared/interfaces/mail-message.interface';
import type { DeliveryResponse, MailboxChannel, MailboxTransport } from './mailbox-transport.interface';

function isDeliveryResponse(data: unknown): data is DeliveryResponse {
  return (
    typeof data === 'object' &&
    data !== null &&
    'success' in data &&
    typeof data.success === 'boolean' &&
    'message' in data &&
    typeof data.message === 'string'
  );
}

/**
 * One keep-alive connection pool to a remote mailbox node.
 */
class HttpMailboxChannel implements MailboxChannel {
  private readonly endpoint: string;
  private readonly agent: HttpAgent | HttpsAgent;
  private closed = false;

  constructor(
    readonly location: string,
    url: URL,
    private readonly httpService: HttpService,
    private readonly deliveryTimeout: number,
  ) {
    this.endpoint = `${url.origin}${url.pathname.replace(/\/$/, '')}/api/mailbox/messages`;
    this.agent = url.protocol === 'https:' ? new HttpsAgent({ keepAlive: true }) : new HttpAgent({ keepAlive: true });
  }

  async deliver(message: MailMessage): Promise<DeliveryResponse> {
    if (this.closed) {
      throw new Error(`channel to ${this.location} is closed`);
    }

    const response = await firstValueFrom(
      this.httpService
        .post<unknown>(
          this.endpoint,
          { message },
          {
            timeout: this.deliveryTimeout,
            httpAgent: this.agent,
            httpsAgent: this.agent,
          },
        )
        .pipe(timeout(this.deliveryTimeout)),
    );

    if (!isDeliveryResponse(response.data)) {
      throw new Error(`malformed delivery response from ${this.location}`);
    }
    return { success: response.data.success, message: response.data.message };
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.agent.destroy();
  }
}

/**
 * Posts messages to `<location>/api/mailbox/messages` on another node.
 */
export class HttpMailboxTransport implements MailboxTransport {
  constructor(
    private readonly httpService: HttpService,
    private readonly deliveryTimeout: number,
  ) {}

  open(location: string): MailboxChannel {
    let url: URL;
    try {
      url = new URL(location);
    } catch {
      throw new Error(`invalid mailbox location '${location}'`);
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new Error(`unsupported mailbox location '${location}' (expected http or https)`);
    }

    return new HttpMailboxChannel(location, url, this.httpService, this.deliveryTimeout);
  }
}
