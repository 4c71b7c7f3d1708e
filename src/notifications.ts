import type { PushNotificationConfig, Task } from './types.js';

export interface PushNotificationSender {
  send(config: PushNotificationConfig, task: Task): Promise<void>;
}

export const NOTIFICATION_TOKEN_HEADER = 'X-A2A-Notification-Token';

export interface HttpPushNotificationSenderOptions {
  timeoutMs?: number;
  fetch?: typeof fetch;
}

/** POSTs the task snapshot as JSON to the webhook named by the config. */
export class HttpPushNotificationSender implements PushNotificationSender {
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpPushNotificationSenderOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 5_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async send(config: PushNotificationConfig, task: Task): Promise<void> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (config.token) {
      headers[NOTIFICATION_TOKEN_HEADER] = config.token;
    }
    const credentials = config.authentication?.credentials;
    if (credentials && config.authentication?.schemes.some((scheme) => scheme.toLowerCase() === 'bearer')) {
      headers.Authorization = `Bearer ${credentials}`;
    }

    const response = await this.fetchImpl(config.url, {
      method: 'POST',
      headers,
      body: JSON.stringify(task),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`Push notification to ${config.url} failed with HTTP ${response.status}`);
    }
  }
}
