import type { Logger } from 'pino';
import type { AlertNotifier } from '../../domain/index.js';

/**
 * Posts alert summaries to a Google Chat incoming webhook.
 *
 * A non-OK answer is logged and not raised; a network failure is raised
 * so the webhook caller can report it.
 */
export class GoogleChatNotifier implements AlertNotifier {
  constructor(
    private readonly webhookUrl: string,
    private readonly log: Logger,
  ) {}

  async notify(text: string): Promise<void> {
    let response: Response;
    try {
      response = await fetch(this.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ text }),
      });
    } catch (err: unknown) {
      this.log.error({ err }, 'Error sending message to Google Chat');
      throw new Error('Google Chat notification failed', { cause: err });
    }

    if (response.ok) {
      this.log.info('Google Chat notification sent');
    } else {
      this.log.error({ status: response.status }, 'Failed to send message to Google Chat');
    }
  }
}
