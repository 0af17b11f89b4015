import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { EventRecord, TrackingSink } from '../../domain/index.js';
import { SinkError } from '../../domain/index.js';

export interface MixpanelOptions {
  readonly token: string;
  /** API host without protocol, e.g. `api.mixpanel.com`. */
  readonly host: string;
}

/**
 * Minimal Mixpanel ingestion client: event tracking and profile `$set`.
 *
 * Requests are JSON arrays of one object, as the ingestion API accepts.
 * Non-2xx answers raise a {@link SinkError} carrying the upstream status.
 */
export class MixpanelClient implements TrackingSink {
  private readonly baseUrl: string;

  constructor(
    private readonly options: MixpanelOptions,
    private readonly log: Logger,
  ) {
    this.baseUrl = `https://${options.host}`;
  }

  async track(event: string, properties: EventRecord): Promise<void> {
    const props: EventRecord = { ...properties, token: this.options.token };
    if (props['time'] === undefined) {
      props['time'] = Math.floor(Date.now() / 1000);
    }
    if (props['$insert_id'] === undefined) {
      props['$insert_id'] = randomUUID();
    }

    await this.send('/track', { event, properties: props });
  }

  async setProfile(distinctId: string, properties: EventRecord, ip?: string): Promise<void> {
    const update: EventRecord = {
      $token: this.options.token,
      $distinct_id: distinctId,
      $set: properties,
    };
    if (ip !== undefined) {
      update['$ip'] = ip;
    }

    await this.send('/engage#profile-set', update);
  }

  private async send(endpoint: string, payload: EventRecord): Promise<void> {
    const url = `${this.baseUrl}${endpoint}`;
    this.log.debug({ url }, 'Sending request to Mixpanel');

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Accept: 'text/plain' },
        body: JSON.stringify([payload]),
      });
    } catch (err: unknown) {
      throw new SinkError('tracking', `Mixpanel request to ${endpoint} failed`, { cause: err });
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '<could not read body>');
      this.log.error({ status: response.status, body, endpoint }, 'Mixpanel API returned error');
      throw new SinkError('tracking', `Mixpanel returned ${response.status}: ${body}`, {
        status: response.status,
      });
    }

    await response.body?.cancel();
  }
}
