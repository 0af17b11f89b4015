import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { StreamAttributes, StreamSink } from '../../domain/index.js';
import { SinkError } from '../../domain/index.js';

export interface StreamSinkOptions {
  readonly streamKey: string;
  readonly groupName: string;
}

/**
 * Makes sure the stream and its consumer group exist.
 *
 * Start ID "$" so consumers only see messages published after the group
 * was created. Uses MKSTREAM so the stream is created if it doesn't
 * exist yet; BUSYGROUP (group already there) is not an error.
 */
export async function ensureStream(redis: Redis, log: Logger, options: StreamSinkOptions): Promise<void> {
  const { streamKey, groupName } = options;
  const exists = await redis.exists(streamKey);
  if (exists === 1) {
    log.debug({ stream: streamKey }, 'Event stream already exists');
    return;
  }

  log.warn({ stream: streamKey }, 'Event stream does not exist, creating it');
  try {
    await redis.xgroup('CREATE', streamKey, groupName, '$', 'MKSTREAM');
    log.info({ stream: streamKey, group: groupName }, 'Event stream created');
  } catch (err: unknown) {
    if (err instanceof Error && err.message.includes('BUSYGROUP')) {
      log.debug({ group: groupName }, 'Consumer group already exists');
      return;
    }
    throw err;
  }
}

/**
 * Appends enriched events to a Redis Stream.
 *
 * Each entry is a flat field/value list: `data` holds the UTF-8 JSON
 * envelope and every attribute becomes its own field.
 *
 * Construct through {@link RedisStreamSink.create}, which runs the
 * stream-exists check once before the sink is handed out.
 */
export class RedisStreamSink implements StreamSink {
  private constructor(
    private readonly redis: Redis,
    private readonly streamKey: string,
  ) {}

  static async create(redis: Redis, log: Logger, options: StreamSinkOptions): Promise<RedisStreamSink> {
    await ensureStream(redis, log, options);
    return new RedisStreamSink(redis, options.streamKey);
  }

  async publish(data: Buffer, attributes: StreamAttributes): Promise<string> {
    const fields: string[] = ['data', data.toString('utf8')];
    for (const [key, value] of Object.entries(attributes)) {
      fields.push(key, value);
    }

    let entryId: string | null;
    try {
      entryId = await this.redis.xadd(this.streamKey, '*', ...fields);
    } catch (err: unknown) {
      throw new SinkError('stream', 'XADD failed', { cause: err });
    }

    if (entryId === null) {
      throw new SinkError('stream', `Stream ${this.streamKey} did not accept the entry`);
    }
    return entryId;
  }
}
