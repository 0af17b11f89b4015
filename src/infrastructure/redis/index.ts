export { createRedisClient } from './redis-client.js';
export { RedisStreamSink, ensureStream } from './stream-sink.js';
export type { StreamSinkOptions } from './stream-sink.js';
