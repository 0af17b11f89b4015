export type { EventRecord, PayloadShape, ClassifiedPayload } from './event.js';
export {
  UNKNOWN_EVENT,
  EVENT_SOURCE,
  WAREHOUSE_EVENT_PREFIX,
  eventNameOf,
  stringField,
  isPlainObject,
} from './event.js';
export { PipelineError, SinkError, httpStatusFor, errorBody, toProviderError } from './errors.js';
export type { PipelineErrorCode } from './errors.js';
export { parseIdentity, tryParseIdentity } from './identity.js';
export type {
  SinkName,
  TrackingSink,
  StreamSink,
  StreamAttributes,
  WarehouseRow,
  WarehouseSink,
  EventSinks,
  Location,
  LocationResolver,
  BalanceProvider,
  CreatorStatusProvider,
  DeviceCategory,
  UserAgentClass,
  UserAgentClassifier,
  FactProviders,
  AlertNotifier,
} from './ports.js';
