export { MixpanelClient } from './mixpanel-client.js';
export type { MixpanelOptions } from './mixpanel-client.js';
