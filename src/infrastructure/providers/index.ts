export { LedgerBalanceProvider } from './btc-balance.js';
export type { LedgerBalanceOptions } from './btc-balance.js';
export { SatsBalanceProvider } from './sats-balance.js';
export { HttpCreatorStatusProvider } from './creator-status.js';
