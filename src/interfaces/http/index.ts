export { buildApp } from './app.js';
export type { BuildAppOptions } from './app.js';
export { requireBearerToken } from './auth.js';
export { SIGNATURE_HEADER } from './webhook-routes.js';
