export { MaxmindLocationResolver, toLocation } from './maxmind-resolver.js';
