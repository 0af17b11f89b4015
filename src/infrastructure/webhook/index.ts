export { computeSignature, verifySignature } from './signature.js';
