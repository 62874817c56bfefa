export { decodeTextField } from './decode-text-field';
export { parseAccessHash } from './parse-access-hash';
