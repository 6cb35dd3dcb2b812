/**
 * Fingerprint Module
 */

export { toScalar, toTypedRecord } from './scalar.js';
export {
  NULL_TOKEN,
  FIELD_SEPARATOR,
  canonicalScalar,
  canonicalKeyScalar,
  canonicalize,
  encodeKey,
  diffAttributes,
} from './canonical.js';
export { fingerprint, hashCanonical, FINGERPRINT_LENGTH } from './fingerprint.js';
export type { FingerprintOptions } from './fingerprint.js';
