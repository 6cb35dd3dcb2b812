/**
 * Fingerprint Engine
 *
 * Reduces the monitored attributes of a record to a fixed-length digest.
 * Attribute order is significant: reordering the monitored attributes
 * changes every fingerprint and makes each row look changed on the next run.
 */

import { createHash } from 'node:crypto';
import type { HashAlgorithm, Record as DataRecord } from '@histrack/core';
import { canonicalize } from './canonical.js';
import { toTypedRecord } from './scalar.js';

export interface FingerprintOptions {
  /** Digest algorithm (default: sha256) */
  algorithm?: HashAlgorithm;
}

/** Hex digest length per algorithm */
export const FINGERPRINT_LENGTH: Readonly<Record<HashAlgorithm, number>> = {
  sha256: 64,
  sha512: 128,
};

/**
 * Digest of already-canonicalized text
 */
export function hashCanonical(canonical: string, algorithm: HashAlgorithm = 'sha256'): string {
  return createHash(algorithm).update(canonical, 'utf8').digest('hex');
}

/**
 * Fingerprint the monitored attributes of a record.
 *
 * @throws ScdError MISSING_ATTRIBUTE if an attribute is absent from the record
 * @throws ScdError UNSUPPORTED_VALUE if an attribute is not a scalar
 */
export function fingerprint(
  record: DataRecord,
  monitoredAttributes: readonly string[],
  options: FingerprintOptions = {}
): string {
  const typed = toTypedRecord(record, monitoredAttributes);
  return hashCanonical(canonicalize(typed, monitoredAttributes), options.algorithm);
}
