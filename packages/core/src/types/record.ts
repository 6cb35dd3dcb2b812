/**
 * Record types for data exchange between connectors and the engine
 */

/** Generic record type - a row of data as returned by a driver */
export type Record = {
  [key: string]: unknown;
};

/**
 * Tagged scalar value.
 *
 * Every attribute that takes part in fingerprinting or key matching is
 * reduced to one of these variants before it is canonicalized.
 */
export type Scalar =
  | { kind: 'text'; value: string }
  | { kind: 'integer'; value: bigint }
  | { kind: 'real'; value: number }
  | { kind: 'null' };

export type ScalarKind = Scalar['kind'];

/** Ordered mapping from attribute name to scalar (insertion order is significant) */
export type TypedRecord = ReadonlyMap<string, Scalar>;
