/**
 * Schema types for describing tables behind a connector
 */

export type FieldType =
  | 'string'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'date'
  | 'datetime'
  | 'object';

export interface FieldDefinition {
  name: string;
  type: FieldType;
  required: boolean;
  /** Native type as reported by the database */
  description?: string;
}

export interface Schema {
  /** Table name */
  name: string;
  /** Human-readable description */
  description?: string;
  /** Field definitions in column order */
  fields: FieldDefinition[];
  /** Primary key field name(s) */
  primaryKey?: string | string[];
  /** Whether the schema was read from the database catalog */
  inferred: boolean;
}
