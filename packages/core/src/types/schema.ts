/**
 * Field metadata types describing record shapes at run time
 */

export type FieldKind =
  | 'string'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'date'
  | 'array'
  | 'object'
  | 'unknown';

/** Kinds that `convertToScalar` can produce */
export type ScalarKind = Extract<FieldKind, 'string' | 'number' | 'integer' | 'boolean' | 'date'>;

/** The TypeScript value a field of the given kind holds once coerced */
export type KindValue<K extends FieldKind> = K extends 'string'
  ? string
  : K extends 'number' | 'integer'
    ? number
    : K extends 'boolean'
      ? boolean
      : K extends 'date'
        ? Date
        : K extends 'array'
          ? unknown[]
          : K extends 'object'
            ? { [key: string]: unknown }
            : unknown;

export interface FieldDefinition {
  name: string;
  kind: FieldKind;
  /** Whether null is an accepted value */
  nullable: boolean;
  /** Whether reads are allowed */
  readable: boolean;
  /** Whether writes are allowed; read-only fields are skipped by write operations */
  writable: boolean;
  description?: string;
}

/** Field descriptor as seen by callers; never stored between calls */
export type FieldDescriptor = Readonly<FieldDefinition>;
