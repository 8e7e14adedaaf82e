/**
 * Explicit outcomes of single-field reads and writes
 *
 * The public getters and setters collapse these into "absent" and `false`;
 * the outcomes keep a resolution miss apart from a coercion failure.
 */

import type { AccessorError, FieldKind } from '@recordkit/core';

export type ReadMissReason = 'no_record' | 'unknown_field' | 'not_readable';
export type WriteMissReason = 'no_record' | 'unknown_field' | 'read_only';

export type ReadOutcome =
  | { status: 'ok'; value: unknown }
  | { status: 'unresolved'; reason: ReadMissReason }
  | { status: 'coercion_failed'; value: unknown; kind: FieldKind; issue: string }
  | { status: 'rejected'; error: AccessorError };

export type WriteOutcome =
  | { status: 'written'; value: unknown }
  | { status: 'unresolved'; reason: WriteMissReason }
  | { status: 'coercion_failed'; value: unknown; kind: FieldKind; issue: string }
  | { status: 'rejected'; error: AccessorError };
