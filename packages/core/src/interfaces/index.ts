export type { FieldAccessor, RecordType } from './record-type.js';
