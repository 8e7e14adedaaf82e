export {
  fieldKindSchema,
  fieldNameSchema,
  fieldDefinitionSchema,
  recordTypeDefinitionSchema,
  formatZodError,
} from './schemas.js';
export type {
  FieldKindInput,
  FieldDefinitionInput,
  RecordTypeDefinitionInput,
} from './schemas.js';
