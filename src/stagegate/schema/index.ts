export { ItemSchema, FIELD_TYPES, type FieldRules, type FieldType, type SchemaOptions } from './schema';
export { SchemaGenerator, JSON_SCHEMA_DRAFT, requiredByLocks, type JsonSchema } from './generator';
