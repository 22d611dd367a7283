export * from './schema.js';
export { getPropertyValue, getNumericProperty, findBooleanProperty, splitPropertyPath } from './properties.js';
export {
  validateModelSchema,
  parseAndValidateModel,
  assertModelSnapshot,
  ModelError,
  type SchemaIssue,
  type ModelValidationResult,
} from './validate.js';
export { getModelJsonSchema, getModelJsonSchemaString } from './json-schema.js';
