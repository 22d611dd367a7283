/**
 * JSON Schema generation for the model snapshot format.
 * Exporters that produce snapshots can validate against it.
 */

import { ModelSnapshotSchema } from './schema.js';

export function getModelJsonSchema(): object {
  return ModelSnapshotSchema;
}

export function getModelJsonSchemaString(indent = 2): string {
  return JSON.stringify(ModelSnapshotSchema, null, indent);
}
