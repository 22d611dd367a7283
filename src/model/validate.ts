/**
 * Model snapshot validation using TypeBox.
 * Provides detailed, user-friendly error messages.
 */

import { Value } from '@sinclair/typebox/value';
import { ModelSnapshotSchema, type ModelSnapshot } from './schema.js';

export interface SchemaIssue {
  path: string;
  message: string;
  value?: unknown;
}

export interface ModelValidationResult {
  success: boolean;
  errors: SchemaIssue[];
  /** Semantic warnings (not schema violations but potential issues) */
  warnings: string[];
}

export class ModelError extends Error {
  constructor(
    message: string,
    public issues: SchemaIssue[] = []
  ) {
    super(message);
    this.name = 'ModelError';
  }
}

/**
 * Format a TypeBox error path to be user-friendly.
 */
export function formatPath(path: string): string {
  return path.replace(/^\//, '').replace(/\/(\d+)\//g, '[$1].').replace(/\/(\d+)$/, '[$1]').replace(/\//g, '.');
}

/**
 * Get a human-readable error message for a TypeBox error.
 */
export function formatErrorMessage(error: { path: string; message: string; value: unknown }): string {
  const path = formatPath(error.path);

  if (error.message.includes('Expected union value')) {
    if (path.endsWith('profile')) {
      return `must be a rectangle ({ kind: "rectangle", xDim, yDim }) or polygon ({ kind: "polygon", points })`;
    }
    if (path.endsWith('placementFrame')) {
      return `must be "as-given" or "mirrored-along-wall-axis"`;
    }
  }

  if (error.message === 'Expected number') {
    return `must be a number`;
  }

  if (error.message === 'Expected string') {
    return `must be a string`;
  }

  if (error.message === 'Expected array') {
    return `must be an array`;
  }

  if (error.message === 'Expected object') {
    return `must be an object`;
  }

  if (/required property/i.test(error.message)) {
    const match = error.message.match(/required property '([^']+)'/i);
    if (match) {
      return `missing required property "${match[1]}"`;
    }
    return `missing required property`;
  }

  if (error.message.includes('Unexpected property')) {
    const match = error.message.match(/Unexpected property '([^']+)'/);
    if (match) {
      return `unknown property "${match[1]}" (check spelling or see schema)`;
    }
    return `unknown property`;
  }

  if (error.message.includes('length')) {
    return `must not be empty`;
  }

  if (error.message.includes('greater or equal')) {
    return `must not be negative`;
  }

  return error.message;
}

/**
 * Validate a parsed JSON object against the ModelSnapshot schema.
 */
export function validateModelSchema(data: unknown): ModelValidationResult {
  const errors: SchemaIssue[] = [];
  const warnings: string[] = [];

  for (const error of Value.Errors(ModelSnapshotSchema, data)) {
    errors.push({
      path: formatPath(error.path),
      message: formatErrorMessage({ path: error.path, message: error.message, value: error.value }),
      value: error.value,
    });
  }

  if (errors.length === 0 && Value.Check(ModelSnapshotSchema, data)) {
    const snapshot = data;
    const ids = new Set<string>();
    const groups: [string, { id: string }[]][] = [
      ['spaces', snapshot.spaces],
      ['walls', snapshot.walls],
      ['windows', snapshot.windows],
      ['doors', snapshot.doors ?? []],
    ];

    for (const [group, elements] of groups) {
      elements.forEach((element, i) => {
        if (ids.has(element.id)) {
          errors.push({ path: `${group}[${i}].id`, message: `duplicate element id "${element.id}"` });
        }
        ids.add(element.id);
      });
    }

    const codes = new Set<string>();
    snapshot.spaces.forEach((space, i) => {
      if (codes.has(space.name)) {
        errors.push({ path: `spaces[${i}].name`, message: `duplicate room code "${space.name}"` });
      }
      codes.add(space.name);
    });

    if (snapshot.spaces.length === 0) {
      warnings.push('Model has no spaces; nothing will be extracted');
    }
    if (snapshot.walls.length === 0 && snapshot.windows.length > 0) {
      warnings.push('Model has windows but no walls; no window can be located on a wall');
    }
  }

  return {
    success: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Parse and validate a snapshot JSON document in one step.
 * Returns the validated snapshot or throws ModelError with detailed errors.
 */
export function parseAndValidateModel(json: string): ModelSnapshot {
  let data: unknown;

  try {
    data = JSON.parse(json);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ModelError(`Invalid JSON: ${reason}`);
  }

  return assertModelSnapshot(data);
}

export function assertModelSnapshot(data: unknown): ModelSnapshot {
  const result = validateModelSchema(data);

  if (!result.success || !Value.Check(ModelSnapshotSchema, data)) {
    const errorMessages = result.errors.map((e) => (e.path ? `  ${e.path}: ${e.message}` : `  ${e.message}`));
    throw new ModelError(`Invalid model snapshot:\n${errorMessages.join('\n')}`, result.errors);
  }

  return data;
}
