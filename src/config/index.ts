import { Value } from '@sinclair/typebox/value';
import { formatErrorMessage, formatPath, type SchemaIssue } from '../model/validate.js';
import { ReconcileConfigSchema, type ReconcileConfig, type PropertyPaths } from './schema.js';

export { ReconcileConfigSchema, type ReconcileConfig, type PropertyPaths, type WallSelection } from './schema.js';

export class ConfigError extends Error {
  constructor(
    message: string,
    public issues: SchemaIssue[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Partial settings as written in a config file */
export type ReconcileConfigInput = Partial<Omit<ReconcileConfig, 'properties'>> & {
  properties?: Partial<PropertyPaths>;
};

/**
 * Fill in defaults and validate. Throws ConfigError listing every problem.
 */
export function resolveConfig(input: unknown = {}): ReconcileConfig {
  const candidate = Value.Default(ReconcileConfigSchema, Value.Clone(input ?? {}));

  const issues: SchemaIssue[] = [...Value.Errors(ReconcileConfigSchema, candidate)].map((error) => ({
    path: formatPath(error.path),
    message: formatErrorMessage({ path: error.path, message: error.message, value: error.value }),
    value: error.value,
  }));

  if (issues.length > 0 || !Value.Check(ReconcileConfigSchema, candidate)) {
    const lines = issues.map((i) => `  ${i.path}: ${i.message}`);
    throw new ConfigError(`Invalid configuration:\n${lines.join('\n')}`, issues);
  }

  return candidate;
}

/**
 * Parse a JSON config document and resolve it.
 */
export function parseConfig(json: string): ReconcileConfig {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ConfigError(`Invalid JSON: ${reason}`);
  }
  return resolveConfig(data);
}

export const DEFAULT_CONFIG: ReconcileConfig = resolveConfig();
