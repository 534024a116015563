import { Value } from '@sinclair/typebox/value';
import { TB } from '../typebox.js';
import type {
  EnvContext,
  EnvParser,
  EnvParserConfig,
  EnvSource,
  EnvValidationError,
} from './types.js';

const SENSITIVE_PATTERNS = [/password/i, /secret/i, /key/i, /token/i, /credential/i, /auth/i];

export class EnvValidationFailedError extends Error {
  readonly errors: EnvValidationError[];

  constructor(errors: EnvValidationError[], redactSensitive: boolean) {
    super(formatValidationErrors(errors, redactSensitive));
    this.name = 'EnvValidationFailedError';
    this.errors = errors;
    Object.setPrototypeOf(this, EnvValidationFailedError.prototype);
  }

  public toErrorPlainObject() {
    return {
      name: this.name,
      message: this.message,
      stack: this.stack,
      errors: this.errors,
    };
  }
}

function redactValue(key: string, value: unknown): unknown {
  if (SENSITIVE_PATTERNS.some((pattern) => pattern.test(key))) {
    return '[REDACTED]';
  }
  return value;
}

function coerceEnvironmentValue(value: string, targetType: string): unknown {
  switch (targetType) {
    case 'number':
    case 'integer': {
      const parsed = Number(value);
      if (Number.isNaN(parsed)) {
        throw new Error(`Cannot convert "${value}" to number`);
      }
      return parsed;
    }
    case 'boolean': {
      const lower = value.toLowerCase();
      if (['true', '1', 'yes', 'on'].includes(lower)) return true;
      if (['false', '0', 'no', 'off'].includes(lower)) return false;
      throw new Error(`Cannot convert "${value}" to boolean`);
    }
    case 'object':
    case 'array':
      return JSON.parse(value);
    default:
      return value;
  }
}

function formatValidationErrors(errors: EnvValidationError[], redactSensitive: boolean): string {
  const lines = ['Configuration validation failed:'];

  for (const error of errors) {
    const value = redactSensitive ? redactValue(error.path, error.value) : error.value;
    const valuePart = value !== undefined ? `, received ${JSON.stringify(value)}` : '';
    lines.push(`  - ${error.path}: ${error.message}${valuePart}`);
  }

  return lines.join('\n');
}

function extractSchemaType(schema: TB.TSchema): string {
  if ('type' in schema && typeof schema.type === 'string') {
    return schema.type;
  }
  if ('anyOf' in schema || 'oneOf' in schema) {
    return 'union';
  }
  return 'unknown';
}

// Values that cannot be coerced are passed on as strings, validation reports them.
function coerceEnvValues(source: EnvSource, schema: TB.TSchema): Record<string, unknown> {
  if (!TB.KindGuard.IsObject(schema)) {
    return { ...source };
  }

  const coerced: Record<string, unknown> = {};

  for (const [key, propSchema] of Object.entries(schema.properties)) {
    const value = source[key];

    if (value === undefined || value === '') {
      coerced[key] = undefined;
      continue;
    }

    try {
      coerced[key] = coerceEnvironmentValue(value, extractSchemaType(propSchema));
    } catch {
      coerced[key] = value;
    }
  }

  return coerced;
}

function convertTypeBoxErrors(
  errors: ReturnType<typeof Value.Errors>,
  redactSensitive: boolean,
): EnvValidationError[] {
  const validationErrors: EnvValidationError[] = [];

  for (const error of errors) {
    const path = error.path.replace(/^\//, '').replace(/\//g, '.');
    const value = redactSensitive ? redactValue(path, error.value) : error.value;

    validationErrors.push({
      path: path || 'root',
      message: error.message,
      value,
    });
  }

  return validationErrors;
}

export function createEnvParser(): EnvParser {
  const parse = <T extends TB.TSchema>(schema: T, config: EnvParserConfig = {}): TB.Static<T> => {
    const source = config.source ?? process.env;
    const redactSensitive = config.redactSensitive ?? true;

    const withDefaults = Value.Default(schema, coerceEnvValues(source, schema));

    if (Value.Check(schema, withDefaults)) {
      return withDefaults;
    }

    throw new EnvValidationFailedError(
      convertTypeBoxErrors(Value.Errors(schema, withDefaults), redactSensitive),
      redactSensitive,
    );
  };

  return {
    parse,
  };
}

export function createEnvContext<T extends TB.TSchema>(
  schema: T,
  config?: EnvParserConfig,
): EnvContext<TB.Static<T>> {
  const parsedConfig = createEnvParser().parse(schema, config);
  const source = config?.source ?? process.env;

  return {
    config: parsedConfig,
    nodeEnv: source.NODE_ENV || 'development',
  };
}
