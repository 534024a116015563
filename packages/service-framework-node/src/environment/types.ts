import { type Static, type TSchema, Type } from '@sinclair/typebox';

export interface EnvValidationError {
  readonly path: string;
  readonly message: string;
  readonly value?: unknown;
}

export interface EnvParserConfig {
  readonly redactSensitive?: boolean;
  readonly source?: Record<string, string | undefined>;
}

export interface EnvParser {
  parse<T extends TSchema>(schema: T, config?: EnvParserConfig): Static<T>;
}

export interface EnvContext<T = DefaultEnv> {
  readonly config: T;
  readonly nodeEnv: string;
}

export type EnvSource = Record<string, string | undefined>;

export const LogLevelSchema = Type.Union(
  [
    Type.Literal('debug'),
    Type.Literal('info'),
    Type.Literal('warn'),
    Type.Literal('error'),
    Type.Literal('fatal'),
  ],
  { default: 'info' },
);

export const LogFormatSchema = Type.Union(
  [Type.Literal('json'), Type.Literal('human'), Type.Literal('structured-text')],
  { default: 'json' },
);

export const DefaultEnvSchemaType = Type.Object({
  PROCESS_NAME: Type.String({ minLength: 1 }),
  LOG_LEVEL: LogLevelSchema,
  LOG_FORMAT: LogFormatSchema,
  LOG_OPERATION_PRODUCER: Type.Optional(Type.String({ minLength: 1 })),
  LOG_REPORT_ERRORS: Type.Boolean({ default: true }),
  LOG_SOURCE_LOCATION: Type.Optional(Type.Boolean()),
});
export type DefaultEnvSchemaType = typeof DefaultEnvSchemaType;
export type DefaultEnv = Static<typeof DefaultEnvSchemaType>;

export type DefaultEnvContext = EnvContext<DefaultEnv>;
