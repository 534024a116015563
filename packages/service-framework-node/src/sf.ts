export * from './diagnostics/diagnostics.js';
export * from './diagnostics/types.js';
export {
  createEnvContext,
  createEnvParser,
  EnvValidationFailedError,
} from './environment/environment.js';
export {
  type DefaultEnv,
  type DefaultEnvContext,
  DefaultEnvSchemaType,
  type EnvContext,
  type EnvParserConfig,
  type EnvValidationError,
  LogFormatSchema,
  LogLevelSchema,
} from './environment/types.js';
export { createHttpServer, describeHttpRequest, formatLatency } from './httpServer/httpServer.js';
export type { HealthCheckResult, HttpServerConfig, ServiceContext } from './httpServer/types.js';
export { startProcessLifecycle } from './processLifecycle/processLifecycle.js';
export type {
  ProcessLifecycleConfig,
  ProcessLifecycleContext,
  ProcessStartFn,
  ShutdownCallback,
  ShutdownConfiguration,
} from './processLifecycle/types.js';
