import type { DiagnosticContext, Logger } from '../diagnostics/types.js';
import type { EnvContext } from '../environment/types.js';
import type { ProcessLifecycleContext } from '../processLifecycle/types.js';

export interface ServiceContext<T = Record<string, unknown>> {
  readonly envContext: EnvContext<T>;
  readonly diagnosticContext: DiagnosticContext;
  readonly processContext: ProcessLifecycleContext;
}

export interface HealthCheckResult {
  component: string;
  isHealthy: boolean;
}

export interface HttpServerConfig {
  healthChecks?: (() => Promise<HealthCheckResult>)[];
  /** Interface to listen on, defaults to all interfaces. */
  host?: string;
}

declare module 'fastify' {
  interface FastifyRequest {
    logger: Logger;
    correlationId: string;
    /** `process.hrtime.bigint()` when the request arrived. */
    startTime: bigint;
  }

  interface FastifyInstance {
    startServer(): Promise<void>;
  }
}
