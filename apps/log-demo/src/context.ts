import { SF } from '@gcp-structured-log/service-framework-node';
import { logDemoEnvSchema } from './environment.js';

export function createLogDemoContext(
  processContext: SF.ProcessLifecycleContext,
  customEnv?: Record<string, string | undefined>,
) {
  const envContext = SF.createEnvContext(logDemoEnvSchema, { source: customEnv });
  const diagnosticContext = SF.createDiagnosticContext(envContext);

  return {
    envContext,
    diagnosticContext,
    processContext,
  };
}

export type LogDemoContext = ReturnType<typeof createLogDemoContext>;
