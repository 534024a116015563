import type { SF } from '@gcp-structured-log/service-framework-node';
import type { LogDemoEnv } from './environment.js';

/**
 * Writes one entry per level, grouped under the configured operation. The
 * error entry is marked for Error Reporting by the logger, and each entry
 * carries the line it was logged from while `LOG_SOURCE_LOCATION` is on.
 */
export function logStartupStatements(logger: SF.Logger, env: LogDemoEnv): void {
  const metadata: SF.LogEntryMetadata = {
    operation: {
      id: env.DEMO_OPERATION_ID,
      producer: env.LOG_OPERATION_PRODUCER ?? env.PROCESS_NAME,
    },
  };

  logger.log('info', 'Start logging', undefined, metadata);
  logger.log('warn', 'Oh no, things might go wrong soon.', undefined, metadata);
  logger.log('error', 'Yeah, this is not good.', undefined, metadata);
  logger.log('debug', 'Something went wrong in `my service`.', undefined, metadata);
}
