import type { DiagnosticContext, Logger } from '../diagnostics/types.js';
import { createDiagnosticContext } from '../diagnostics/diagnostics.js';
import { createEnvContext, EnvValidationFailedError } from '../environment/environment.js';
import { DefaultEnvSchemaType } from '../environment/types.js';
import type {
  ProcessLifecycleConfig,
  ProcessLifecycleContext,
  ProcessStartFn,
  ShutdownCallback,
  ShutdownConfiguration,
} from './types.js';

const defaultShutdownConfiguration: ShutdownConfiguration = {
  callbackTimeout: 10000,
  totalTimeout: 30000,
};

const defaultServiceName = 'unknown-service';

// Logs the lines written before `startFn` returns its own context. Invalid
// logging variables leave the defaults in place; `startFn` fails on them again
// when it parses the environment.
function createBootstrapDiagnosticContext(serviceName: string): DiagnosticContext {
  try {
    return createDiagnosticContext(
      createEnvContext(DefaultEnvSchemaType, {
        source: { PROCESS_NAME: serviceName, ...process.env },
      }),
    );
  } catch (error) {
    if (!(error instanceof EnvValidationFailedError)) {
      throw error;
    }

    const diagnosticContext = createDiagnosticContext({
      config: {
        PROCESS_NAME: process.env.PROCESS_NAME || serviceName,
        LOG_LEVEL: 'info',
        LOG_FORMAT: 'json',
        LOG_REPORT_ERRORS: true,
      },
      nodeEnv: process.env.NODE_ENV || 'development',
    });
    diagnosticContext.logger.warn('Invalid logging configuration, using defaults', {
      errors: error.errors,
    });

    return diagnosticContext;
  }
}

/**
 * Runs `startFn` with signal and crash handlers installed. Crashes are logged
 * through the diagnostic context `startFn` returns, so they are written as
 * structured entries like any other line and picked up by Error Reporting.
 */
export async function startProcessLifecycle(
  startFn: ProcessStartFn,
  config: ProcessLifecycleConfig = {},
): Promise<ProcessLifecycleContext> {
  let diagnosticContext = createBootstrapDiagnosticContext(
    config.serviceName ?? defaultServiceName,
  );

  const context = createProcessLifecycleContext(() => diagnosticContext.logger, config);
  context.registerSignalHandlers();

  const processContext: ProcessLifecycleContext = {
    onShutdown: context.onShutdown,
    shutdown: context.shutdown,
    isShuttingDown: context.isShuttingDown,
  };

  try {
    const result = await startFn(processContext);
    diagnosticContext = result.diagnosticContext;
  } catch (error) {
    diagnosticContext.logger.fatal(error, 'Process failed to start');
    await context.terminate('startupFailure', 1);
    return processContext;
  }

  diagnosticContext.logger.info('Process lifecycle signal handlers registered');

  return processContext;
}

function createProcessLifecycleContext(
  getLogger: () => Logger,
  { shutdownConfiguration = defaultShutdownConfiguration }: ProcessLifecycleConfig,
): ProcessLifecycleContext & {
  registerSignalHandlers(): void;
  terminate(reason: string, exitCode: number): Promise<void>;
} {
  const callbacks: ShutdownCallback[] = [];
  let shuttingDown = false;

  const executeCallbackWithTimeout = async (
    callback: ShutdownCallback,
    timeout: number,
    logger: Logger,
  ): Promise<void> => {
    let timer: NodeJS.Timeout | undefined;
    try {
      await Promise.race([
        callback(),
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new Error('Callback timeout')), timeout);
        }),
      ]);
    } catch (error) {
      logger.error(error, 'Shutdown callback failed or timed out', {
        timeout,
      });
    } finally {
      clearTimeout(timer);
    }
  };

  const terminate = async (reason: string, exitCode: number): Promise<void> => {
    if (shuttingDown) {
      return;
    }

    shuttingDown = true;
    const logger = getLogger();

    logger.info('Graceful shutdown initiated', { reason });

    const forceExitTimeout = setTimeout(() => {
      logger.fatal(new Error('Shutdown timeout exceeded, forcing exit'), {
        totalTimeout: shutdownConfiguration.totalTimeout,
      });
      process.exit(1);
    }, shutdownConfiguration.totalTimeout);

    for (const callback of callbacks) {
      await executeCallbackWithTimeout(callback, shutdownConfiguration.callbackTimeout, logger);
    }

    clearTimeout(forceExitTimeout);

    logger.info('Graceful shutdown completed', { reason });
    process.exit(exitCode);
  };

  const handleSignal = (signal: string): void => {
    void terminate(signal, 0);
  };

  const handleUnhandledRejection = (reason: unknown): void => {
    const error = reason instanceof Error ? reason : new Error(String(reason));

    getLogger().fatal(error, 'Unhandled promise rejection detected', {
      reasonType: typeof reason,
    });

    void terminate('unhandledRejection', 1);
  };

  const handleUncaughtException = (error: Error): void => {
    getLogger().fatal(error, 'Uncaught exception detected');

    void terminate('uncaughtException', 1);
  };

  const handleWarning = (warning: Error): void => {
    getLogger().warn('Process warning emitted', {
      name: warning.name,
      message: warning.message,
      stack: warning.stack,
    });
  };

  function registerSignalHandlers(): void {
    process.on('SIGTERM', () => handleSignal('SIGTERM'));
    process.on('SIGINT', () => handleSignal('SIGINT'));
    process.on('SIGUSR2', () => handleSignal('SIGUSR2'));
    process.on('unhandledRejection', handleUnhandledRejection);
    process.on('uncaughtException', handleUncaughtException);
    process.on('warning', handleWarning);
  }

  return {
    onShutdown: (callback: ShutdownCallback): void => {
      callbacks.push(callback);
    },
    shutdown: () => terminate('manual', 0),
    isShuttingDown: () => shuttingDown,
    registerSignalHandlers,
    terminate,
  };
}
