import type { DiagnosticContext } from '../diagnostics/types.js';
import type { EnvContext } from '../environment/types.js';

export type ShutdownCallback = () => Promise<void> | void;

export interface ShutdownConfiguration {
  callbackTimeout: number;
  totalTimeout: number;
}

export interface ProcessLifecycleConfig {
  shutdownConfiguration?: ShutdownConfiguration;
  /** Service name for lines written before `startFn` returns, when PROCESS_NAME is unset. */
  serviceName?: string;
}

export type ProcessStartFn = (
  context: ProcessLifecycleContext,
) => Promise<{ diagnosticContext: DiagnosticContext; envContext: EnvContext<unknown> }>;

export interface ProcessLifecycleContext {
  onShutdown(callback: ShutdownCallback): void;
  shutdown(): Promise<void>;
  isShuttingDown(): boolean;
}
