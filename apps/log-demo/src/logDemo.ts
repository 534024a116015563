#!/usr/bin/env node
import { SF } from '@gcp-structured-log/service-framework-node';
import { createLogDemoContext } from './context.js';
import { startLogDemoService } from './logDemoService.js';

async function bootstrap(): Promise<void> {
  await SF.startProcessLifecycle(async (processContext) => {
    const context = createLogDemoContext(processContext);

    await startLogDemoService(context);

    return {
      diagnosticContext: context.diagnosticContext,
      envContext: context.envContext,
    };
  }, { serviceName: 'log-demo' });
}

void bootstrap();
