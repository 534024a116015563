import { SF } from '@gcp-structured-log/service-framework-node';
import { TB } from '@gcp-structured-log/service-framework-node/typebox';
import type { FastifyError, FastifyInstance } from 'fastify';
import type { LogDemoContext } from './context.js';
import { logStartupStatements } from './demo.js';

export class DemoFailureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DemoFailureError';
    Object.setPrototypeOf(this, DemoFailureError.prototype);
  }
}

const HelloQuery = TB.Object({
  name: TB.String({ minLength: 1, default: 'world' }),
});

type HelloQuery = TB.Static<typeof HelloQuery>;

export function createLogDemoServer(context: LogDemoContext): FastifyInstance {
  const httpServer = SF.createHttpServer(context, {
    healthChecks: [
      async () => ({
        component: 'LogDemo',
        isHealthy: true,
      }),
    ],
  });

  httpServer.setErrorHandler<FastifyError>(async (error, request, reply) => {
    const statusCode = error.statusCode ?? 500;

    if (statusCode >= 500) {
      request.logger.error(error, 'Request failed', { url: request.url });
    } else {
      request.logger.warn('Request rejected', { url: request.url, reason: error.message });
    }

    reply.code(statusCode);
    return { error: statusCode >= 500 ? 'Internal Server Error' : error.message };
  });

  httpServer.get<{ Querystring: HelloQuery }>(
    '/hello',
    { schema: { querystring: HelloQuery } },
    async (request) => {
      request.logger.info('Saying hello', { name: request.query.name });
      return { message: `Hello, ${request.query.name}` };
    },
  );

  httpServer.get('/fail', async () => {
    throw new DemoFailureError('Simulated failure');
  });

  return httpServer;
}

export async function startLogDemoService(context: LogDemoContext): Promise<FastifyInstance> {
  const { diagnosticContext, envContext, processContext } = context;
  const logger = diagnosticContext.logger;

  logStartupStatements(logger, envContext.config);

  const httpServer = createLogDemoServer(context);

  processContext.onShutdown(() => {
    logger.info('Shutting down log demo service');
  });

  await httpServer.startServer();

  return httpServer;
}
