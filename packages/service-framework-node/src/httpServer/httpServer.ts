import { HttpMethod, type HttpRequest } from '@gcp-structured-log/structured-log';
import { Value } from '@sinclair/typebox/value';
import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import type { HealthCheckResult, HttpServerConfig, ServiceContext } from './types.js';

interface HttpServerEnv {
  PORT: number;
}

const nanosPerSecond = 1_000_000_000n;

export function formatLatency(elapsedNanos: bigint): string {
  const seconds = elapsedNanos / nanosPerSecond;
  const nanos = elapsedNanos % nanosPerSecond;
  return `${seconds}.${nanos.toString().padStart(9, '0')}s`;
}

function headerAsString(value: number | string | string[] | undefined): string | undefined {
  if (typeof value === 'number' || typeof value === 'string') {
    return String(value);
  }
  return undefined;
}

export function describeHttpRequest(request: FastifyRequest, reply: FastifyReply): HttpRequest {
  const method = request.method.toUpperCase();

  return {
    ...(Value.Check(HttpMethod, method) ? { requestMethod: method } : {}),
    requestUrl: `${request.protocol}://${request.host}${request.url}`,
    requestSize: headerAsString(request.headers['content-length']),
    status: reply.statusCode,
    responseSize: headerAsString(reply.getHeader('content-length')),
    userAgent: request.headers['user-agent'],
    remoteIp: request.ip,
    latency: formatLatency(process.hrtime.bigint() - request.startTime),
    protocol: `HTTP/${request.raw.httpVersion}`,
  };
}

export function createHttpServer<T extends HttpServerEnv>(
  context: ServiceContext<T>,
  config: HttpServerConfig = {},
): FastifyInstance {
  const fastify = Fastify({
    logger: false,
    requestIdLogLabel: 'correlationId',
    requestIdHeader: 'x-correlation-id',
    genReqId: () => context.diagnosticContext.correlationIdGenerator.generateRootId(),
  });

  fastify.decorateRequest('logger');
  fastify.decorateRequest('correlationId');
  fastify.decorateRequest('startTime');

  fastify.addHook('onRequest', async (request) => {
    const correlationId = request.id;
    const logger = context.diagnosticContext.createChildLogger(correlationId);

    request.correlationId = correlationId;
    request.logger = logger;
    request.startTime = process.hrtime.bigint();

    logger.debug('Request received', {
      method: request.method,
      url: request.url,
    });
  });

  fastify.addHook('onResponse', async (request, reply) => {
    request.logger.log(
      reply.statusCode >= 500 ? 'warn' : 'info',
      'Request completed',
      undefined,
      { httpRequest: describeHttpRequest(request, reply) },
    );
  });

  fastify.get('/health', async (request, reply) => {
    const components: HealthCheckResult[] = [];
    const health = {
      status: 'healthy',
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
      components,
    };

    if (context.processContext.isShuttingDown()) {
      reply.code(503);
      return { ...health, status: 'unhealthy' };
    }

    if (config.healthChecks && config.healthChecks.length > 0) {
      try {
        const checkResults = await Promise.all(config.healthChecks.map((check) => check()));
        health.components = checkResults;

        const unhealthyComponents = checkResults
          .filter((result) => !result.isHealthy)
          .map((result) => result.component);

        if (unhealthyComponents.length > 0) {
          request.logger.warn('Health check failed', {
            unhealthyComponents,
            results: checkResults,
          });
          reply.code(503);
          return { ...health, status: 'unhealthy' };
        }
      } catch (error) {
        request.logger.error(error, 'Health check error');
        reply.code(503);
        return { ...health, status: 'unhealthy' };
      }
    }

    return health;
  });

  context.processContext.onShutdown(async () => {
    await fastify.close();
  });

  fastify.decorate('startServer', async function (this: FastifyInstance) {
    await this.listen({
      port: context.envContext.config.PORT,
      host: config.host ?? '0.0.0.0',
    });

    context.diagnosticContext.logger.info('Server started', {
      port: context.envContext.config.PORT,
      environment: context.envContext.nodeEnv,
    });
  });

  return fastify;
}
