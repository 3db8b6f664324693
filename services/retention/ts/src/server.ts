/**
 * Metrics HTTP Server
 * Serves the process's metrics in Prometheus text format
 */

import Fastify, { type FastifyReply, type FastifyRequest } from 'fastify';
import { createLogger, type ListenAddress } from '@seedsweep/shared';
import type { RetentionMetrics } from './metrics.js';

const logger = createLogger('retention:server');

const PROMETHEUS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

export class MetricsServer {
  private fastify: ReturnType<typeof Fastify>;
  private metrics: RetentionMetrics;
  private closed: Promise<void>;

  constructor(metrics: RetentionMetrics) {
    this.metrics = metrics;
    this.fastify = Fastify({ logger: false });

    let markClosed: () => void = () => undefined;
    this.closed = new Promise<void>((resolve) => {
      markClosed = resolve;
    });
    this.fastify.addHook('onClose', async () => {
      markClosed();
    });

    this.registerRoutes();
  }

  /** Underlying Fastify instance, for in-process requests */
  get app(): ReturnType<typeof Fastify> {
    return this.fastify;
  }

  private registerRoutes(): void {
    this.fastify.get('/health', async () => {
      return { status: 'ok', timestamp: new Date().toISOString() };
    });

    this.fastify.get('/metrics', async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.type(PROMETHEUS_CONTENT_TYPE).send(this.metrics.serialize());
    });
  }

  async start(address: ListenAddress): Promise<void> {
    await this.fastify.listen({ host: address.host, port: address.port });
    logger.info('Serving prometheus metrics', {
      metrics_endpoint: `http://${address.host.includes(':') ? `[${address.host}]` : address.host}:${address.port}/metrics`,
    });
  }

  async stop(): Promise<void> {
    await this.fastify.close();
    logger.info('Metrics server stopped');
  }

  /**
   * Listen and stay up until the server is closed, either through `stop()` or
   * because `signal` aborted.
   */
  async run(address: ListenAddress, signal?: AbortSignal): Promise<void> {
    await this.start(address);
    if (signal?.aborted) {
      await this.stop();
      return;
    }
    signal?.addEventListener(
      'abort',
      () => {
        this.stop().catch((error: unknown) => {
          logger.error('Failed to stop metrics server', { error: error instanceof Error ? error.message : String(error) });
        });
      },
      { once: true }
    );
    await this.closed;
  }
}
