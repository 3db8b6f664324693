/**
 * seedsweep retention
 * Module exports and process wiring
 */

import { createLogger, parseListenAddress } from '@seedsweep/shared';
import { TransmissionRepository } from './clients/transmission.js';
import { ConfigurationError } from './errors.js';
import { RetentionMetrics } from './metrics.js';
import { Poller } from './poller.js';
import { describeEndpoint } from './rules.js';
import { MetricsServer } from './server.js';
import { Supervisor, metricsServerTask, pollerTask } from './supervisor.js';
import type { Instance, RetentionConfig, TorrentRepository } from './types.js';

const logger = createLogger('retention');

export * from './types.js';
export * from './errors.js';
export * from './torrent.js';
export * from './policy/precondition.js';
export * from './policy/condition.js';
export * from './policy/outcome.js';
export * from './policy/policy-set.js';
export * from './rules.js';
export * from './config.js';
export * from './metrics.js';
export * from './poller.js';
export * from './server.js';
export * from './supervisor.js';
export * from './clients/base.js';
export * from './clients/transmission.js';

export interface RetentionProcess {
  supervisor: Supervisor;
  pollers: Poller[];
  metrics: RetentionMetrics;
  server?: MetricsServer;
}

export interface CreateRetentionOptions {
  /** Repository per instance; Transmission's RPC by default */
  repositoryFor?: (instance: Instance) => TorrentRepository;
  metrics?: RetentionMetrics;
}

/**
 * Wire one poller per instance, plus the metrics server when an address is
 * configured, under a single supervisor.
 */
export function createRetention(
  instances: readonly Instance[],
  config: RetentionConfig,
  options: CreateRetentionOptions = {}
): RetentionProcess {
  const metrics = options.metrics ?? new RetentionMetrics();
  const repositoryFor = options.repositoryFor ?? ((instance: Instance) => new TransmissionRepository(instance.transmission));
  const supervisor = new Supervisor();

  const pollers = instances.map((instance) => {
    logger.info('Configured instance', {
      instance: describeEndpoint(instance.transmission),
      policies: instance.policies.length,
    });
    const poller = new Poller({
      instance,
      repository: repositoryFor(instance),
      metrics,
      takeAction: config.take_action,
    });
    supervisor.add(pollerTask(poller));
    return poller;
  });

  let server: MetricsServer | undefined;
  if (config.metrics_addr !== undefined) {
    const address = parseListenAddress(config.metrics_addr);
    if (address === null) {
      throw new ConfigurationError(`metrics_addr must look like host:port, got ${JSON.stringify(config.metrics_addr)}`);
    }
    server = new MetricsServer(metrics);
    supervisor.add(metricsServerTask(server, address));
  }

  return { supervisor, pollers, metrics, server };
}
