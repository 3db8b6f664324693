/**
 * Supervisor
 *
 * Runs every long-lived task of the process side by side. None of them is
 * supposed to finish, so the first one that does (returning or rejecting)
 * brings the whole process down with a TaskExitedError.
 */

import { createLogger, type ListenAddress } from '@seedsweep/shared';
import { ConfigurationError, TaskExitedError } from './errors.js';
import type { Poller } from './poller.js';
import type { MetricsServer } from './server.js';

const logger = createLogger('retention:supervisor');

export interface SupervisedTask {
  readonly name: string;
  run(signal: AbortSignal): Promise<void>;
}

export function pollerTask(poller: Poller): SupervisedTask {
  return {
    name: `poller ${poller.url}`,
    run: (signal) => poller.run(signal),
  };
}

export function metricsServerTask(server: MetricsServer, address: ListenAddress): SupervisedTask {
  return {
    name: `metrics server ${address.host}:${address.port}`,
    run: (signal) => server.run(address, signal),
  };
}

export class Supervisor {
  private tasks: SupervisedTask[] = [];
  private controller = new AbortController();

  add(task: SupervisedTask): this {
    this.tasks.push(task);
    return this;
  }

  get size(): number {
    return this.tasks.length;
  }

  /**
   * Never resolves. Rejects with the first task exit, after asking the
   * remaining tasks to stop.
   */
  async run(): Promise<never> {
    if (this.tasks.length === 0) {
      throw new ConfigurationError('Nothing to run: no instances configured and no metrics address given');
    }

    const { signal } = this.controller;
    const exits = this.tasks.map((task) => {
      logger.debug('Starting task', { task: task.name });
      return task.run(signal).then(
        (): never => {
          throw new TaskExitedError(task.name);
        },
        (error: unknown): never => {
          throw new TaskExitedError(task.name, error);
        }
      );
    });

    try {
      return await Promise.race(exits);
    } catch (error) {
      logger.error('Supervised task exited', { error: error instanceof Error ? error.message : String(error) });
      throw error;
    } finally {
      this.controller.abort();
    }
  }

  /** Ask every task to stop. Their exits still count as task exits. */
  stop(): void {
    this.controller.abort();
  }
}
