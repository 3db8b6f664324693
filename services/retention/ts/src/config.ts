/**
 * Retention Configuration
 *
 * Two layers: process settings from the environment (and CLI overrides), and
 * the YAML rules file that describes instances and their deletion policies.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { config as dotenvConfig } from 'dotenv';
import { load as parseYaml } from 'js-yaml';
import { createLogger, parseBooleanFlag, parseListenAddress } from '@seedsweep/shared';
import { ConfigurationError } from './errors.js';
import { deletePolicy, matching, noopDeletePolicy, onTrackers, rules, transmission } from './rules.js';
import { RulesFileSchema, formatZodError, type InstanceInput, type PolicyInput } from './schemas.js';
import type { DeletePolicy, Instance, RetentionConfig } from './types.js';

const logger = createLogger('retention:config');

// Load environment variables
dotenvConfig();

// ============================================================================
// Process Configuration
// ============================================================================

/**
 * Load process settings from the environment; `overrides` (CLI flags) win.
 */
export function loadConfig(overrides: Partial<RetentionConfig> = {}): RetentionConfig {
  const config: RetentionConfig = {
    rules_path: overrides.rules_path ?? process.env.SEEDSWEEP_CONFIG ?? '',
    take_action: overrides.take_action ?? parseBooleanFlag(process.env.SEEDSWEEP_TAKE_ACTION, false),
    metrics_addr: overrides.metrics_addr ?? (process.env.SEEDSWEEP_METRICS_ADDR || undefined),
  };

  logger.debug('Configuration loaded', {
    rules_path: config.rules_path,
    take_action: config.take_action,
    metrics_addr: config.metrics_addr,
  });

  return config;
}

/**
 * Validate configuration
 */
export function validateConfig(config: RetentionConfig): boolean {
  const errors: string[] = [];

  if (!config.rules_path) {
    errors.push('rules_path is required (argument or SEEDSWEEP_CONFIG)');
  }

  if (config.metrics_addr !== undefined && parseListenAddress(config.metrics_addr) === null) {
    errors.push(`metrics_addr must look like host:port, got ${JSON.stringify(config.metrics_addr)}`);
  }

  if (errors.length > 0) {
    logger.error('Configuration validation failed', { errors });
    return false;
  }

  return true;
}

// ============================================================================
// Rules File
// ============================================================================

/**
 * Load the rules file and everything it includes. Included files are resolved
 * relative to the including file and their instances come first.
 */
export async function loadRules(rulesPath: string, env: NodeJS.ProcessEnv = process.env): Promise<Instance[]> {
  const instances = await loadRulesFile(path.resolve(rulesPath), [], env);

  logger.info('Rules loaded', {
    path: rulesPath,
    instances: instances.length,
    policies: instances.reduce((sum, instance) => sum + instance.policies.length, 0),
  });

  return instances;
}

async function loadRulesFile(file: string, stack: string[], env: NodeJS.ProcessEnv): Promise<Instance[]> {
  if (stack.includes(file)) {
    throw new ConfigurationError(`Include cycle: ${[...stack, file].join(' -> ')}`);
  }

  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`loading ${file}: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }

  let document: unknown;
  try {
    document = parseYaml(text, { filename: file });
  } catch (error) {
    throw new ConfigurationError(`parsing ${file}: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }

  const parsed = RulesFileSchema.safeParse(document ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(`${file}: ${formatZodError(parsed.error)}`);
  }

  const included: Instance[] = [];
  for (const include of parsed.data.include) {
    const target = path.resolve(path.dirname(file), include);
    included.push(...(await loadRulesFile(target, [...stack, file], env)));
  }

  const own = parsed.data.instances.map((input, index) => {
    try {
      return buildInstance(input, env);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw new ConfigurationError(`${file}: instances.${index}: ${error.message}`, { cause: error });
      }
      throw error;
    }
  });

  return [...included, ...own];
}

function buildInstance(input: InstanceInput, env: NodeJS.ProcessEnv): Instance {
  const { url, user, password, password_env: passwordEnv, poll_interval: pollInterval } = input.transmission;

  let resolvedPassword = password;
  if (passwordEnv !== undefined) {
    resolvedPassword = env[passwordEnv];
    if (resolvedPassword === undefined) {
      throw new ConfigurationError(`environment variable ${passwordEnv} (password_env) is not set`);
    }
  }

  const endpoint = transmission(url, {
    user,
    password: resolvedPassword,
    pollInterval: pollInterval === undefined ? undefined : durationInput(pollInterval),
  });

  return rules(endpoint, input.policies.map(buildPolicy));
}

function buildPolicy(input: PolicyInput): DeletePolicy {
  const precondition = onTrackers(input.trackers);
  if (input.min_file_count !== undefined) precondition.minFileCount(input.min_file_count);
  if (input.max_file_count !== undefined) precondition.maxFileCount(input.max_file_count);

  const condition = matching();
  if (input.max_ratio !== undefined) condition.maxRatio(input.max_ratio);
  if (input.min_seeding_time !== undefined) condition.minSeedingTime(durationInput(input.min_seeding_time));
  if (input.max_seeding_time !== undefined) condition.maxSeedingTime(durationInput(input.max_seeding_time));

  const build = input.delete_data ? deletePolicy : noopDeletePolicy;
  return build(input.name ?? null, precondition, condition);
}

// Numbers in the rules file are seconds; the builder takes milliseconds
function durationInput(value: string | number): string | number {
  return typeof value === 'number' ? value * 1000 : value;
}
