/**
 * Crew Relay - Configuration
 *
 * Defaults, then `<shared>/config.json` (or an explicit file), then
 * CREW_RELAY_* environment variables. CLI flags are applied by the caller.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { isErrnoCode } from './atomic';
import {
  CONFIG_FILE_NAME,
  DEFAULT_ASSISTANT_COMMAND,
  DEFAULT_BROKER_START_TIMEOUT_MS,
  DEFAULT_CONTEXT_MAX_CHARS,
  DEFAULT_POLL_MS,
  DEFAULT_TIMEOUT_MS,
} from './constants';
import { ConfigError, errorMessage } from './errors';
import { sharedDirFor } from './paths';
import type { RelayConfig } from './types';

const positiveInt = z.number().int().positive();

const ConfigFileSchema = z
  .object({
    assistantCommand: z.string().min(1),
    assistantConfigDir: z.string().min(1),
    pollMs: positiveInt,
    timeoutMs: positiveInt,
    contextMaxChars: positiveInt,
    brokerStartTimeoutMs: positiveInt,
  })
  .partial()
  .strict();

const EnvIntSchema = z.coerce.number().int().positive();

export type ConfigOverrides = z.infer<typeof ConfigFileSchema>;

/**
 * Default configuration for a repository
 */
export function getDefaultConfig(repoRoot: string): RelayConfig {
  const sharedDir = sharedDirFor(repoRoot);
  return {
    repoRoot,
    sharedDir,
    assistantCommand: DEFAULT_ASSISTANT_COMMAND,
    assistantConfigDir: path.join(sharedDir, 'assistant'),
    pollMs: DEFAULT_POLL_MS,
    timeoutMs: DEFAULT_TIMEOUT_MS,
    contextMaxChars: DEFAULT_CONTEXT_MAX_CHARS,
    brokerStartTimeoutMs: DEFAULT_BROKER_START_TIMEOUT_MS,
  };
}

export function applyOverrides(config: RelayConfig, overrides: ConfigOverrides): RelayConfig {
  const next: RelayConfig = { ...config };
  if (overrides.assistantCommand !== undefined) next.assistantCommand = overrides.assistantCommand;
  if (overrides.assistantConfigDir !== undefined) {
    next.assistantConfigDir = path.resolve(config.repoRoot, overrides.assistantConfigDir);
  }
  if (overrides.pollMs !== undefined) next.pollMs = overrides.pollMs;
  if (overrides.timeoutMs !== undefined) next.timeoutMs = overrides.timeoutMs;
  if (overrides.contextMaxChars !== undefined) next.contextMaxChars = overrides.contextMaxChars;
  if (overrides.brokerStartTimeoutMs !== undefined) next.brokerStartTimeoutMs = overrides.brokerStartTimeoutMs;
  return next;
}

/** Parse a config file's JSON content. */
export function parseConfigFile(content: string, source: string): ConfigOverrides {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`${source}: invalid JSON (${errorMessage(error)})`);
  }
  const result = ConfigFileSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new ConfigError(`${source}: ${where}: ${issue.message}`);
  }
  return result.data;
}

function envInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const result = EnvIntSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`${name} must be a positive integer, got '${raw}'`);
  }
  return result.data;
}

export function overridesFromEnv(env: NodeJS.ProcessEnv): ConfigOverrides {
  return {
    assistantCommand: env.CREW_RELAY_ASSISTANT || undefined,
    assistantConfigDir: env.CREW_RELAY_ASSISTANT_CONFIG_DIR || undefined,
    pollMs: envInt(env, 'CREW_RELAY_POLL_MS'),
    timeoutMs: envInt(env, 'CREW_RELAY_TIMEOUT_MS'),
  };
}

/**
 * Load configuration
 *
 * An explicit `configPath` must exist; the default `<shared>/config.json` is optional.
 */
export async function loadConfig(
  repoRoot: string,
  options: { configPath?: string; env?: NodeJS.ProcessEnv } = {},
): Promise<RelayConfig> {
  let config = getDefaultConfig(repoRoot);
  const filePath = options.configPath
    ? path.resolve(repoRoot, options.configPath)
    : path.join(config.sharedDir, CONFIG_FILE_NAME);

  let content: string | undefined;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    if (options.configPath || !isErrnoCode(error, 'ENOENT')) {
      throw new ConfigError(`Cannot read config ${filePath}: ${errorMessage(error)}`);
    }
  }

  if (content !== undefined) {
    config = applyOverrides(config, parseConfigFile(content, filePath));
  }
  return applyOverrides(config, overridesFromEnv(options.env ?? process.env));
}
