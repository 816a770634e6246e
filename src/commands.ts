/**
 * Crew Relay - Local Commands
 *
 * Operator commands shared by the CLI and the `>` shortcuts of the persona client.
 */

import { spawn } from 'child_process';
import * as fs from 'fs';
import { InvalidArgumentError } from 'commander';
import { v4 as uuidv4 } from 'uuid';
import { isErrnoCode, readFileIfExists } from './atomic';
import { brokerInfo, pingBroker, submitPrompt } from './client';
import { PERSONA_KEYS, PERSONA_STATUSES } from './constants';
import { TimeoutError, TransportError } from './errors';
import { createLogger, type Logger } from './logger';
import {
  brokerIdentityPath,
  brokerLogPath,
  brokerPidPath,
  brokerSocketPath,
  sessionPath,
} from './paths';
import { pollUntil } from './poll';
import { ResponseArtifacts } from './responses';
import { formatPrompt } from './scheduler';
import { isPersonaKey, isPersonaStatus, serializeState } from './state';
import { SessionStore } from './store';
import type { PersonaKey, PersonaStatus, RelayConfig, SessionState } from './types';

export interface CommandContext {
  config: RelayConfig;
  store: SessionStore;
  artifacts: ResponseArtifacts;
  logger: Logger;
  print: (text: string) => void;
}

export function createContext(
  config: RelayConfig,
  options: { logger?: Logger; print?: (text: string) => void } = {},
): CommandContext {
  const logger = options.logger ?? createLogger('crew-relay');
  return {
    config,
    store: new SessionStore(sessionPath(config.sharedDir), { repoRoot: config.repoRoot, logger }),
    artifacts: new ResponseArtifacts(config.sharedDir, logger),
    logger,
    print: options.print ?? ((text) => console.log(text)),
  };
}

// Argument parsers for commander options

export function parsePersona(value: string): PersonaKey {
  if (!isPersonaKey(value)) {
    throw new InvalidArgumentError(`Unknown persona '${value}'. Expected one of: ${PERSONA_KEYS.join(', ')}`);
  }
  return value;
}

export function parseStatus(value: string): PersonaStatus {
  if (!isPersonaStatus(value)) {
    throw new InvalidArgumentError(`Unknown status '${value}'. Expected one of: ${PERSONA_STATUSES.join(', ')}`);
  }
  return value;
}

export function collectStatus(value: string, previous: PersonaStatus[] = []): PersonaStatus[] {
  return [...previous, parseStatus(value)];
}

/** Seconds (fractions allowed) to milliseconds. */
export function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new InvalidArgumentError(`Expected a non-negative number of seconds, got '${value}'`);
  }
  return Math.round(seconds * 1000);
}

/**
 * Create the shared directory and a normalized session document.
 */
export async function initSession(ctx: CommandContext): Promise<SessionState> {
  await fs.promises.mkdir(ctx.config.sharedDir, { recursive: true });
  const state = await ctx.store.ensureInitialized();
  ctx.print(`Session ready: ${ctx.store.filePath}`);
  return state;
}

export async function showStatus(ctx: CommandContext): Promise<SessionState> {
  const state = await ctx.store.read();
  ctx.print(serializeState(state.personas).trimEnd());
  return state;
}

/** Operator override: any status may be set, regardless of the transition table. */
export async function setStatus(
  ctx: CommandContext,
  persona: PersonaKey,
  status: PersonaStatus,
  message?: string,
): Promise<void> {
  await ctx.store.setStatus(persona, status, { force: true, message });
  ctx.print(`${persona} => ${status}`);
}

export async function waitForStatus(
  ctx: CommandContext,
  persona: PersonaKey,
  statuses: PersonaStatus[],
  options: { timeoutMs?: number; pollMs: number },
): Promise<void> {
  const desired = [...new Set(statuses)].sort();
  const reached = await ctx.store.waitFor((state) => desired.includes(state.personas[persona].status), options);
  if (!reached) {
    throw new TimeoutError(`${persona} to be in [${desired.join(', ')}]`);
  }
  ctx.print(`${persona} reached status in [${desired.join(', ')}]`);
}

/**
 * Send one prompt as `persona` through the broker and print its response.
 * @returns the assistant's exit code
 */
export async function ask(
  ctx: CommandContext,
  persona: PersonaKey,
  prompt: string,
  options: { timeoutMs: number; pollMs: number },
): Promise<number> {
  const { store, artifacts, config } = ctx;
  const since = await artifacts.snapshot(persona);
  const requestId = uuidv4();

  await store.setStatus(persona, 'working', { force: true });
  try {
    const result = await submitPrompt(
      brokerSocketPath(config.sharedDir),
      { prompt: formatPrompt(persona, prompt), persona, requestId },
      { timeoutMs: options.timeoutMs },
    );
    if (result.exitCode !== 0) {
      if (result.output) {
        ctx.print(result.output.trimEnd());
      }
      return result.exitCode;
    }

    const updated = await artifacts.waitForUpdate(persona, since, options);
    if (!updated || (await artifacts.readId(persona)) !== requestId) {
      throw new TimeoutError(`${persona} response`);
    }

    const body = (await artifacts.readBody(persona)) ?? '';
    if (body) {
      ctx.print(body.trimEnd());
    }
    return 0;
  } finally {
    await store.setStatus(persona, 'idle', { force: true });
  }
}

// Broker lifecycle

/** Starts a broker process for `config`; readiness is checked by the caller. */
export type BrokerLauncher = (config: RelayConfig) => void;

/** Detached `crew-relay broker` child, output appended to broker.log. */
export const launchDetachedBroker: BrokerLauncher = (config) => {
  const logFd = fs.openSync(brokerLogPath(config.sharedDir), 'a');
  try {
    const child = spawn(
      process.execPath,
      [
        process.argv[1],
        'broker',
        '--dir',
        config.repoRoot,
        '--assistant',
        config.assistantCommand,
        '--assistant-config-dir',
        config.assistantConfigDir,
      ],
      {
        cwd: config.repoRoot,
        detached: true,
        stdio: ['ignore', logFd, logFd],
        env: process.env,
      },
    );
    child.unref();
  } finally {
    fs.closeSync(logFd);
  }
};

async function readPid(sharedDir: string): Promise<number | undefined> {
  const raw = await readFileIfExists(brokerPidPath(sharedDir));
  const pid = raw === undefined ? NaN : Number.parseInt(raw.trim(), 10);
  return Number.isInteger(pid) && pid > 0 ? pid : undefined;
}

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    if (isErrnoCode(error, 'ESRCH')) {
      return false;
    }
    // EPERM: exists but belongs to someone else
    return true;
  }
}

function signal(pid: number, name: NodeJS.Signals): boolean {
  try {
    process.kill(pid, name);
    return true;
  } catch (error) {
    if (isErrnoCode(error, 'ESRCH')) {
      return false;
    }
    throw error;
  }
}

/**
 * Stop the broker recorded in the pid file: SIGTERM, a short grace period, then SIGKILL.
 * Stale socket and marker files are removed.
 * @returns true when a broker process was signalled
 */
export async function stopBroker(ctx: CommandContext, options: { graceMs?: number } = {}): Promise<boolean> {
  const { sharedDir } = ctx.config;
  const pidPath = brokerPidPath(sharedDir);
  const socketPath = brokerSocketPath(sharedDir);
  let signalled = false;

  const pid = await readPid(sharedDir);
  if (pid !== undefined && pid !== process.pid) {
    signalled = signal(pid, 'SIGTERM');
    if (signalled) {
      const exited = await pollUntil(
        async () => !isAlive(pid) || (await readFileIfExists(pidPath)) === undefined,
        { timeoutMs: options.graceMs ?? 1000, pollMs: 50 },
      );
      if (!exited || isAlive(pid)) {
        ctx.logger.warn(`Broker ${pid} did not exit after SIGTERM; sending SIGKILL`);
        signal(pid, 'SIGKILL');
      }
    }
  }

  await fs.promises.rm(pidPath, { force: true });
  if (!(await pingBroker(socketPath))) {
    await fs.promises.rm(socketPath, { force: true });
    await fs.promises.rm(brokerIdentityPath(sharedDir), { force: true });
  }

  ctx.print(signalled ? `Stopped broker (pid ${pid})` : 'Broker is not running');
  return signalled;
}

/**
 * Make sure a broker for this repository and assistant config dir answers on
 * the socket. A broker serving another config is replaced.
 */
export async function ensureBroker(
  ctx: CommandContext,
  launch: BrokerLauncher = launchDetachedBroker,
): Promise<void> {
  const { config, logger } = ctx;
  const socketPath = brokerSocketPath(config.sharedDir);

  await fs.promises.mkdir(config.sharedDir, { recursive: true });
  await fs.promises.mkdir(config.assistantConfigDir, { recursive: true });

  if (await pingBroker(socketPath)) {
    const info = await brokerInfo(socketPath);
    if (info && info.repoRoot === config.repoRoot && info.assistantConfigDir === config.assistantConfigDir) {
      logger.debug(`Broker already running at ${socketPath}`);
      return;
    }
    logger.info('Running broker serves another configuration; restarting it');
    await stopBroker(ctx);
  } else if ((await readPid(config.sharedDir)) !== undefined) {
    logger.info('Cleaning up unresponsive broker');
    await stopBroker(ctx);
  }

  launch(config);

  const ready = await pollUntil(() => pingBroker(socketPath), {
    timeoutMs: config.brokerStartTimeoutMs,
    pollMs: 100,
  });
  if (!ready) {
    throw new TransportError(`Broker failed to start (no socket): ${socketPath}`);
  }
  logger.info(`Broker ready at ${socketPath}`);
}
