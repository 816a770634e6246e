/**
 * Crew Relay - Broker
 *
 * Local-socket server that funnels every persona's prompts into one
 * serialized, continuation-aware conversation with the external assistant.
 */

import * as fs from 'fs';
import * as net from 'net';
import * as path from 'path';
import lockfile from 'proper-lockfile';
import { v4 as uuidv4 } from 'uuid';
import { looksLikeNoSessionToContinue, type AssistantResult, type AssistantRunner } from './assistant';
import { writeFileAtomic } from './atomic';
import { pingBroker } from './client';
import { BrokerAlreadyRunningError, errorMessage } from './errors';
import { createLogger, type Logger } from './logger';
import { Mutex } from './mutex';
import { brokerIdentityPath, brokerPidPath, invokeLockPath } from './paths';
import { encodeMessage, PromptRequestSchema, type BrokerErrorCode, type BrokerResponse } from './protocol';
import { ResponseArtifacts } from './responses';
import { utcNowIso } from './state';
import type { BrokerIdentity } from './types';

const REQUEST_IDLE_TIMEOUT_MS = 10000;

export interface BrokerOptions {
  socketPath: string;
  repoRoot: string;
  assistantConfigDir: string;
  sharedDir: string;
  runner: AssistantRunner;
  logger?: Logger;
  artifacts?: ResponseArtifacts;
  requestIdleTimeoutMs?: number;    // Drop connections that never send a line
}

function failure(error: BrokerErrorCode): BrokerResponse {
  return { ok: false, error };
}

export class Broker {
  private server?: net.Server;
  private continuation = false;   // "a conversation exists that --continue can resume"
  private mutex = new Mutex();
  private inFlight = new Set<Promise<void>>();
  private logger: Logger;
  private artifacts: ResponseArtifacts;

  constructor(private options: BrokerOptions) {
    this.logger = options.logger ?? createLogger('broker');
    this.artifacts = options.artifacts ?? new ResponseArtifacts(options.sharedDir, this.logger);
  }

  hasContinuation(): boolean {
    return this.continuation;
  }

  identity(): BrokerIdentity {
    return {
      pid: process.pid,
      socketPath: this.options.socketPath,
      repoRoot: this.options.repoRoot,
      assistantConfigDir: this.options.assistantConfigDir,
      startedAt: utcNowIso(),
    };
  }

  async start(): Promise<void> {
    if (this.server) {
      return;
    }
    const { socketPath, sharedDir, assistantConfigDir } = this.options;

    await fs.promises.mkdir(path.dirname(socketPath), { recursive: true });
    await fs.promises.mkdir(assistantConfigDir, { recursive: true });

    if (await pingBroker(socketPath)) {
      throw new BrokerAlreadyRunningError(socketPath);
    }
    // Nobody answered: whatever is at the path is left over from a dead broker
    await fs.promises.rm(socketPath, { force: true });

    const server = net.createServer((socket) => this.handleSocket(socket));
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(socketPath, () => {
        server.off('error', reject);
        resolve();
      });
    });
    server.on('error', (err) => this.logger.error(`Server error: ${err.message}`));
    this.server = server;

    await writeFileAtomic(brokerPidPath(sharedDir), `${process.pid}\n`, this.logger);
    await writeFileAtomic(brokerIdentityPath(sharedDir), `${JSON.stringify(this.identity(), null, 2)}\n`, this.logger);

    this.logger.info(`Listening at ${socketPath} (repo ${this.options.repoRoot})`);
  }

  /** Stop accepting, let the in-flight invocation finish, remove socket and markers. */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = undefined;

    const closed = new Promise<void>((resolve) => server.close(() => resolve()));
    await Promise.allSettled([...this.inFlight]);
    await closed;

    const { socketPath, sharedDir } = this.options;
    await Promise.all([
      fs.promises.rm(socketPath, { force: true }),
      fs.promises.rm(brokerPidPath(sharedDir), { force: true }),
      fs.promises.rm(brokerIdentityPath(sharedDir), { force: true }),
    ]);
    this.logger.info('Stopped');
  }

  private handleSocket(socket: net.Socket): void {
    let buffer = '';
    let handled = false;
    socket.setEncoding('utf8');
    socket.setTimeout(this.options.requestIdleTimeoutMs ?? REQUEST_IDLE_TIMEOUT_MS);

    socket.on('timeout', () => {
      this.logger.debug('Dropping idle connection');
      socket.destroy();
    });

    socket.on('data', (chunk: string) => {
      if (handled) return;
      buffer += chunk;
      const index = buffer.indexOf('\n');
      if (index < 0) return;

      handled = true;
      socket.setTimeout(0);
      const line = buffer.slice(0, index);
      buffer = '';

      const task = this.handleRequest(line)
        .then((response) => {
          if (socket.destroyed || !socket.writable) {
            this.logger.warn('Client went away before the reply was written');
            return;
          }
          socket.end(encodeMessage(response));
        })
        .catch((err: unknown) => {
          this.logger.error(`Request handler error: ${errorMessage(err)}`);
          socket.destroy();
        })
        .finally(() => {
          this.inFlight.delete(task);
        });
      this.inFlight.add(task);
    });

    socket.on('error', (err) => {
      this.logger.debug(`Socket error: ${err.message}`);
    });
  }

  /** Decode one request line and produce its reply. */
  async handleRequest(line: string): Promise<BrokerResponse> {
    let request: unknown;
    try {
      request = JSON.parse(line);
    } catch {
      return failure('invalid_json');
    }

    if (request === null || typeof request !== 'object' || Array.isArray(request)) {
      return failure('invalid_request');
    }

    const kind = 'kind' in request ? request.kind : undefined;
    this.logger.debug(`Request: ${String(kind)}`);

    if (kind === 'ping') {
      return { ok: true, kind: 'pong' };
    }
    if (kind === 'info') {
      return {
        ok: true,
        kind: 'info',
        repoRoot: this.options.repoRoot,
        assistantConfigDir: this.options.assistantConfigDir,
      };
    }
    if (kind !== 'prompt') {
      return failure('unknown_kind');
    }

    const parsed = PromptRequestSchema.safeParse(request);
    if (!parsed.success) {
      return failure('invalid_request');
    }
    const { prompt, persona, requestId } = parsed.data;
    if (typeof prompt !== 'string' || !prompt.trim()) {
      return failure('empty_prompt');
    }

    const result = await this.invokeExclusive(prompt);
    if (result.exitCode !== 0 || !persona) {
      return { ok: true, exitCode: result.exitCode, output: result.output };
    }

    const responseId = requestId ?? uuidv4();
    await this.artifacts.write(persona, result.output, responseId);
    return { ok: true, exitCode: result.exitCode, output: result.output, responseId };
  }

  /** In-process mutex first, then the cross-process invoke lock. */
  private async invokeExclusive(prompt: string): Promise<AssistantResult> {
    if (this.mutex.isLocked()) {
      this.logger.debug('Prompt queued behind the running invocation');
    }
    return this.mutex.withLock(async () => {
      const release = await lockfile.lock(this.options.sharedDir, {
        lockfilePath: invokeLockPath(this.options.sharedDir),
        realpath: false,
        retries: { forever: true, factor: 1.5, minTimeout: 50, maxTimeout: 1000 },
        onCompromised: (err) => this.logger.error(`Invoke lock compromised: ${err.message}`),
      });
      try {
        return await this.invoke(prompt);
      } finally {
        await release();
      }
    });
  }

  /**
   * One assistant run, continuing the conversation when one exists. A continue
   * that fails with "no session to continue" clears the flag and retries once fresh.
   */
  private async invoke(prompt: string): Promise<AssistantResult> {
    const { repoRoot, assistantConfigDir: configDir, runner } = this.options;
    const useContinue = this.continuation;

    let started = Date.now();
    let result = await runner.run({ prompt, continueSession: useContinue, repoRoot, configDir });
    this.logger.info(
      `Invocation (${useContinue ? 'continue' : 'fresh'}) exited ${result.exitCode} in ${Date.now() - started}ms`,
    );

    if (useContinue && result.exitCode !== 0 && looksLikeNoSessionToContinue(result.output)) {
      this.logger.warn('No session to continue; retrying without continuation');
      this.continuation = false;
      started = Date.now();
      result = await runner.run({ prompt, continueSession: false, repoRoot, configDir });
      this.logger.info(`Invocation (fresh retry) exited ${result.exitCode} in ${Date.now() - started}ms`);
    }

    if (result.exitCode === 0 && !this.continuation) {
      this.continuation = true;
    }
    return result;
  }
}

/** Run `broker` until SIGTERM or SIGINT, then shut it down cleanly. */
export async function runBrokerUntilSignal(broker: Broker): Promise<void> {
  await broker.start();
  await new Promise<void>((resolve) => {
    const onSignal = () => {
      process.off('SIGTERM', onSignal);
      process.off('SIGINT', onSignal);
      resolve();
    };
    process.on('SIGTERM', onSignal);
    process.on('SIGINT', onSignal);
  });
  await broker.stop();
}
