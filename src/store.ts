/**
 * Crew Relay - Shared Session Store
 *
 * One JSON document per coordination root, shared by every persona process.
 * All access happens under an exclusive lock on a companion `<file>.lock`
 * path, and every write replaces the file atomically.
 */

import * as fs from 'fs';
import * as path from 'path';
import lockfile from 'proper-lockfile';
import { readFileIfExists, writeFileAtomic } from './atomic';
import { errorMessage } from './errors';
import { createLogger, type Logger } from './logger';
import { pollUntil } from './poll';
import { applyStatus, normalizeSessionState, serializeState, utcNowIso } from './state';
import type { PersonaKey, PersonaStatus, SessionState } from './types';

export interface SessionStoreOptions {
  repoRoot: string;
  logger?: Logger;
  staleMs?: number;
}

/** Handle valid only inside `SessionStore.withLock`. */
export class LockedSession {
  constructor(
    readonly filePath: string,
    private logger: Logger,
  ) {}

  /** Raw document; `{}` when the file is missing, empty or unreadable. */
  async readJson(): Promise<unknown> {
    const raw = await readFileIfExists(this.filePath);
    if (raw === undefined || !raw.trim()) {
      return {};
    }

    try {
      return JSON.parse(raw);
    } catch (error) {
      await this.quarantine(errorMessage(error));
      return {};
    }
  }

  /** Returns false when the file already holds exactly this document. */
  async writeIfChanged(data: unknown): Promise<boolean> {
    const next = serializeState(data);
    if ((await readFileIfExists(this.filePath)) === next) {
      return false;
    }
    await writeFileAtomic(this.filePath, next, this.logger);
    return true;
  }

  private async quarantine(reason: string): Promise<void> {
    const corruptPath = `${this.filePath}.corrupt-${utcNowIso().replace(/:/g, '')}`;
    try {
      await fs.promises.rename(this.filePath, corruptPath);
      this.logger.warn(`Unreadable session state (${reason}); moved to ${corruptPath}`);
    } catch (error) {
      this.logger.warn(`Unreadable session state (${reason}); quarantine failed: ${errorMessage(error)}`);
    }
  }
}

export class SessionStore {
  readonly lockPath: string;
  private repoRoot: string;
  private logger: Logger;
  private staleMs: number;

  constructor(
    readonly filePath: string,
    options: SessionStoreOptions,
  ) {
    this.lockPath = `${filePath}.lock`;
    this.repoRoot = options.repoRoot;
    this.logger = options.logger ?? createLogger('store');
    this.staleMs = options.staleMs ?? 10000;
  }

  /** Hold the cross-process lock for the duration of `fn` and no longer. */
  async withLock<T>(fn: (locked: LockedSession) => Promise<T>): Promise<T> {
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    const release = await lockfile.lock(this.filePath, {
      lockfilePath: this.lockPath,
      realpath: false,
      stale: this.staleMs,
      retries: { retries: 200, factor: 1.2, minTimeout: 5, maxTimeout: 100, randomize: true },
      onCompromised: (error) => this.logger.error(`Session lock compromised: ${error.message}`),
    });
    try {
      return await fn(new LockedSession(this.filePath, this.logger));
    } finally {
      await release();
    }
  }

  /** Normalized document; a normalization that changed anything is written back. */
  async read(): Promise<SessionState> {
    return this.withLock(async (locked) => {
      const state = normalizeSessionState(this.repoRoot, await locked.readJson());
      await locked.writeIfChanged(state);
      return state;
    });
  }

  async writeIfChanged(state: SessionState): Promise<boolean> {
    return this.withLock((locked) => locked.writeIfChanged(state));
  }

  /** Lock, read, normalize, mutate, write, unlock. */
  async update(mutate: (state: SessionState) => void): Promise<SessionState> {
    return this.withLock(async (locked) => {
      const state = normalizeSessionState(this.repoRoot, await locked.readJson());
      mutate(state);
      await locked.writeIfChanged(state);
      return state;
    });
  }

  async ensureInitialized(): Promise<SessionState> {
    return this.read();
  }

  async setStatus(
    persona: PersonaKey,
    status: PersonaStatus,
    options: { force?: boolean; message?: string } = {},
  ): Promise<SessionState> {
    return this.update((state) => applyStatus(state, persona, status, options));
  }

  async setInputReady(persona: PersonaKey, ready: boolean): Promise<SessionState> {
    return this.update((state) => {
      state.personas[persona].inputReady = ready;
      state.personas[persona].updatedAt = utcNowIso();
    });
  }

  async setPaneId(persona: PersonaKey, paneId: string): Promise<SessionState> {
    return this.update((state) => {
      state.personas[persona].paneId = paneId;
    });
  }

  /** Poll the normalized document until `predicate` holds; false on timeout. */
  async waitFor(
    predicate: (state: SessionState) => boolean,
    options: { timeoutMs?: number; pollMs: number },
  ): Promise<boolean> {
    return pollUntil(
      () => this.withLock(async (locked) => predicate(normalizeSessionState(this.repoRoot, await locked.readJson()))),
      options,
    );
  }
}
