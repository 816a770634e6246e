/**
 * Crew Relay - Response Artifacts
 *
 * Per persona: `<persona>.last.txt` holds the latest response body and
 * `<persona>.last.id` an opaque id. The broker overwrites both after each
 * successful invocation; readers detect "new response" by id or mtime change.
 */

import * as fs from 'fs';
import { isErrnoCode, readFileIfExists, writeFileAtomic } from './atomic';
import { DEFAULT_CONTEXT_MAX_CHARS } from './constants';
import { createLogger, type Logger } from './logger';
import { responseBodyPath, responseIdPath } from './paths';
import { pollUntil, type PollOptions } from './poll';
import type { PersonaKey, ResponseSnapshot } from './types';

export class ResponseArtifacts {
  private logger: Logger;

  constructor(
    readonly sharedDir: string,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger('responses');
  }

  bodyPath(persona: PersonaKey): string {
    return responseBodyPath(this.sharedDir, persona);
  }

  idPath(persona: PersonaKey): string {
    return responseIdPath(this.sharedDir, persona);
  }

  /** Body first, id second: once a reader sees the new id the body is in place. */
  async write(persona: PersonaKey, body: string, responseId: string): Promise<void> {
    await writeFileAtomic(this.bodyPath(persona), body, this.logger);
    await writeFileAtomic(this.idPath(persona), `${responseId}\n`, this.logger);
    this.logger.debug(`${persona} response ${responseId} saved (${body.length} chars)`);
  }

  async readId(persona: PersonaKey): Promise<string> {
    const raw = await readFileIfExists(this.idPath(persona));
    return raw === undefined ? '' : raw.trim();
  }

  async readBody(persona: PersonaKey): Promise<string | undefined> {
    return readFileIfExists(this.bodyPath(persona));
  }

  async mtime(persona: PersonaKey): Promise<number | null> {
    try {
      const stats = await fs.promises.stat(this.bodyPath(persona));
      return stats.mtimeMs;
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        return null;
      }
      throw error;
    }
  }

  async snapshot(persona: PersonaKey): Promise<ResponseSnapshot> {
    const [id, mtimeMs] = await Promise.all([this.readId(persona), this.mtime(persona)]);
    return { id, mtimeMs };
  }

  /** A response is new when its id differs (and is set) or the body mtime moved. */
  async hasChanged(persona: PersonaKey, since: ResponseSnapshot): Promise<boolean> {
    const current = await this.snapshot(persona);
    if (current.id && current.id !== since.id) {
      return true;
    }
    return current.mtimeMs !== null && current.mtimeMs !== since.mtimeMs;
  }

  async waitForUpdate(persona: PersonaKey, since: ResponseSnapshot, options: PollOptions): Promise<boolean> {
    return pollUntil(() => this.hasChanged(persona, since), options);
  }

  /** Last response as inline prompt context, truncated to `maxChars`. */
  async readForContext(persona: PersonaKey, maxChars: number = DEFAULT_CONTEXT_MAX_CHARS): Promise<string> {
    const text = (await this.readBody(persona))?.trim();
    if (!text) {
      return `(no saved response for ${persona})`;
    }
    // Code points, so a surrogate pair is never cut in half
    const chars = Array.from(text);
    if (chars.length <= maxChars) {
      return text;
    }
    return `${chars.slice(0, maxChars).join('').trimEnd()}\n\n...(truncated)`;
  }
}
