/**
 * Crew Relay - Session State Model
 *
 * Every read of the shared document goes through `normalizeSessionState`, so
 * missing, extra or invalid fields never reach the rest of the code.
 */

import { z } from 'zod';
import {
  CURRENT_SESSION_VERSION,
  PERSONA_KEYS,
  PERSONA_NAMES,
  PERSONA_STATUSES,
  SESSION_NAME,
} from './constants';
import { InvalidTransitionError } from './errors';
import type { PersonaKey, PersonaRecord, PersonaStatus, SessionState } from './types';

export const STATUS_TRANSITIONS: Record<PersonaStatus, readonly PersonaStatus[]> = {
  idle: ['working', 'waiting', 'done', 'blocked'],
  working: ['idle', 'done', 'blocked'],
  waiting: ['idle', 'done', 'blocked'],
  done: ['idle', 'working', 'waiting', 'blocked'],
  blocked: ['idle', 'working', 'waiting', 'done'],
};

const nonEmptyString = z.string().min(1).optional().catch(undefined);

const PersonaRecordSchema = z
  .object({
    displayName: nonEmptyString,
    status: z.enum(PERSONA_STATUSES).catch('idle'),
    updatedAt: nonEmptyString,
    message: z.string().catch(''),
    inputReady: z.boolean().catch(false),
    paneId: z.string().catch(''),
  })
  .catch({ status: 'idle', message: '', inputReady: false, paneId: '' });

const SessionDocumentSchema = z
  .object({
    createdAt: nonEmptyString,
    personas: z.record(z.unknown()).catch({}),
  })
  .catch({ personas: {} });

export function utcNowIso(): string {
  return new Date().toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function isPersonaKey(value: unknown): value is PersonaKey {
  return PERSONA_KEYS.some((key) => key === value);
}

export function isPersonaStatus(value: unknown): value is PersonaStatus {
  return PERSONA_STATUSES.some((status) => status === value);
}

export function canTransition(from: PersonaStatus, to: PersonaStatus): boolean {
  return from === to || STATUS_TRANSITIONS[from].includes(to);
}

/** Build a full persona map; listing the keys keeps it exhaustive at compile time. */
export function mapPersonas<T>(fn: (persona: PersonaKey) => T): Record<PersonaKey, T> {
  return { pm: fn('pm'), impl: fn('impl'), review: fn('review'), docs: fn('docs') };
}

function freshPersona(persona: PersonaKey, now: string): PersonaRecord {
  return {
    displayName: PERSONA_NAMES[persona],
    status: 'idle',
    updatedAt: now,
    message: '',
    inputReady: false,
    paneId: '',
  };
}

export function initSessionState(repoRoot: string): SessionState {
  const now = utcNowIso();
  return {
    version: CURRENT_SESSION_VERSION,
    sessionName: SESSION_NAME,
    repoRoot,
    createdAt: now,
    personas: mapPersonas((key) => freshPersona(key, now)),
  };
}

function isEmptyDocument(data: unknown): boolean {
  if (data === null || typeof data !== 'object' || Array.isArray(data)) {
    return true;
  }
  return Object.keys(data).length === 0;
}

/**
 * Migrate any older or damaged document to the current version.
 * Idempotent: normalizing a normalized document returns an equal document.
 */
export function normalizeSessionState(repoRoot: string, data: unknown): SessionState {
  if (isEmptyDocument(data)) {
    return initSessionState(repoRoot);
  }

  const now = utcNowIso();
  const doc = SessionDocumentSchema.parse(data);
  const personas = mapPersonas((key): PersonaRecord => {
    const existing = PersonaRecordSchema.parse(doc.personas[key]);
    return {
      displayName: existing.displayName ?? PERSONA_NAMES[key],
      status: existing.status,
      updatedAt: existing.updatedAt ?? now,
      message: existing.message,
      inputReady: existing.inputReady,
      paneId: existing.paneId,
    };
  });

  return {
    version: CURRENT_SESSION_VERSION,
    sessionName: SESSION_NAME,
    repoRoot,
    createdAt: doc.createdAt ?? now,
    personas,
  };
}

/**
 * Apply a status change to one persona in place.
 * `force` skips the transition table (operator overrides via set-status).
 */
export function applyStatus(
  state: SessionState,
  persona: PersonaKey,
  status: PersonaStatus,
  options: { force?: boolean; message?: string } = {},
): void {
  const record = state.personas[persona];
  if (!options.force && !canTransition(record.status, status)) {
    throw new InvalidTransitionError(persona, record.status, status);
  }
  record.status = status;
  record.updatedAt = utcNowIso();
  if (options.message !== undefined) {
    record.message = options.message;
  }
}

function sortKeys(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  const entries: [string, unknown][] = Object.entries(value);
  entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return Object.fromEntries(entries);
}

/** Pretty-printed JSON with sorted keys and a trailing newline. */
export function serializeState(data: unknown): string {
  return `${JSON.stringify(data, sortKeys, 2)}\n`;
}
