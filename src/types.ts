/**
 * Crew Relay - Type Definitions
 */

import type { PERSONA_KEYS, PERSONA_STATUSES } from './constants';

export type PersonaKey = (typeof PERSONA_KEYS)[number];
export type PersonaStatus = (typeof PERSONA_STATUSES)[number];

export interface PersonaRecord {
  displayName: string;
  status: PersonaStatus;
  updatedAt: string;      // ISO timestamp of the last change
  message: string;        // Free-text annotation
  inputReady: boolean;    // True only while the persona's client waits on input
  paneId: string;         // Opaque locator owned by the multiplexer
}

export interface SessionState {
  version: number;
  sessionName: string;
  repoRoot: string;
  createdAt: string;
  personas: Record<PersonaKey, PersonaRecord>;
}

export interface ResponseSnapshot {
  id: string;             // '' when no artifact exists yet
  mtimeMs: number | null;
}

export interface PromptResult {
  exitCode: number;
  output: string;
  responseId?: string;
}

export interface BrokerIdentity {
  pid: number;
  socketPath: string;
  repoRoot: string;
  assistantConfigDir: string;
  startedAt: string;
}

// Scheduler

export interface AgentRequest {
  index: number;
  persona: PersonaKey;
  segment: string;        // Raw segment text, context markers kept
  deps: Set<PersonaKey>;  // Personas whose context the segment embeds
  deadline: number;       // Epoch ms
}

export type DispatchOutcome = 'completed' | 'failed' | 'timed_out';

export interface DispatchReport {
  index: number;
  persona: PersonaKey;
  outcome: DispatchOutcome;
  detail?: string;
}

// Configuration

export interface RelayConfig {
  repoRoot: string;
  sharedDir: string;             // <repoRoot>/.crew-relay
  assistantCommand: string;      // Executable of the external assistant
  assistantConfigDir: string;
  pollMs: number;
  timeoutMs: number;             // Per-wait bound for dispatch and ask
  contextMaxChars: number;
  brokerStartTimeoutMs: number;
}
