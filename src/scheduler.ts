/**
 * Crew Relay - Directed Segment Scheduler
 *
 * Dispatches the `{{agent:p}}` segments of one input line. Segments for the
 * issuing persona go straight to the broker; segments for other personas are
 * typed into their panes and count as finished when that persona's response
 * artifact changes. No state is shared with other processes except through
 * the session store and the artifacts.
 */

import type { PromptSubmission } from './client';
import { DEFAULT_CONTEXT_MAX_CHARS } from './constants';
import { errorMessage, RelayError } from './errors';
import { createLogger, type Logger } from './logger';
import { contextDependencies, expandContext, type DirectedSegment } from './markers';
import { sleep } from './poll';
import type { ResponseArtifacts } from './responses';
import type { SessionStore } from './store';
import type { InputSurface } from './surface';
import type {
  AgentRequest,
  DispatchOutcome,
  DispatchReport,
  PersonaKey,
  PromptResult,
  ResponseSnapshot,
} from './types';

export interface SchedulerOptions {
  origin: PersonaKey;
  store: SessionStore;
  artifacts: ResponseArtifacts;
  surface: InputSurface;
  submit: (submission: PromptSubmission) => Promise<PromptResult>;
  timeoutMs: number;
  pollMs: number;
  contextMaxChars?: number;
  logger?: Logger;
  onOutput?: (output: string) => void;
}

interface ActivePeer {
  request: AgentRequest;
  since: ResponseSnapshot;
}

/** Claimed peer segment whose pane has not reported input ready yet. */
interface ReadyWait {
  request: AgentRequest;
  paneId: string;
}

type SegmentResult = { outcome: DispatchOutcome; detail?: string };

export function buildRequests(segments: DirectedSegment[], deadline: number): AgentRequest[] {
  return segments.map((segment, index) => ({
    index,
    persona: segment.persona,
    segment: segment.text,
    deps: contextDependencies(segment.text),
    deadline,
  }));
}

export function formatPrompt(persona: PersonaKey, text: string): string {
  return `[${persona}] ${text}`;
}

export class Scheduler {
  private logger: Logger;

  constructor(private options: SchedulerOptions) {
    this.logger = options.logger ?? createLogger(options.origin);
  }

  /**
   * Run every segment to completion, failure or deadline; one report per segment, in index order.
   * Nothing in the loop blocks on a single peer: readiness and responses are both polled.
   */
  async dispatch(segments: DirectedSegment[]): Promise<DispatchReport[]> {
    const { store, artifacts, origin } = this.options;
    const pending = buildRequests(segments, Date.now() + this.options.timeoutMs);
    const awaitingReady = new Map<PersonaKey, ReadyWait>();
    const active = new Map<PersonaKey, ActivePeer>();
    const reports: DispatchReport[] = [];

    const report = (request: AgentRequest, outcome: DispatchOutcome, detail?: string) => {
      if (outcome !== 'completed' && detail) {
        this.logger.error(detail);
      }
      reports.push({ index: request.index, persona: request.persona, outcome, detail });
    };

    const isBusy = (persona: PersonaKey) => active.has(persona) || awaitingReady.has(persona);

    const isBlocked = (request: AgentRequest): boolean => {
      for (const other of pending) {
        if (other.index >= request.index) continue;
        if (other.persona === request.persona || request.deps.has(other.persona)) {
          return true;
        }
      }
      for (const dep of request.deps) {
        if (isBusy(dep)) return true;
      }
      return false;
    };

    while (pending.length > 0 || awaitingReady.size > 0 || active.size > 0) {
      const now = Date.now();

      for (const request of [...pending]) {
        if (now >= request.deadline) {
          pending.splice(pending.indexOf(request), 1);
          report(request, 'timed_out', `Timed out waiting to start ${request.persona} request`);
        }
      }

      for (const [persona, wait] of [...awaitingReady]) {
        if (now >= wait.request.deadline) {
          awaitingReady.delete(persona);
          report(wait.request, 'timed_out', `Timed out waiting for ${persona} input ready`);
        }
      }

      for (const [persona, peer] of [...active]) {
        if (now >= peer.request.deadline) {
          active.delete(persona);
          report(peer.request, 'timed_out', `Timed out waiting for ${persona} response`);
        } else if (await artifacts.hasChanged(persona, peer.since)) {
          active.delete(persona);
          report(peer.request, 'completed');
        }
      }

      let progressed = false;
      for (const request of [...pending]) {
        if (isBusy(request.persona) || isBlocked(request)) continue;
        pending.splice(pending.indexOf(request), 1);
        progressed = true;

        if (request.persona === origin) {
          const result = await this.runOwn(request);
          report(request, result.outcome, result.detail);
          continue;
        }

        const paneId = (await store.read()).personas[request.persona].paneId;
        if (!paneId) {
          report(request, 'failed', `No pane found for persona '${request.persona}'`);
          continue;
        }
        awaitingReady.set(request.persona, { request, paneId });
      }

      if (awaitingReady.size > 0) {
        const state = await store.read();
        for (const [persona, wait] of [...awaitingReady]) {
          if (!state.personas[persona].inputReady) continue;
          awaitingReady.delete(persona);
          progressed = true;

          const failure = await this.injectPeer(wait, active);
          if (failure) {
            report(wait.request, failure.outcome, failure.detail);
          }
        }
      }

      if (!progressed && (pending.length > 0 || awaitingReady.size > 0 || active.size > 0)) {
        await sleep(this.options.pollMs);
      }
    }

    return reports.sort((a, b) => a.index - b.index);
  }

  private async runOwn(request: AgentRequest): Promise<SegmentResult> {
    const { artifacts, origin } = this.options;
    try {
      const text = (await expandContext(request.segment, artifacts, this.contextMaxChars())).trim();
      if (!text) {
        return { outcome: 'completed' };
      }
      const result = await this.options.submit({ prompt: formatPrompt(origin, text), persona: origin });
      if (result.output) {
        this.options.onOutput?.(result.output);
      }
      if (result.exitCode !== 0) {
        return { outcome: 'failed', detail: `Assistant exited with code ${result.exitCode}` };
      }
      return { outcome: 'completed' };
    } catch (error) {
      if (error instanceof RelayError) {
        return { outcome: 'failed', detail: `Broker error: ${error.message}` };
      }
      throw error;
    }
  }

  /** Type the raw segment into a ready peer's pane; undefined means the peer is now active. */
  private async injectPeer(wait: ReadyWait, active: Map<PersonaKey, ActivePeer>): Promise<SegmentResult | undefined> {
    const { request, paneId } = wait;
    const persona = request.persona;

    const since = await this.options.artifacts.snapshot(persona);
    try {
      await this.options.surface.sendText(paneId, request.segment);
    } catch (error) {
      if (error instanceof RelayError) {
        return { outcome: 'failed', detail: errorMessage(error) };
      }
      throw error;
    }

    this.logger.debug(`Sent segment ${request.index} to ${persona} (${paneId})`);
    active.set(persona, { request, since });
    return undefined;
  }

  private contextMaxChars(): number {
    return this.options.contextMaxChars ?? DEFAULT_CONTEXT_MAX_CHARS;
  }
}
