/**
 * Crew Relay - Prompt Markers
 *
 * `{{agent:p}}` / `{{agent.p}}` starts a segment directed at persona p.
 * `{{ctx:p}}` (alias `{{last:p}}`) embeds p's last response.
 */

import { DEFAULT_CONTEXT_MAX_CHARS } from './constants';
import { MarkerSyntaxError, UnknownPersonaError } from './errors';
import type { ResponseArtifacts } from './responses';
import { isPersonaKey } from './state';
import type { PersonaKey } from './types';

export type MarkerToken =
  | { type: 'text'; text: string }
  | { type: 'directive'; persona: PersonaKey; raw: string }
  | { type: 'context'; persona: PersonaKey; raw: string };

export interface DirectedSegment {
  persona: PersonaKey;
  text: string;           // Trimmed, context markers left in place
}

export interface ParsedLine {
  head: string;           // Text before the first directive, for the issuing persona
  segments: DirectedSegment[];
}

const OPENING = /\{\{(agent|ctx|last)/g;
const MARKER = /\{\{(agent|ctx|last)[:.]([A-Za-z0-9_-]+)\}\}/y;

/**
 * Split `text` into text, directive and context tokens.
 * Throws on the first malformed marker or unknown persona, so nothing is
 * acted on unless the whole line is valid.
 */
export function tokenize(text: string): MarkerToken[] {
  const tokens: MarkerToken[] = [];
  let cursor = 0;

  for (;;) {
    OPENING.lastIndex = cursor;
    const opening = OPENING.exec(text);
    if (!opening) break;

    if (opening.index > cursor) {
      tokens.push({ type: 'text', text: text.slice(cursor, opening.index) });
    }

    const kind = opening[1];
    MARKER.lastIndex = opening.index;
    const match = MARKER.exec(text);
    if (!match) {
      throw new MarkerSyntaxError(kind);
    }

    const persona = match[2];
    if (!isPersonaKey(persona)) {
      throw new UnknownPersonaError(persona, kind);
    }

    tokens.push(
      kind === 'agent'
        ? { type: 'directive', persona, raw: match[0] }
        : { type: 'context', persona, raw: match[0] },
    );
    cursor = MARKER.lastIndex;
  }

  if (cursor < text.length) {
    tokens.push({ type: 'text', text: text.slice(cursor) });
  }
  return tokens;
}

function renderRaw(tokens: MarkerToken[]): string {
  return tokens.map((token) => (token.type === 'text' ? token.text : token.raw)).join('');
}

export function parseLine(line: string): ParsedLine {
  const tokens = tokenize(line);
  const first = tokens.findIndex((token) => token.type === 'directive');
  if (first < 0) {
    return { head: renderRaw(tokens).trim(), segments: [] };
  }

  const segments: DirectedSegment[] = [];
  let current: { persona: PersonaKey; tokens: MarkerToken[] } | undefined;
  const flush = () => {
    if (!current) return;
    const text = renderRaw(current.tokens).trim();
    if (text) {
      segments.push({ persona: current.persona, text });
    }
  };

  for (const token of tokens.slice(first)) {
    if (token.type === 'directive') {
      flush();
      current = { persona: token.persona, tokens: [] };
    } else {
      current?.tokens.push(token);
    }
  }
  flush();

  return { head: renderRaw(tokens.slice(0, first)).trim(), segments };
}

/** Personas whose last response `text` embeds. */
export function contextDependencies(text: string): Set<PersonaKey> {
  const deps = new Set<PersonaKey>();
  for (const token of tokenize(text)) {
    if (token.type === 'context') {
      deps.add(token.persona);
    }
  }
  return deps;
}

export function formatContextBlock(persona: PersonaKey, body: string): string {
  return `\n\n--- begin ${persona} last response ---\n${body}\n--- end ${persona} last response ---\n\n`;
}

/** Replace every context marker with the referenced persona's last response. */
export async function expandContext(
  text: string,
  artifacts: ResponseArtifacts,
  maxChars: number = DEFAULT_CONTEXT_MAX_CHARS,
): Promise<string> {
  const parts = await Promise.all(
    tokenize(text).map(async (token) => {
      if (token.type !== 'context') {
        return token.type === 'text' ? token.text : token.raw;
      }
      return formatContextBlock(token.persona, await artifacts.readForContext(token.persona, maxChars));
    }),
  );
  return parts.join('');
}
