/**
 * Crew Relay - Broker Wire Protocol
 *
 * One UTF-8 JSON object per line, one request per connection.
 */

import { z } from 'zod';
import { PERSONA_KEYS } from './constants';

export const BROKER_ERROR_CODES = ['invalid_json', 'invalid_request', 'unknown_kind', 'empty_prompt'] as const;

export const PromptRequestSchema = z.object({
  kind: z.literal('prompt'),
  prompt: z.unknown(),
  persona: z.enum(PERSONA_KEYS).optional(),
  requestId: z.string().min(1).optional(),
});

export type BrokerRequest =
  | { kind: 'ping' }
  | { kind: 'info' }
  | { kind: 'prompt'; prompt: string; persona?: (typeof PERSONA_KEYS)[number]; requestId?: string };

export const BrokerResponseSchema = z.union([
  z.object({ ok: z.literal(false), error: z.enum(BROKER_ERROR_CODES) }),
  z.object({ ok: z.literal(true), kind: z.literal('pong') }),
  z.object({ ok: z.literal(true), kind: z.literal('info'), repoRoot: z.string(), assistantConfigDir: z.string() }),
  z.object({ ok: z.literal(true), exitCode: z.number().int(), output: z.string(), responseId: z.string().optional() }),
]);

export type BrokerResponse = z.infer<typeof BrokerResponseSchema>;
export type BrokerErrorCode = (typeof BROKER_ERROR_CODES)[number];

export function encodeMessage(message: BrokerRequest | BrokerResponse): string {
  return `${JSON.stringify(message)}\n`;
}
