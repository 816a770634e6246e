/**
 * Crew Relay - Broker Client
 */

import * as net from 'net';
import { INFO_TIMEOUT_MS, PING_TIMEOUT_MS } from './constants';
import { errorMessage, ProtocolError, TimeoutError, TransportError } from './errors';
import { BrokerResponseSchema, encodeMessage, type BrokerRequest, type BrokerResponse } from './protocol';
import type { PersonaKey, PromptResult } from './types';

/**
 * Send one line, return the first reply line.
 * No timeout when `timeoutMs` is undefined: prompt replies take as long as the assistant does.
 */
export function exchangeLine(socketPath: string, line: string, timeoutMs?: number): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const socket = net.connect(socketPath);
    let buffer = '';
    let done = false;

    const finish = (error: Error | undefined, reply?: string) => {
      if (done) return;
      done = true;
      if (timer) clearTimeout(timer);
      socket.destroy();
      if (error) {
        reject(error);
      } else {
        resolve(reply ?? '');
      }
    };

    const timer =
      timeoutMs === undefined
        ? undefined
        : setTimeout(() => finish(new TimeoutError(`broker reply on ${socketPath}`)), timeoutMs);

    socket.setEncoding('utf8');

    socket.on('connect', () => {
      socket.write(line.endsWith('\n') ? line : `${line}\n`);
    });

    socket.on('data', (chunk: string) => {
      buffer += chunk;
      const index = buffer.indexOf('\n');
      if (index >= 0) {
        finish(undefined, buffer.slice(0, index));
      }
    });

    socket.on('end', () => {
      if (buffer) {
        finish(undefined, buffer);
      } else {
        finish(new TransportError(`Broker at ${socketPath} closed the connection without replying`));
      }
    });

    socket.on('error', (err) => {
      finish(new TransportError(`Broker connection failed: ${err.message}`, { cause: err }));
    });
  });
}

export async function sendBrokerRequest(
  socketPath: string,
  request: BrokerRequest,
  options: { timeoutMs?: number } = {},
): Promise<BrokerResponse> {
  const reply = await exchangeLine(socketPath, encodeMessage(request), options.timeoutMs);
  let parsed: unknown;
  try {
    parsed = JSON.parse(reply);
  } catch (error) {
    throw new ProtocolError(`Broker returned invalid JSON: ${errorMessage(error)}`);
  }
  const result = BrokerResponseSchema.safeParse(parsed);
  if (!result.success) {
    throw new ProtocolError(`Broker returned an unexpected reply: ${reply}`);
  }
  return result.data;
}

/** Liveness probe. Never throws: any failure reads as "not running". */
export async function pingBroker(socketPath: string, timeoutMs: number = PING_TIMEOUT_MS): Promise<boolean> {
  try {
    const reply = await exchangeLine(socketPath, encodeMessage({ kind: 'ping' }), timeoutMs);
    return reply.includes('pong');
  } catch {
    return false;
  }
}

export interface BrokerInfo {
  repoRoot: string;
  assistantConfigDir: string;
}

/** Identity of the running broker, or undefined when it cannot be asked. */
export async function brokerInfo(socketPath: string, timeoutMs: number = INFO_TIMEOUT_MS): Promise<BrokerInfo | undefined> {
  let response: BrokerResponse;
  try {
    response = await sendBrokerRequest(socketPath, { kind: 'info' }, { timeoutMs });
  } catch (error) {
    if (error instanceof TransportError || error instanceof TimeoutError || error instanceof ProtocolError) {
      return undefined;
    }
    throw error;
  }
  if (response.ok && 'kind' in response && response.kind === 'info') {
    return { repoRoot: response.repoRoot, assistantConfigDir: response.assistantConfigDir };
  }
  return undefined;
}

export interface PromptSubmission {
  prompt: string;
  persona?: PersonaKey;
  requestId?: string;
}

export async function submitPrompt(
  socketPath: string,
  submission: PromptSubmission,
  options: { timeoutMs?: number } = {},
): Promise<PromptResult> {
  const response = await sendBrokerRequest(socketPath, { kind: 'prompt', ...submission }, options);
  if (!response.ok) {
    throw new ProtocolError(`Broker error: ${response.error}`);
  }
  if ('exitCode' in response) {
    return { exitCode: response.exitCode, output: response.output, responseId: response.responseId };
  }
  throw new ProtocolError(`Broker answered a prompt with '${response.kind}'`);
}
