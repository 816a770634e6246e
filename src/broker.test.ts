import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { AssistantInvocation, AssistantResult, AssistantRunner } from './assistant';
import { Broker } from './broker';
import { brokerInfo, exchangeLine, pingBroker, sendBrokerRequest, submitPrompt } from './client';
import { BrokerAlreadyRunningError, ProtocolError } from './errors';
import { silentLogger, type Logger } from './logger';
import { brokerIdentityPath, brokerPidPath, brokerSocketPath } from './paths';
import { pollUntil, sleep } from './poll';
import { ResponseArtifacts } from './responses';

const NO_SESSION = 'Error: No session to continue.\n';

/** Scripted stand-in for the assistant CLI; records every call and the peak concurrency. */
class FakeRunner implements AssistantRunner {
  calls: AssistantInvocation[] = [];
  active = 0;
  maxActive = 0;

  constructor(
    private respond: (invocation: AssistantInvocation, call: number) => AssistantResult,
    private delayMs = 0,
  ) {}

  async run(invocation: AssistantInvocation): Promise<AssistantResult> {
    const call = this.calls.length;
    this.calls.push(invocation);
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      if (this.delayMs > 0) {
        await sleep(this.delayMs);
      }
      return this.respond(invocation, call);
    } finally {
      this.active--;
    }
  }
}

const echo = (invocation: AssistantInvocation): AssistantResult => ({
  exitCode: 0,
  output: `echo: ${invocation.prompt}\n`,
});

describe('Broker', () => {
  let dir: string;
  let socketPath: string;
  let brokers: Broker[];

  const startBroker = async (runner: AssistantRunner): Promise<Broker> => {
    const broker = new Broker({
      socketPath,
      repoRoot: '/repo',
      assistantConfigDir: path.join(dir, 'assistant'),
      sharedDir: dir,
      runner,
      logger: silentLogger,
    });
    await broker.start();
    brokers.push(broker);
    return broker;
  };

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'crew-relay-broker-'));
    socketPath = brokerSocketPath(dir);
    brokers = [];
  });

  afterEach(async () => {
    await Promise.all(brokers.map((broker) => broker.stop()));
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  describe('transport', () => {
    it('should answer ping and info', async () => {
      await startBroker(new FakeRunner(echo));
      expect(await pingBroker(socketPath)).toBe(true);
      expect(await sendBrokerRequest(socketPath, { kind: 'ping' })).toEqual({ ok: true, kind: 'pong' });
      expect(await brokerInfo(socketPath)).toEqual({ repoRoot: '/repo', assistantConfigDir: path.join(dir, 'assistant') });
    });

    it('should report ping false when nothing listens', async () => {
      const started = Date.now();
      expect(await pingBroker(path.join(dir, 'missing.sock'), 200)).toBe(false);
      expect(Date.now() - started).toBeLessThan(1000);
      expect(await brokerInfo(path.join(dir, 'missing.sock'))).toBeUndefined();
    });

    it('should reply with an error code to invalid JSON', async () => {
      await startBroker(new FakeRunner(echo));
      expect(await exchangeLine(socketPath, 'not json', 1000)).toBe('{"ok":false,"error":"invalid_json"}');
    });

    it('should write pid and identity files and remove them on stop', async () => {
      const broker = await startBroker(new FakeRunner(echo));
      expect(await fs.promises.readFile(brokerPidPath(dir), 'utf-8')).toBe(`${process.pid}\n`);
      const identity: unknown = JSON.parse(await fs.promises.readFile(brokerIdentityPath(dir), 'utf-8'));
      expect(identity).toMatchObject({ pid: process.pid, socketPath, repoRoot: '/repo' });

      await broker.stop();
      expect(fs.existsSync(socketPath)).toBe(false);
      expect(fs.existsSync(brokerPidPath(dir))).toBe(false);
      expect(fs.existsSync(brokerIdentityPath(dir))).toBe(false);
    });

    it('should refuse to start while another broker answers', async () => {
      await startBroker(new FakeRunner(echo));
      const second = new Broker({
        socketPath,
        repoRoot: '/repo',
        assistantConfigDir: path.join(dir, 'assistant'),
        sharedDir: dir,
        runner: new FakeRunner(echo),
        logger: silentLogger,
      });
      await expect(second.start()).rejects.toThrow(BrokerAlreadyRunningError);
      expect(await pingBroker(socketPath)).toBe(true);
    });

    it('should replace a stale socket path', async () => {
      await fs.promises.writeFile(socketPath, 'left over', 'utf-8');
      await startBroker(new FakeRunner(echo));
      expect(await pingBroker(socketPath)).toBe(true);
    });
  });

  describe('request validation', () => {
    let broker: Broker;

    beforeEach(() => {
      broker = new Broker({
        socketPath,
        repoRoot: '/repo',
        assistantConfigDir: path.join(dir, 'assistant'),
        sharedDir: dir,
        runner: new FakeRunner(echo),
        logger: silentLogger,
      });
    });

    it('should map bad requests to error codes', async () => {
      expect(await broker.handleRequest('{')).toEqual({ ok: false, error: 'invalid_json' });
      expect(await broker.handleRequest('[]')).toEqual({ ok: false, error: 'invalid_request' });
      expect(await broker.handleRequest('null')).toEqual({ ok: false, error: 'invalid_request' });
      expect(await broker.handleRequest('{"kind":"shutdown"}')).toEqual({ ok: false, error: 'unknown_kind' });
      expect(await broker.handleRequest('{}')).toEqual({ ok: false, error: 'unknown_kind' });
      expect(await broker.handleRequest('{"kind":"prompt","prompt":"   "}')).toEqual({ ok: false, error: 'empty_prompt' });
      expect(await broker.handleRequest('{"kind":"prompt"}')).toEqual({ ok: false, error: 'empty_prompt' });
      expect(await broker.handleRequest('{"kind":"prompt","prompt":3}')).toEqual({ ok: false, error: 'empty_prompt' });
      expect(await broker.handleRequest('{"kind":"prompt","prompt":"hi","persona":"qa"}')).toEqual({
        ok: false,
        error: 'invalid_request',
      });
    });

    it('should surface broker errors to the client as ProtocolError', async () => {
      await startBroker(new FakeRunner(echo));
      await expect(submitPrompt(socketPath, { prompt: '  ' })).rejects.toThrow(ProtocolError);
      await expect(submitPrompt(socketPath, { prompt: '  ' })).rejects.toThrow('Broker error: empty_prompt');
    });
  });

  describe('invocation', () => {
    it('should run at most one assistant invocation at a time', async () => {
      const runner = new FakeRunner(echo, 30);
      await startBroker(runner);

      const results = await Promise.all(
        [1, 2, 3, 4, 5].map((n) => submitPrompt(socketPath, { prompt: `prompt ${n}` })),
      );

      expect(runner.maxActive).toBe(1);
      expect(runner.calls).toHaveLength(5);
      expect(results.map((r) => r.exitCode)).toEqual([0, 0, 0, 0, 0]);
      expect(results[2].output).toBe('echo: prompt 3\n');
    });

    it('should answer ping while a prompt is running', async () => {
      const runner = new FakeRunner(echo, 300);
      await startBroker(runner);

      const prompt = submitPrompt(socketPath, { prompt: 'slow' });
      expect(await pollUntil(() => runner.active === 1, { timeoutMs: 2000, pollMs: 5 })).toBe(true);

      expect(await pingBroker(socketPath, 200)).toBe(true);
      expect(runner.active).toBe(1);
      expect((await prompt).output).toBe('echo: slow\n');
    });

    it('should finish the running invocation before shutting down', async () => {
      const runner = new FakeRunner(echo, 200);
      const broker = await startBroker(runner);

      const prompt = submitPrompt(socketPath, { prompt: 'last words' });
      expect(await pollUntil(() => runner.active === 1, { timeoutMs: 2000, pollMs: 5 })).toBe(true);
      await broker.stop();

      expect(runner.active).toBe(0);
      expect(await prompt).toEqual({ exitCode: 0, output: 'echo: last words\n', responseId: undefined });
      expect(fs.existsSync(socketPath)).toBe(false);
    });

    it('should log when a prompt has to queue', async () => {
      const debug: string[] = [];
      const logger: Logger = { ...silentLogger, debug: (message) => debug.push(message) };
      const runner = new FakeRunner(echo, 100);
      const broker = new Broker({
        socketPath,
        repoRoot: '/repo',
        assistantConfigDir: path.join(dir, 'assistant'),
        sharedDir: dir,
        runner,
        logger,
      });
      brokers.push(broker);
      await broker.start();

      const first = submitPrompt(socketPath, { prompt: 'first' });
      await pollUntil(() => runner.active === 1, { timeoutMs: 2000, pollMs: 5 });
      await submitPrompt(socketPath, { prompt: 'second' });
      await first;

      expect(debug.filter((message) => message.startsWith('Prompt queued'))).toEqual([
        'Prompt queued behind the running invocation',
      ]);
    });

    it('should continue the conversation after the first success', async () => {
      const runner = new FakeRunner(echo);
      const broker = await startBroker(runner);
      expect(broker.hasContinuation()).toBe(false);

      await submitPrompt(socketPath, { prompt: 'one' });
      expect(broker.hasContinuation()).toBe(true);
      await submitPrompt(socketPath, { prompt: 'two' });

      expect(runner.calls.map((c) => c.continueSession)).toEqual([false, true]);
      expect(runner.calls[1]).toEqual({
        prompt: 'two',
        continueSession: true,
        repoRoot: '/repo',
        configDir: path.join(dir, 'assistant'),
      });
    });

    it('should not set the flag on failure', async () => {
      const runner = new FakeRunner(() => ({ exitCode: 2, output: 'boom\n' }));
      const broker = await startBroker(runner);
      const result = await submitPrompt(socketPath, { prompt: 'one' });
      expect(result).toEqual({ exitCode: 2, output: 'boom\n', responseId: undefined });
      expect(broker.hasContinuation()).toBe(false);
    });

    it('should retry once without continuation when there is no session to continue', async () => {
      const runner = new FakeRunner((invocation, call) => {
        if (call === 1) return { exitCode: 1, output: NO_SESSION };
        return echo(invocation);
      });
      const broker = await startBroker(runner);

      await submitPrompt(socketPath, { prompt: 'one' });
      const result = await submitPrompt(socketPath, { prompt: 'two' });

      expect(runner.calls.map((c) => c.continueSession)).toEqual([false, true, false]);
      expect(result.exitCode).toBe(0);
      expect(result.output).toBe('echo: two\n');
      expect(broker.hasContinuation()).toBe(true);
    });

    it('should stop after a single retry and clear the flag', async () => {
      const runner = new FakeRunner((invocation, call) => {
        if (call === 0) return echo(invocation);
        return { exitCode: 1, output: NO_SESSION };
      });
      const broker = await startBroker(runner);

      await submitPrompt(socketPath, { prompt: 'one' });
      const result = await submitPrompt(socketPath, { prompt: 'two' });

      expect(runner.calls).toHaveLength(3);
      expect(result).toEqual({ exitCode: 1, output: NO_SESSION, responseId: undefined });
      expect(broker.hasContinuation()).toBe(false);
    });

    it('should not retry failures that are not about the session', async () => {
      const runner = new FakeRunner((invocation, call) => {
        if (call === 1) return { exitCode: 1, output: 'rate limited\n' };
        return echo(invocation);
      });
      const broker = await startBroker(runner);

      await submitPrompt(socketPath, { prompt: 'one' });
      const result = await submitPrompt(socketPath, { prompt: 'two' });

      expect(runner.calls).toHaveLength(2);
      expect(result.exitCode).toBe(1);
      expect(broker.hasContinuation()).toBe(true);
    });
  });

  describe('response artifacts', () => {
    it('should record a successful persona response under the request id', async () => {
      await startBroker(new FakeRunner(echo));
      const result = await submitPrompt(socketPath, { prompt: '[impl] fix it', persona: 'impl', requestId: 'req-7' });

      expect(result.responseId).toBe('req-7');
      const artifacts = new ResponseArtifacts(dir, silentLogger);
      expect(await artifacts.readId('impl')).toBe('req-7');
      expect(await artifacts.readBody('impl')).toBe('echo: [impl] fix it\n');
    });

    it('should generate an id when the request has none', async () => {
      await startBroker(new FakeRunner(echo));
      const result = await submitPrompt(socketPath, { prompt: 'hello', persona: 'pm' });

      expect(result.responseId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
      expect(await new ResponseArtifacts(dir, silentLogger).readId('pm')).toBe(result.responseId);
    });

    it('should leave artifacts alone without a persona or on failure', async () => {
      const runner = new FakeRunner((invocation) =>
        invocation.prompt === 'bad' ? { exitCode: 1, output: 'nope' } : echo(invocation),
      );
      await startBroker(runner);
      await submitPrompt(socketPath, { prompt: 'anonymous' });
      await submitPrompt(socketPath, { prompt: 'bad', persona: 'docs' });

      expect(fs.existsSync(path.join(dir, 'responses'))).toBe(false);
    });
  });
});
