#!/usr/bin/env node
/**
 * Crew Relay - CLI Entry
 *
 * Multi-persona coordination around one shared assistant session
 */

import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { SpawnAssistantRunner } from './assistant';
import { Broker, runBrokerUntilSignal } from './broker';
import {
  ask,
  collectStatus,
  createContext,
  ensureBroker,
  initSession,
  parsePersona,
  parseSeconds,
  parseStatus,
  setStatus,
  showStatus,
  stopBroker,
  waitForStatus,
  type CommandContext,
} from './commands';
import { applyOverrides, loadConfig } from './config';
import { AGENT_CALL_ENV, PERSONA_ENV } from './constants';
import { errorMessage } from './errors';
import { createLogger } from './logger';
import { PersonaClient } from './pane';
import { brokerSocketPath } from './paths';
import { createSurface, parseSurfaceKind } from './surface';
import type { PersonaKey, PersonaStatus, RelayConfig } from './types';

interface GlobalOptions {
  dir: string;
  config?: string;
  quiet?: boolean;
  verbose?: boolean;
}

const program = new Command();

program
  .name('crew-relay')
  .description('Multi-persona coordination - several panes, one assistant session')
  .version('0.1.0')
  .option('-d, --dir <path>', 'Repository root (default: current directory)', process.cwd())
  .option('-c, --config <path>', 'Config file path (default: .crew-relay/config.json)')
  .option('-q, --quiet', 'Quiet mode')
  .option('-v, --verbose', 'Debug logging');

async function resolveConfig(overrides: { assistant?: string; assistantConfigDir?: string } = {}): Promise<RelayConfig> {
  const options = program.opts<GlobalOptions>();
  const repoRoot = path.resolve(options.dir);

  // Ensure working directory exists
  if (!fs.existsSync(repoRoot)) {
    throw new Error(`Repository root does not exist: ${repoRoot}`);
  }

  const config = await loadConfig(repoRoot, { configPath: options.config });
  return applyOverrides(config, {
    assistantCommand: overrides.assistant,
    assistantConfigDir: overrides.assistantConfigDir,
  });
}

function contextFor(config: RelayConfig, scope: string): CommandContext {
  const { quiet, verbose } = program.opts<GlobalOptions>();
  return createContext(config, { logger: createLogger(scope, { quiet, verbose }) });
}

/** Run an action; any failure prints `Error: ...` and sets a non-zero exit code. */
function guarded<A extends unknown[]>(action: (...args: A) => Promise<number | void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      const code = await action(...args);
      if (typeof code === 'number' && code !== 0) {
        process.exitCode = code;
      }
    } catch (error) {
      console.error(`Error: ${errorMessage(error)}`);
      process.exitCode = 1;
    }
  };
}

program
  .command('init')
  .description('Create the shared directory and session state')
  .action(
    guarded(async () => {
      await initSession(contextFor(await resolveConfig(), 'init'));
    }),
  );

program
  .command('broker')
  .description('Run the broker in the foreground')
  .option('--assistant <command>', 'Assistant executable')
  .option('--assistant-config-dir <dir>', 'Assistant config directory')
  .action(
    guarded(async (opts: { assistant?: string; assistantConfigDir?: string }) => {
      const config = await resolveConfig(opts);
      const { quiet, verbose } = program.opts<GlobalOptions>();
      // Nested crew-relay calls made by the assistant must not fan out again
      const runner = new SpawnAssistantRunner(config.assistantCommand, { ...process.env, [AGENT_CALL_ENV]: '1' });
      const broker = new Broker({
        socketPath: brokerSocketPath(config.sharedDir),
        repoRoot: config.repoRoot,
        assistantConfigDir: config.assistantConfigDir,
        sharedDir: config.sharedDir,
        runner,
        logger: createLogger('broker', { quiet, verbose }),
      });
      await runBrokerUntilSignal(broker);
    }),
  );

program
  .command('start-broker')
  .description('Start a detached broker unless one already serves this configuration')
  .option('--assistant <command>', 'Assistant executable')
  .option('--assistant-config-dir <dir>', 'Assistant config directory')
  .action(
    guarded(async (opts: { assistant?: string; assistantConfigDir?: string }) => {
      await ensureBroker(contextFor(await resolveConfig(opts), 'broker'));
    }),
  );

program
  .command('stop')
  .description('Stop the broker')
  .action(
    guarded(async () => {
      await stopBroker(contextFor(await resolveConfig(), 'stop'));
    }),
  );

program
  .command('status')
  .description('Show all persona statuses')
  .action(
    guarded(async () => {
      await showStatus(contextFor(await resolveConfig(), 'status'));
    }),
  );

program
  .command('set-status')
  .description('Set a persona status (operator override)')
  .argument('<persona>', 'Persona key', parsePersona)
  .argument('<status>', 'New status', parseStatus)
  .option('-m, --message <text>', 'Status message')
  .action(
    guarded(async (persona: PersonaKey, status: PersonaStatus, opts: { message?: string }) => {
      await setStatus(contextFor(await resolveConfig(), 'status'), persona, status, opts.message);
    }),
  );

program
  .command('wait')
  .description('Wait until a persona reaches one of the given statuses')
  .argument('<persona>', 'Persona key', parsePersona)
  .requiredOption('-s, --status <status>', 'Desired status (repeatable)', collectStatus)
  .option('-t, --timeout <seconds>', 'Give up after this long (default: wait forever)', parseSeconds)
  .option('-p, --poll <seconds>', 'Poll interval', parseSeconds)
  .action(
    guarded(async (persona: PersonaKey, opts: { status: PersonaStatus[]; timeout?: number; poll?: number }) => {
      const ctx = contextFor(await resolveConfig(), 'wait');
      await waitForStatus(ctx, persona, opts.status, {
        timeoutMs: opts.timeout,
        pollMs: opts.poll ?? ctx.config.pollMs,
      });
    }),
  );

program
  .command('ask')
  .description('Send one prompt as a persona and print the response')
  .argument('<persona>', 'Persona key', parsePersona)
  .requiredOption('--prompt <text>', 'Prompt text')
  .option('-t, --timeout <seconds>', 'Response timeout', parseSeconds)
  .option('-p, --poll <seconds>', 'Poll interval', parseSeconds)
  .action(
    guarded(async (persona: PersonaKey, opts: { prompt: string; timeout?: number; poll?: number }) => {
      const ctx = contextFor(await resolveConfig(), 'ask');
      await ctx.store.ensureInitialized();
      await ensureBroker(ctx);
      return ask(ctx, persona, opts.prompt, {
        timeoutMs: opts.timeout ?? ctx.config.timeoutMs,
        pollMs: opts.poll ?? ctx.config.pollMs,
      });
    }),
  );

program
  .command('pane')
  .description('Run the interactive client for one persona')
  .argument('[persona]', `Persona key (default: $${PERSONA_ENV})`)
  .option('--surface <kind>', 'Input surface used to reach other panes', 'tmux')
  .option('--pane-id <id>', 'This pane\'s id (default: $TMUX_PANE)')
  .action(
    guarded(async (personaArg: string | undefined, opts: { surface: string; paneId?: string }) => {
      const persona = parsePersona(personaArg ?? process.env[PERSONA_ENV] ?? '');
      const surface = createSurface(parseSurfaceKind(opts.surface));

      const ctx = contextFor(await resolveConfig(), persona);
      await ctx.store.ensureInitialized();
      await ensureBroker(ctx);

      const client = new PersonaClient({
        persona,
        ctx,
        surface,
        paneId: opts.paneId ?? process.env.TMUX_PANE,
      });
      await client.start();
      await client.run();
    }),
  );

program.parseAsync().catch((error: unknown) => {
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(1);
});
