/**
 * Crew Relay - Persona Client
 *
 * The line loop running in one persona's pane. Plain lines become prompts,
 * `>` lines run local coordination commands, `{{agent:p}}` segments are
 * handed to the scheduler.
 */

import * as readline from 'readline';
import { Command, CommanderError } from 'commander';
import { submitPrompt, type PromptSubmission } from './client';
import {
  collectStatus,
  parsePersona,
  parseSeconds,
  parseStatus,
  setStatus,
  showStatus,
  waitForStatus,
  type CommandContext,
} from './commands';
import { AGENT_CALL_ENV, PERSONA_NAMES } from './constants';
import { CommandLineError, InvalidTransitionError, RelayError, TransportError } from './errors';
import { expandContext, parseLine, type DirectedSegment, type ParsedLine } from './markers';
import { brokerSocketPath } from './paths';
import { formatPrompt, Scheduler } from './scheduler';
import { utcNowIso } from './state';
import type { InputSurface } from './surface';
import type { PersonaKey, PersonaStatus, PromptResult } from './types';

export interface PersonaClientOptions {
  persona: PersonaKey;
  ctx: CommandContext;
  surface: InputSurface;
  submit?: (submission: PromptSubmission) => Promise<PromptResult>;
  paneId?: string;                // Recorded so other personas can reach this pane
  env?: NodeJS.ProcessEnv;
}

export type LineResult = 'continue' | 'exit';

/**
 * Split a shortcut line into words. Single quotes are literal, double quotes
 * honour `\"` and `\\`, a bare backslash escapes the next character.
 */
export function splitCommandLine(text: string): string[] {
  const words: string[] = [];
  let current = '';
  let inWord = false;
  let quote: '"' | "'" | undefined;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quote === "'") {
      if (ch === "'") quote = undefined;
      else current += ch;
    } else if (quote === '"') {
      if (ch === '"') {
        quote = undefined;
      } else if (ch === '\\' && (text[i + 1] === '"' || text[i + 1] === '\\')) {
        current += text[++i];
      } else {
        current += ch;
      }
    } else if (ch === "'" || ch === '"') {
      quote = ch;
      inWord = true;
    } else if (ch === '\\' && i + 1 < text.length) {
      current += text[++i];
      inWord = true;
    } else if (/\s/.test(ch)) {
      if (inWord) {
        words.push(current);
        current = '';
        inWord = false;
      }
    } else {
      current += ch;
      inWord = true;
    }
  }

  if (quote) {
    throw new CommandLineError('No closing quotation');
  }
  if (inWord) {
    words.push(current);
  }
  return words;
}

/** Inverse of `splitCommandLine` for words that need it. */
export function joinCommandLine(words: string[]): string {
  return words.map((word) => (/^[\w@%+=:,./-]+$/.test(word) ? word : `'${word.replace(/'/g, `'"'"'`)}'`)).join(' ');
}

/** Rewrite `waitfor p ...` to `wait p --status idle ...`; split off a `-- follow-up`. */
export function expandShortcut(words: string[]): { argv: string[]; followUp: string[] } {
  let argv = words;
  if (argv[0] === 'waitfor' || argv[0] === 'wait-for') {
    argv = ['wait', argv[1] ?? '', '--status', 'idle', ...argv.slice(2)];
  }
  const separator = argv.indexOf('--');
  if (separator < 0) {
    return { argv, followUp: [] };
  }
  return { argv: argv.slice(0, separator), followUp: argv.slice(separator + 1) };
}

export class PersonaClient {
  private persona: PersonaKey;
  private ctx: CommandContext;
  private submit: (submission: PromptSubmission) => Promise<PromptResult>;
  private scheduler: Scheduler;
  private env: NodeJS.ProcessEnv;

  constructor(private options: PersonaClientOptions) {
    this.persona = options.persona;
    this.ctx = options.ctx;
    this.env = options.env ?? process.env;

    const socketPath = brokerSocketPath(this.ctx.config.sharedDir);
    this.submit = options.submit ?? ((submission) => submitPrompt(socketPath, submission));

    const { store, artifacts, config, logger } = this.ctx;
    this.scheduler = new Scheduler({
      origin: this.persona,
      store,
      artifacts,
      surface: options.surface,
      submit: this.submit,
      timeoutMs: config.timeoutMs,
      pollMs: config.pollMs,
      contextMaxChars: config.contextMaxChars,
      logger,
      onOutput: (output) => this.writeOutput(output),
    });
  }

  /** Claim this persona: clear whatever a previous client left behind. */
  async start(): Promise<void> {
    const { paneId } = this.options;
    await this.ctx.store.update((state) => {
      const record = state.personas[this.persona];
      record.status = 'idle';
      record.inputReady = false;
      record.updatedAt = utcNowIso();
      if (paneId) {
        record.paneId = paneId;
      }
    });
  }

  async handleLine(raw: string): Promise<LineResult> {
    const line = raw.trim();
    if (!line) {
      return 'continue';
    }
    if (line === 'exit' || line === 'quit') {
      return 'exit';
    }
    if (line.startsWith('>')) {
      await this.runShortcut(line.slice(1));
    } else {
      await this.runPrompt(line);
    }
    return 'continue';
  }

  /** Read lines until exit/quit or end of input. */
  async run(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout): Promise<void> {
    const rl = readline.createInterface({ input, output });
    rl.setPrompt(`${this.persona}> `);
    rl.on('SIGINT', () => {
      output.write('\n');
      rl.prompt();
    });

    this.printBanner();
    try {
      await this.ctx.store.setInputReady(this.persona, true);
      rl.prompt();
      for await (const line of rl) {
        await this.ctx.store.setInputReady(this.persona, false);
        if ((await this.handleLine(line)) === 'exit') {
          break;
        }
        await this.ctx.store.setInputReady(this.persona, true);
        rl.prompt();
      }
    } finally {
      rl.close();
      await this.ctx.store.setInputReady(this.persona, false);
    }
  }

  private printBanner(): void {
    const { print, config } = this.ctx;
    print(`=== Crew Relay Persona: ${PERSONA_NAMES[this.persona]} ===`);
    print(`Persona: ${this.persona}`);
    print(`Repo: ${config.repoRoot}`);
    print("Shortcuts: '>status', '>set-status p s', '>wait p --status s', '>waitfor p -- <line>'");
    print('Markers: {{agent:p}} sends the rest of the line to p, {{ctx:p}} embeds p\'s last response');
    print("Type 'exit' to close this pane.");
  }

  private writeOutput(output: string): void {
    if (output) {
      this.ctx.print(output.replace(/\n$/, ''));
    }
  }

  /** Status changes from the client honour the transition table; a refused one is reported, not fatal. */
  private async transition(status: PersonaStatus): Promise<void> {
    try {
      await this.ctx.store.setStatus(this.persona, status);
    } catch (error) {
      if (error instanceof InvalidTransitionError) {
        this.ctx.logger.warn(error.message);
        return;
      }
      throw error;
    }
  }

  private async runPrompt(line: string): Promise<void> {
    const { logger, artifacts, config } = this.ctx;
    let segments: DirectedSegment[] = [];
    let delivered = true;

    await this.transition('working');
    try {
      let parsed: ParsedLine;
      try {
        parsed = parseLine(line);
      } catch (error) {
        if (error instanceof RelayError) {
          logger.error(error.message);
          return;
        }
        throw error;
      }
      segments = parsed.segments;

      if (parsed.head) {
        const text = (await expandContext(parsed.head, artifacts, config.contextMaxChars)).trim();
        if (text) {
          delivered = await this.sendOwn(text);
        }
      }
    } finally {
      await this.transition('idle');
    }

    if (segments.length === 0) {
      return;
    }
    if (!delivered) {
      logger.warn(`Skipping ${segments.length} directed segment(s) after the broker error`);
      return;
    }
    if (this.env[AGENT_CALL_ENV] === '1') {
      logger.debug('Nested agent call: directed segments are not dispatched');
      return;
    }
    await this.scheduler.dispatch(segments);
  }

  /** @returns false when the broker could not be reached or refused the prompt */
  private async sendOwn(text: string): Promise<boolean> {
    try {
      const result = await this.submit({ prompt: formatPrompt(this.persona, text), persona: this.persona });
      this.writeOutput(result.output);
      return true;
    } catch (error) {
      if (!(error instanceof RelayError)) {
        throw error;
      }
      this.ctx.logger.error(`Broker error: ${error.message}`);
      if (error instanceof TransportError) {
        this.ctx.logger.error(`Expected socket at: ${brokerSocketPath(this.ctx.config.sharedDir)}`);
      }
      return false;
    }
  }

  private async runShortcut(tail: string): Promise<void> {
    let words: string[];
    try {
      words = splitCommandLine(tail);
    } catch (error) {
      if (error instanceof CommandLineError) {
        this.ctx.logger.error(`Parse error: ${error.message}`);
        return;
      }
      throw error;
    }

    const { argv, followUp } = expandShortcut(words);
    this.ctx.logger.info(`crew-relay ${joinCommandLine(argv)}`.trimEnd());

    const waited = await this.runLocalCommand(argv);
    if (waited && followUp.length > 0) {
      await this.runFollowUp(followUp);
    }
  }

  private async runFollowUp(words: string[]): Promise<void> {
    const [first, ...rest] = words;
    if (first.startsWith('>')) {
      const shortcut = [first.slice(1), ...rest].filter((word) => word !== '');
      await this.runShortcut(joinCommandLine(shortcut));
    } else {
      await this.runPrompt(words.join(' '));
    }
  }

  /** @returns true when a wait command ran (whether or not it reached its status) */
  private async runLocalCommand(argv: string[]): Promise<boolean> {
    const { ctx } = this;
    let waited = false;

    const program = new Command('crew-relay')
      .exitOverride()
      .configureOutput({
        writeOut: (text) => ctx.print(text.trimEnd()),
        writeErr: (text) => ctx.logger.error(text.trimEnd()),
      });

    program
      .command('status')
      .description('Show all persona statuses')
      .action(async () => {
        await showStatus(ctx);
      });

    program
      .command('set-status')
      .description('Set a persona status')
      .argument('<persona>', 'Persona key', parsePersona)
      .argument('<status>', 'New status', parseStatus)
      .option('-m, --message <text>', 'Status message')
      .action(async (persona: PersonaKey, status: PersonaStatus, opts: { message?: string }) => {
        await setStatus(ctx, persona, status, opts.message);
      });

    program
      .command('wait')
      .description('Wait until a persona reaches one of the given statuses')
      .argument('<persona>', 'Persona key', parsePersona)
      .requiredOption('-s, --status <status>', 'Desired status (repeatable)', collectStatus)
      .option('-t, --timeout <seconds>', 'Give up after this long', parseSeconds)
      .option('-p, --poll <seconds>', 'Poll interval', parseSeconds)
      .action(async (persona: PersonaKey, opts: { status: PersonaStatus[]; timeout?: number; poll?: number }) => {
        await this.transition('waiting');
        try {
          await waitForStatus(ctx, persona, opts.status, {
            timeoutMs: opts.timeout,
            pollMs: opts.poll ?? ctx.config.pollMs,
          });
        } finally {
          waited = true;
          await this.transition('idle');
        }
      });

    try {
      await program.parseAsync(argv, { from: 'user' });
    } catch (error) {
      if (error instanceof CommanderError) {
        // Usage errors and help output were already written through configureOutput
        return false;
      }
      if (error instanceof RelayError) {
        ctx.logger.error(error.message);
        return waited;
      }
      throw error;
    }
    return waited;
  }
}
