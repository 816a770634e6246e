/**
 * Crew Relay - External Assistant Invocation
 *
 * The assistant is an opaque CLI: prompt in, combined output and exit code out.
 * Continuation of the previous conversation is requested with `--continue`.
 */

import { spawn } from 'child_process';

export interface AssistantInvocation {
  prompt: string;
  continueSession: boolean;
  repoRoot: string;       // Working directory and `--add-dir`
  configDir: string;      // Assistant state/config location
}

export interface AssistantResult {
  exitCode: number;
  output: string;         // stdout followed by stderr, verbatim
}

export interface AssistantRunner {
  run(invocation: AssistantInvocation): Promise<AssistantResult>;
}

export function buildAssistantArgs(invocation: AssistantInvocation): string[] {
  const args = ['--config-dir', invocation.configDir, '--add-dir', invocation.repoRoot, '-p', invocation.prompt];
  if (invocation.continueSession) {
    args.unshift('--continue');
  }
  return args;
}

/**
 * Heuristic match on the assistant's wording for "there is no session to continue".
 * Depends on the tool's human-readable output, so it can drift with tool releases.
 */
export function looksLikeNoSessionToContinue(output: string): boolean {
  const msg = output.toLowerCase();
  return msg.includes('session') && msg.includes('continue') && (msg.includes('no') || msg.includes('not'));
}

/** Runs the assistant CLI as a child process. */
export class SpawnAssistantRunner implements AssistantRunner {
  constructor(
    private command: string,
    private env: NodeJS.ProcessEnv = process.env,
  ) {}

  run(invocation: AssistantInvocation): Promise<AssistantResult> {
    return new Promise((resolve) => {
      let stdout = '';
      let stderr = '';
      let settled = false;
      const finish = (result: AssistantResult) => {
        if (settled) return;
        settled = true;
        resolve(result);
      };

      const child = spawn(this.command, buildAssistantArgs(invocation), {
        cwd: invocation.repoRoot,
        env: this.env,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      child.stdout.setEncoding('utf-8');
      child.stderr.setEncoding('utf-8');
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      // ENOENT and friends: report like a shell would for a missing command
      child.on('error', (error) => {
        finish({ exitCode: 127, output: `${stdout}${stderr}${error.message}\n` });
      });

      child.on('close', (code) => {
        finish({ exitCode: code ?? 1, output: stdout + stderr });
      });
    });
  }
}
