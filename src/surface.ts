/**
 * Crew Relay - Input Surface
 *
 * Boundary to the terminal multiplexer: type a line into another persona's pane.
 */

import { spawnSync } from 'child_process';
import { SurfaceError } from './errors';

export interface InputSurface {
  sendText(paneId: string, text: string): Promise<void>;
}

export class TmuxSurface implements InputSurface {
  constructor(private command: string = 'tmux') {}

  async sendText(paneId: string, text: string): Promise<void> {
    const result = spawnSync(this.command, ['send-keys', '-t', paneId, text, 'Enter'], {
      encoding: 'utf-8',
      timeout: 10000,
    });

    if (result.error) {
      throw new SurfaceError(`${this.command} failed: ${result.error.message}`, { cause: result.error });
    }
    if (result.status !== 0) {
      throw new SurfaceError(result.stderr.trim() || `Failed to send keys to ${paneId}`);
    }
  }
}

export const SURFACE_KINDS = ['tmux'] as const;
export type SurfaceKind = (typeof SURFACE_KINDS)[number];

export function parseSurfaceKind(value: string): SurfaceKind {
  const kind = SURFACE_KINDS.find((k) => k === value);
  if (!kind) {
    throw new SurfaceError(`Unknown surface '${value}'. Expected one of: ${SURFACE_KINDS.join(', ')}`);
  }
  return kind;
}

export function createSurface(kind: SurfaceKind): InputSurface {
  switch (kind) {
    case 'tmux':
      return new TmuxSurface();
  }
}
