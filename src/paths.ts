import * as path from 'path';
import { SESSION_FILE_NAME, SHARED_DIR_NAME } from './constants';
import type { PersonaKey } from './types';

export function sharedDirFor(repoRoot: string): string {
  return path.join(repoRoot, SHARED_DIR_NAME);
}

export function sessionPath(sharedDir: string): string {
  return path.join(sharedDir, SESSION_FILE_NAME);
}

export function brokerSocketPath(sharedDir: string): string {
  return path.join(sharedDir, 'broker.sock');
}

export function brokerPidPath(sharedDir: string): string {
  return path.join(sharedDir, 'broker.pid');
}

export function brokerIdentityPath(sharedDir: string): string {
  return path.join(sharedDir, 'broker.json');
}

export function brokerLogPath(sharedDir: string): string {
  return path.join(sharedDir, 'broker.log');
}

export function invokeLockPath(sharedDir: string): string {
  return path.join(sharedDir, 'invoke.lock');
}

export function responsesDir(sharedDir: string): string {
  return path.join(sharedDir, 'responses');
}

export function responseBodyPath(sharedDir: string, persona: PersonaKey): string {
  return path.join(responsesDir(sharedDir), `${persona}.last.txt`);
}

export function responseIdPath(sharedDir: string, persona: PersonaKey): string {
  return path.join(responsesDir(sharedDir), `${persona}.last.id`);
}
