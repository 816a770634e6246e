/**
 * Crew Relay - Error Types
 */

export class RelayError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Connect/read/write failure on the broker socket. */
export class TransportError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transport', message, options);
  }
}

/** The broker answered, but with `ok:false` or something that is not a reply. */
export class ProtocolError extends RelayError {
  constructor(message: string) {
    super('protocol', message);
  }
}

export class TimeoutError extends RelayError {
  constructor(what: string) {
    super('timeout', `Timed out waiting for ${what}`);
  }
}

export class MarkerSyntaxError extends RelayError {
  readonly marker: string;

  constructor(marker: string) {
    super(
      'marker_syntax',
      `Invalid ${marker} marker syntax; expected {{${marker}:persona}} or {{${marker}.persona}}.`,
    );
    this.marker = marker;
  }
}

export class UnknownPersonaError extends RelayError {
  readonly persona: string;

  constructor(persona: string, marker: string) {
    super('unknown_persona', `Unrecognized persona '${persona}' in ${marker} marker.`);
    this.persona = persona;
  }
}

export class InvalidTransitionError extends RelayError {
  constructor(persona: string, from: string, to: string) {
    super('invalid_transition', `${persona} cannot move from ${from} to ${to}`);
  }
}

export class BrokerAlreadyRunningError extends RelayError {
  constructor(socketPath: string) {
    super('broker_running', `Broker already running at ${socketPath}`);
  }
}

export class SurfaceError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('surface', message, options);
  }
}

export class ConfigError extends RelayError {
  constructor(message: string) {
    super('config', message);
  }
}

/** Unbalanced quotes in a `>` shortcut line. */
export class CommandLineError extends RelayError {
  constructor(message: string) {
    super('command_line', message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
