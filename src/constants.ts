export const PERSONA_KEYS = ['pm', 'impl', 'review', 'docs'] as const;

export const PERSONA_NAMES: Record<(typeof PERSONA_KEYS)[number], string> = {
  pm: 'Project Manager',
  impl: 'Implementation Engineer',
  review: 'Code Review Engineer',
  docs: 'Technical Writer / Documentor',
};

export const PERSONA_STATUSES = ['idle', 'working', 'waiting', 'done', 'blocked'] as const;

export const CURRENT_SESSION_VERSION = 3;
export const SESSION_NAME = 'crew-relay';

export const SHARED_DIR_NAME = '.crew-relay';
export const SESSION_FILE_NAME = 'session.json';
export const CONFIG_FILE_NAME = 'config.json';

// Defaults
export const DEFAULT_ASSISTANT_COMMAND = 'copilot';
export const DEFAULT_POLL_MS = 500;
export const DEFAULT_TIMEOUT_MS = 120000;   // 2 minutes
export const DEFAULT_CONTEXT_MAX_CHARS = 12000;
export const DEFAULT_BROKER_START_TIMEOUT_MS = 3000;
export const PING_TIMEOUT_MS = 200;
export const INFO_TIMEOUT_MS = 300;

export const AGENT_CALL_ENV = 'CREW_RELAY_AGENT_CALL';
export const PERSONA_ENV = 'CREW_RELAY_PERSONA';
