import type { TableError } from '../games/blackjack/types.js';

/** Thrown only where a TableError cannot be handed back: startup config, broken invariants. */
export class BlackjackError extends Error {
  readonly err: TableError;
  constructor(e: TableError) {
    super(e.message);
    this.name = 'BlackjackError';
    this.err = e;
  }
}

export function normalizeError(e: unknown) {
  if (e instanceof BlackjackError) {
    return { name: e.name, code: e.err.code, message: e.message, stack: e.stack || '' };
  }
  if (e instanceof Error) {
    return {
      name: e.name || 'Error',
      code: undefined,
      message: e.message || 'unknown',
      stack: e.stack || '',
    };
  }
  return {
    name: typeof e,
    code: undefined,
    message: String(e),
    stack: '',
  };
}

export function shortStack(e: unknown, lines = 3): string {
  const st = normalizeError(e).stack;
  if (!st) return '';
  return st.split('\n').slice(0, lines + 1).join('\n');
}
