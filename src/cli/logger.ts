import path from 'node:path';
import pino from 'pino';
import { ui } from './ui.js';
import { isTestEnv } from '../util/env.js';

type Data = Record<string, unknown>;

let logger: pino.Logger | null = null;

function file(): pino.Logger {
  if (logger) return logger;
  if (isTestEnv()) {
    logger = pino({ level: 'silent' });
    return logger;
  }
  const dir = path.resolve(process.env.LOG_DIR || 'logs');
  const stream = pino.destination({ dest: path.join(dir, 'blackjack.ndjson'), mkdir: true, sync: false });
  logger = pino({ level: process.env.LOG_LEVEL || 'info', base: undefined }, stream);
  return logger;
}

function info(msg: string, scope?: string, data?: Data) {
  ui.say(msg, 'info');
  file().info({ scope, data }, msg);
}
function warn(msg: string, scope?: string, data?: Data) {
  ui.say(msg, 'warn');
  file().warn({ scope, data }, msg);
}
function error(msg: string, scope?: string, data?: Data) {
  ui.say(msg, 'error');
  file().error({ scope, data }, msg);
}
// file only; the table on screen already shows what happened
function debug(msg: string, scope?: string, data?: Data) {
  file().debug({ scope, data }, msg);
}
function flush() {
  logger?.flush();
}

function withScope(scope: string) {
  return {
    info: (msg: string, data?: Data) => info(msg, scope, data),
    warn: (msg: string, data?: Data) => warn(msg, scope, data),
    error: (msg: string, data?: Data) => error(msg, scope, data),
    debug: (msg: string, data?: Data) => debug(msg, scope, data),
  };
}

export type ScopedLog = ReturnType<typeof withScope>;

export const log = { info, warn, error, debug, flush, withScope };
export default log;
