#!/usr/bin/env node
import readline from 'node:readline/promises';
import dotenv from 'dotenv';
import { ui } from './cli/ui.js';
import { log } from './cli/logger.js';
import { loadTableConfig } from './config/index.js';
import { resolveRuntime } from './config/runtime.js';
import { describeExit, playSession, type TableIO } from './games/blackjack/session.js';
import { Table } from './games/blackjack/table.js';
import { formatChips } from './lib/amount.js';
import { BlackjackError, normalizeError, shortStack } from './util/errors.js';
import { rngFor } from './util/rng.js';

dotenv.config({ override: false });

const cfg = resolveRuntime();
process.env.LOG_LEVEL = process.env.LOG_LEVEL || cfg.logLevel;
if (cfg.quiet) process.env.QUIET = '1';
if (!cfg.pretty) {
  process.env.NO_COLOR = '1';
  process.env.CLI_BANNER = 'off';
}

async function main(): Promise<number> {
  ui.banner();
  const config = loadTableConfig();
  const created = Table.create({
    stack: config.startingStack,
    decks: config.decks,
    ceiling: config.stackCeiling,
    rng: rngFor(config.seed),
  });
  if (!created.ok) throw new BlackjackError(created.error);
  const table = created.value;
  log.debug('table_ready', 'boot', { ...config, cardsInShoe: table.cardsRemaining });

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const io: TableIO = {
    ask: (prompt) => rl.question(prompt),
    show: (screen) => console.log(screen),
  };
  try {
    const reason = await playSession(table, io);
    ui.say(describeExit(reason), reason === 'out_of_chips' ? 'warn' : 'success');
    ui.say(`Final stack: ${formatChips(table.stack)}`, 'title');
    return 0;
  } finally {
    rl.close();
  }
}

main()
  .then((code) => {
    log.flush();
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    const info = normalizeError(e);
    log.error(`Blackjack stopped: ${info.message}`, 'boot', { name: info.name, code: info.code });
    if (cfg.verbose) ui.say(shortStack(e, 6), 'dim');
    log.flush();
    process.exitCode = 1;
  });
