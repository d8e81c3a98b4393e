import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

export type TableConfig = {
  startingStack: number;
  decks: number;
  stackCeiling: number;
  seed?: number;
};

export const DEFAULT_CONFIG: TableConfig = {
  startingStack: 1000,
  decks: 6,
  stackCeiling: 999_999,
};

// Deck range is the shoe's call; here we only insist on sane numbers.
const tableConfigSchema = z.object({
  startingStack: z.number().positive().finite(),
  decks: z.number().int(),
  stackCeiling: z.number().positive().finite(),
  seed: z.number().int().optional(),
}).strict();

const fileSchema = tableConfigSchema.partial();

const envNumber = z.coerce.number({ invalid_type_error: 'must be a number' });

export function configPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.resolve(process.cwd(), env.BJ_CONFIG || path.join('config', 'blackjack.json'));
}

function readFileConfig(file: string): Partial<TableConfig> {
  if (!fs.existsSync(file)) return {};
  const raw = fs.readFileSync(file, 'utf8');
  return fileSchema.parse(JSON.parse(raw));
}

function readEnvConfig(env: NodeJS.ProcessEnv): Partial<TableConfig> {
  const out: Partial<TableConfig> = {};
  if (env.BJ_STACK) out.startingStack = envNumber.parse(env.BJ_STACK);
  if (env.BJ_DECKS) out.decks = envNumber.parse(env.BJ_DECKS);
  if (env.BJ_CEILING) out.stackCeiling = envNumber.parse(env.BJ_CEILING);
  if (env.BJ_SEED) out.seed = envNumber.parse(env.BJ_SEED);
  return out;
}

/**
 * Defaults, then config/blackjack.json (or BJ_CONFIG), then BJ_* variables.
 * Throws a ZodError or SyntaxError on malformed input.
 */
export function loadTableConfig(env: NodeJS.ProcessEnv = process.env): TableConfig {
  const merged = { ...DEFAULT_CONFIG, ...readFileConfig(configPath(env)), ...readEnvConfig(env) };
  return tableConfigSchema.parse(merged);
}
