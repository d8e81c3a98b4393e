// Chip amount parsing/formatting for bet entry and display.
// Accepts inputs like: 25, 1_000, 3,500, 2k, 2.5k

import { err, ok, type Result } from './result.js';

export type ParseAmountErr =
  | { code: 'bad_number'; raw: string }
  | { code: 'bad_suffix'; raw: string; suffix: string }
  | { code: 'fraction'; raw: string };

const SUFFIXES = new Map<string, number>([
  ['', 1],
  ['k', 1_000],
]);

const AMOUNT_RE = /^([+-]?)(\d+(?:\.\d+)?)\s*([a-z]*)$/;

/** Parses a whole chip amount. Sign is kept; range checks belong to the caller. */
export function parseAmount(raw: string): Result<number, ParseAmountErr> {
  const cleaned = raw.trim().toLowerCase().replace(/(?<=\d)[_,](?=\d)/g, '');
  const m = AMOUNT_RE.exec(cleaned);
  if (!m) return err({ code: 'bad_number', raw });
  const [, sign, digits, suffix] = m;
  const mult = SUFFIXES.get(suffix);
  if (mult === undefined) return err({ code: 'bad_suffix', raw, suffix });
  const value = Number(digits) * mult;
  if (!Number.isSafeInteger(value)) {
    return Number.isFinite(value) && value < Number.MAX_SAFE_INTEGER
      ? err({ code: 'fraction', raw })
      : err({ code: 'bad_number', raw });
  }
  return ok(sign === '-' ? -value : value);
}

export function describeAmountError(e: ParseAmountErr): string {
  switch (e.code) {
    case 'bad_suffix':
      return `Unknown amount suffix "${e.suffix}". Use a plain number or k for thousands.`;
    case 'fraction':
      return 'Bets must be a whole number of chips.';
    default:
      return `"${e.raw.trim()}" is not a number.`;
  }
}

export function formatChips(n: number): string {
  return n.toLocaleString('en-US', { maximumFractionDigits: 2 });
}
