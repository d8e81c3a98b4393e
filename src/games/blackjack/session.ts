import { log } from '../../cli/logger.js';
import { renderTable } from '../../cli/render.js';
import { formatChips } from '../../lib/amount.js';
import type { Result } from '../../lib/result.js';
import { BlackjackError } from '../../util/errors.js';
import type { Table } from './table.js';
import type { Action, ExitReason, HandSettlement, Outcome, TableError, TableView } from './types.js';

/** Line-oriented terminal port; tests drive it with scripted answers. */
export interface TableIO {
  ask(prompt: string): Promise<string>;
  show(screen: string): void;
}

export type Render = (view: TableView, messages: readonly string[]) => string;

const slog = log.withScope('session');

export const BET_PROMPT = 'How much would you like to bet on this hand? ';

const ACTION_LABELS: Array<[Action, string]> = [
  ['hit', 'Hit (h)'],
  ['stand', 'Stand (s)'],
  ['double', 'Double (d)'],
  ['split', 'Split (2)'],
];

export function actionPrompt(table: Table): string {
  const labels = ACTION_LABELS.filter(([a]) => table.actionPermitted(a)).map(([, l]) => l);
  if (labels.length <= 1) return `${labels.join('')}? `;
  return `${labels.slice(0, -1).join(', ')} or ${labels[labels.length - 1]}? `;
}

export function describeSettlement(s: HandSettlement, splitHand: boolean): string {
  const who = splitHand ? (s.hand === 'primary' ? 'First hand: ' : 'Split hand: ') : '';
  switch (s.outcome) {
    case 'blackjack':
      return `${who}Blackjack! You win ${formatChips(s.payout - s.bet)}`;
    case 'win':
      return `${who}You win ${formatChips(s.payout - s.bet)}`;
    case 'push':
      return `${who}Push, ${formatChips(s.bet)} returned`;
    default:
      return `${who}Dealer wins, you lose ${formatChips(s.bet)}`;
  }
}

export function describeExit(reason: ExitReason): string {
  switch (reason) {
    case 'out_of_chips':
      return 'You are out of chips. Game over.';
    case 'ceiling_reached':
      return 'You broke the bank!';
    case 'reshuffle':
      return 'The cut card is out and the shoe is finished.';
  }
}

// The shoe never runs dry before the cut card, so these calls cannot fail in play.
function unwrap<T>(r: Result<T, TableError>): T {
  if (!r.ok) throw new BlackjackError(r.error);
  return r.value;
}

/** Plays one hand from bet entry to settlement. */
export async function playHand(table: Table, io: TableIO, render: Render = renderTable): Promise<Outcome> {
  let messages: string[] = [];

  for (;;) {
    io.show(render(table.view(), messages));
    const answer = await io.ask(BET_PROMPT);
    const placed = table.setBet(answer);
    if (placed.ok) break;
    slog.debug('bet_rejected', { input: answer, reason: placed.error.code });
    messages = [placed.error.message];
  }

  unwrap(table.dealInitial());
  const { bet, stack } = table.view();
  slog.debug('hand_dealt', { bet, stack, remaining: table.cardsRemaining });
  messages = [];

  while (table.phase === 'player_turn') {
    io.show(render(table.view(), messages));
    const answer = await io.ask(actionPrompt(table));
    const applied = table.applyAction(answer);
    if (!applied.ok) {
      slog.debug('action_rejected', { input: answer, reason: applied.error.code });
      messages = [applied.error.message];
      continue;
    }
    slog.debug('action', { action: applied.value });
    messages = [];
  }

  unwrap(table.revealDealer());
  const outcome = unwrap(table.settle());
  const view = table.view();
  const lines = outcome.hands.map((h) => describeSettlement(h, view.split !== null));
  io.show(render(view, lines));
  slog.debug(lines.join('; '), { payout: outcome.payout, stack: outcome.stack, hands: outcome.hands });
  return outcome;
}

/** Plays hands until the table reports a reason to stop. */
export async function playSession(table: Table, io: TableIO, render: Render = renderTable): Promise<ExitReason> {
  let reason = table.exitReason();
  while (!reason) {
    await playHand(table, io, render);
    reason = table.exitReason();
  }
  slog.debug(describeExit(reason), { reason, stack: table.stack });
  return reason;
}
