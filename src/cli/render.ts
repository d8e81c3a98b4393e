import boxen from 'boxen';
import { label, suit, type Card } from '../cards/Card.js';
import type { HandValue, TableView } from '../games/blackjack/types.js';
import { formatChips } from '../lib/amount.js';
import { getPalette, type Palette } from './theme.js';

const HOLE = '??';

function cardText(card: Card, palette: Palette): string {
  const s = suit(card);
  return s === 'H' || s === 'D' ? palette.red(label(card)) : palette.black(label(card));
}

export function formatHandLine(
  name: string,
  cards: readonly Card[],
  evaluation: HandValue,
  opts: { hideHole?: boolean; active?: boolean; palette?: Palette } = {},
): string {
  const palette = opts.palette ?? getPalette();
  const shown = cards.map((c) => cardText(c, palette));
  if (opts.hideHole) shown.push(palette.dim(HOLE));
  const marker = opts.active ? '> ' : '  ';
  const total = evaluation.blackjack ? 'Blackjack!' : evaluation.value > 21 ? `${evaluation.value} bust` : String(evaluation.value);
  return `${marker}${name}: ${shown.join(' ')}  (${total})`;
}

export function formatStakeLine(view: TableView): string {
  const parts = [view.bet > 0 ? `Bet: ${formatChips(view.bet)}` : 'Bet: -'];
  if (view.splitBet !== null) parts.push(`Split bet: ${formatChips(view.splitBet)}`);
  parts.push(`Stack: ${formatChips(view.stack)}`);
  return parts.join(' | ');
}

/** Pure presentation of the table; nothing here feeds back into play. */
export function renderTable(view: TableView, messages: readonly string[] = [], palette: Palette = getPalette()): string {
  const lines: string[] = [];
  if (view.dealer.cards.length > 0) {
    const hideHole = view.phase === 'player_turn';
    lines.push(formatHandLine('Dealer', view.dealer.cards, view.dealer.evaluation, { hideHole, palette }));
  }
  if (view.player.cards.length > 0) {
    const splitting = view.split !== null;
    lines.push(formatHandLine('You', view.player.cards, view.player.evaluation, { active: splitting && view.active === 'primary', palette }));
    if (view.split) {
      lines.push(formatHandLine('Split', view.split.cards, view.split.evaluation, { active: view.active === 'split', palette }));
    }
  }
  lines.push('', palette.bold(formatStakeLine(view)));
  for (const m of messages) lines.push(m);
  return boxen(lines.join('\n'), { padding: { top: 0, bottom: 0, left: 1, right: 1 }, borderStyle: 'round', borderColor: 'green' });
}
