import { rank, type Card, type Rank } from '../../cards/Card.js';
import type { HandValue } from './types.js';

export function valueOfRank(r: Rank): number {
  if (r === 'A') return 11; // can be 1 later
  if (r === 'K' || r === 'Q' || r === 'J') return 10;
  return parseInt(r, 10);
}

export function evaluateHand(cards: readonly Card[]): HandValue {
  let value = 0;
  let aces = 0;
  for (const c of cards) {
    const r = rank(c);
    value += valueOfRank(r);
    if (r === 'A') aces++;
  }
  for (let i = 0; i < aces; i++) {
    if (value > 21) value -= 10; // count one Ace as 1 instead of 11
  }
  return { value, blackjack: cards.length === 2 && value === 21 };
}

export function isBust(cards: readonly Card[]): boolean {
  return evaluateHand(cards).value > 21;
}

export function isBlackjack(cards: readonly Card[]): boolean {
  return evaluateHand(cards).blackjack;
}
