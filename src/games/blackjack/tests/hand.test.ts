import { describe, test, expect } from '@jest/globals';
import { cardOf, type Rank } from '../../../cards/Card.js';
import { evaluateHand, isBlackjack, isBust } from '../hand.js';

const hand = (...ranks: Rank[]) => ranks.map((r, i) => cardOf(r, i % 2 ? 'H' : 'S'));

describe('evaluateHand', () => {
  test('ace and king is blackjack', () => {
    expect(evaluateHand(hand('A', 'K'))).toEqual({ value: 21, blackjack: true });
  });

  test('three-card 21 is not blackjack', () => {
    expect(evaluateHand(hand('A', 'A', '9'))).toEqual({ value: 21, blackjack: false });
  });

  test('two aces count 12', () => {
    expect(evaluateHand(hand('A', 'A'))).toEqual({ value: 12, blackjack: false });
  });

  test('soft ace drops to 1 to avoid busting', () => {
    expect(evaluateHand(hand('A', '9', '5'))).toEqual({ value: 15, blackjack: false });
  });

  test('each ace is re-checked against the running total', () => {
    expect(evaluateHand(hand('A', 'A', 'A', 'A', '7'))).toEqual({ value: 21, blackjack: false });
    expect(evaluateHand(hand('A', 'A', 'K', 'Q'))).toEqual({ value: 22, blackjack: false });
  });

  test('no aces means no reduction', () => {
    expect(evaluateHand(hand('K', 'Q', '5'))).toEqual({ value: 25, blackjack: false });
  });

  test('face cards count ten, pips face value', () => {
    expect(evaluateHand(hand('J', '2'))).toEqual({ value: 12, blackjack: false });
    expect(evaluateHand(hand('10', '9'))).toEqual({ value: 19, blackjack: false });
    expect(evaluateHand([])).toEqual({ value: 0, blackjack: false });
  });

  test('helpers', () => {
    expect(isBlackjack(hand('Q', 'A'))).toBe(true);
    expect(isBust(hand('K', 'Q', '2'))).toBe(true);
    expect(isBust(hand('A', 'K', 'Q'))).toBe(false);
  });
});
