import { describe, test, expect } from '@jest/globals';
import { cardOf, label, rank, sameRank, suit } from '../src/cards/Card.js';

describe('card encoding', () => {
  test('every rank/suit pair appears exactly once per deck', () => {
    const labels = new Set<string>();
    for (let c = 0; c < 52; c++) labels.add(label(c));
    expect(labels.size).toBe(52);
  });

  test('rank cycles every 13, suit steps every 13', () => {
    expect(rank(0)).toBe('2');
    expect(rank(8)).toBe('10');
    expect(rank(12)).toBe('A');
    expect(suit(12)).toBe('C');
    expect(suit(13)).toBe('D');
    expect(rank(21)).toBe('10');
    expect(suit(21)).toBe('D');
    expect(suit(51)).toBe('S');
  });

  test('labels join rank and suit glyph', () => {
    expect(label(51)).toBe('A♠');
    expect(label(8)).toBe('10♣');
    expect(label(37)).toBe('K♥');
  });

  test('cardOf is the inverse encoding', () => {
    expect(cardOf('A', 'S')).toBe(51);
    expect(cardOf('K', 'H')).toBe(37);
    expect(cardOf('2', 'C')).toBe(0);
    for (let c = 0; c < 52; c++) expect(cardOf(rank(c), suit(c))).toBe(c);
  });

  test('sameRank compares rank only', () => {
    expect(sameRank(8, 21)).toBe(true);
    expect(sameRank(cardOf('10', 'D'), cardOf('J', 'D'))).toBe(false);
  });
});
