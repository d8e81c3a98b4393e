import { describe, test, expect } from '@jest/globals';
import { payoutFor } from '../payout.js';

const v = (value: number, blackjack = false) => ({ value, blackjack });

describe('payoutFor', () => {
  const bet = 10;

  test('blackjack pays 3:2 plus the stake', () => {
    expect(payoutFor(v(21, true), v(18), bet)).toEqual({ outcome: 'blackjack', payout: 25 });
    expect(payoutFor(v(21, true), v(21), bet)).toEqual({ outcome: 'blackjack', payout: 25 });
  });

  test('higher total or dealer bust pays even money plus the stake', () => {
    expect(payoutFor(v(20), v(18), bet)).toEqual({ outcome: 'win', payout: 20 });
    expect(payoutFor(v(12), v(23), bet)).toEqual({ outcome: 'win', payout: 20 });
  });

  test('equal totals push', () => {
    expect(payoutFor(v(19), v(19), bet)).toEqual({ outcome: 'push', payout: 10 });
    expect(payoutFor(v(21, true), v(21, true), bet)).toEqual({ outcome: 'push', payout: 10 });
  });

  test('bust loses even when the dealer busts too', () => {
    expect(payoutFor(v(22), v(18), bet)).toEqual({ outcome: 'lose', payout: 0 });
    expect(payoutFor(v(22), v(22), bet)).toEqual({ outcome: 'lose', payout: 0 });
  });

  test('three-card 21 loses to dealer blackjack', () => {
    expect(payoutFor(v(21), v(21, true), bet)).toEqual({ outcome: 'lose', payout: 0 });
  });

  test('lower total loses', () => {
    expect(payoutFor(v(17), v(18), bet)).toEqual({ outcome: 'lose', payout: 0 });
  });
});
