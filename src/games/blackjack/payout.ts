import type { HandOutcome, HandValue } from './types.js';

export const BLACKJACK_RETURN = 2.5; // stake + 3:2
export const WIN_RETURN = 2;
export const PUSH_RETURN = 1;

/** Chips returned to the stack for one hand, stake included. */
export function payoutFor(player: HandValue, dealer: HandValue, bet: number): { outcome: HandOutcome; payout: number } {
  if (player.blackjack && !dealer.blackjack) {
    return { outcome: 'blackjack', payout: bet * BLACKJACK_RETURN };
  }
  if (player.value <= 21) {
    if (player.value > dealer.value || dealer.value > 21) {
      return { outcome: 'win', payout: bet * WIN_RETURN };
    }
    if ((!dealer.blackjack && player.value === dealer.value) || (player.blackjack && dealer.blackjack)) {
      return { outcome: 'push', payout: bet * PUSH_RETURN };
    }
  }
  return { outcome: 'lose', payout: 0 };
}
