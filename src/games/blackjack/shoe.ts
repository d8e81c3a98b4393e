import { DECK_SIZE, type Card } from '../../cards/Card.js';
import { err, ok, type Result } from '../../lib/result.js';
import { cryptoRNG, shuffle, type RNG } from '../../util/rng.js';
import type { TableError } from './types.js';

export const MIN_DECKS = 1;
export const MAX_DECKS = 6;
export const MIN_RESHUFFLE_POINT = 30;

function makeDeck(): Card[] {
  return Array.from({ length: DECK_SIZE }, (_, i) => i);
}

/**
 * A multi-deck shoe with a cut card. Cards come off the end of `cards`;
 * once fewer than `reshufflePoint` remain the shoe is spent.
 */
export class Shoe {
  private constructor(
    private readonly cards: Card[],
    readonly decks: number,
    readonly reshufflePoint: number,
  ) {}

  static create(decks: number, rng: RNG = cryptoRNG): Result<Shoe, TableError> {
    if (!Number.isInteger(decks) || decks < MIN_DECKS || decks > MAX_DECKS) {
      return err({ code: 'invalid_config', message: `Number of decks must be between ${MIN_DECKS} and ${MAX_DECKS}` });
    }
    const cards: Card[] = [];
    for (let d = 0; d < decks; d++) {
      cards.push(...shuffle(makeDeck(), rng));
    }
    const reshufflePoint = MIN_RESHUFFLE_POINT + rng(DECK_SIZE * decks - MIN_RESHUFFLE_POINT);
    return ok(new Shoe(cards, decks, reshufflePoint));
  }

  /** Stacked shoe: cards are drawn in the order given. */
  static fromCards(drawOrder: readonly Card[], reshufflePoint = 0): Shoe {
    const decks = Math.max(1, Math.ceil(drawOrder.length / DECK_SIZE));
    return new Shoe(drawOrder.slice().reverse(), decks, reshufflePoint);
  }

  get remaining(): number {
    return this.cards.length;
  }

  pop(): Result<Card, TableError> {
    const card = this.cards.pop();
    if (card === undefined) return err({ code: 'empty_shoe', message: 'The shoe is out of cards' });
    return ok(card);
  }

  /** Card `depth` places from the top without drawing it. */
  peek(depth = 0): Card | undefined {
    return this.cards[this.cards.length - 1 - depth];
  }

  needsReshuffle(): boolean {
    return this.cards.length < this.reshufflePoint;
  }
}
