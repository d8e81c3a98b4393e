export type Suit = 'C' | 'D' | 'H' | 'S';
export type Rank = '2' | '3' | '4' | '5' | '6' | '7' | '8' | '9' | '10' | 'J' | 'Q' | 'K' | 'A';

// A card is its index in a single 52-card deck: rank cycles fastest, suit every 13.
export type Card = number;

export const RANKS: readonly Rank[] = ['2', '3', '4', '5', '6', '7', '8', '9', '10', 'J', 'Q', 'K', 'A'];
export const SUITS: readonly Suit[] = ['C', 'D', 'H', 'S'];
export const DECK_SIZE = 52;

const SUIT_GLYPH: Record<Suit, string> = { C: '♣', D: '♦', H: '♥', S: '♠' };

export function rankIndex(card: Card): number {
  return card % 13;
}

export function rank(card: Card): Rank {
  return RANKS[rankIndex(card)];
}

export function suit(card: Card): Suit {
  return SUITS[Math.floor(card / 13)];
}

export function suitGlyph(s: Suit): string {
  return SUIT_GLYPH[s];
}

export function label(card: Card): string {
  return `${rank(card)}${suitGlyph(suit(card))}`;
}

export function cardOf(r: Rank, s: Suit = 'S'): Card {
  return SUITS.indexOf(s) * 13 + RANKS.indexOf(r);
}

export function sameRank(a: Card, b: Card): boolean {
  return rankIndex(a) === rankIndex(b);
}
