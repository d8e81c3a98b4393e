import type { Card } from '../../cards/Card.js';

export type Action = 'hit' | 'stand' | 'double' | 'split';

export type HandStatus = 'acting' | 'done';
export type HandId = 'primary' | 'split';

export type TablePhase = 'awaiting_bet' | 'player_turn' | 'dealer_turn' | 'payout' | 'finished';

export type ExitReason = 'out_of_chips' | 'ceiling_reached' | 'reshuffle';

export interface HandValue {
  value: number;
  blackjack: boolean;
}

export type BetRejection =
  | 'bad_number'
  | 'non_positive'
  | 'exceeds_stack'
  | 'not_an_increase'
  | 'wrong_phase';

export type TableError =
  | { code: 'invalid_config'; message: string }
  | { code: 'invalid_bet'; reason: BetRejection; message: string }
  | { code: 'illegal_action'; action: Action | null; message: string }
  | { code: 'stack_out_of_range'; value: number; message: string }
  | { code: 'wrong_phase'; phase: TablePhase; message: string }
  | { code: 'empty_shoe'; message: string };

export type HandOutcome = 'blackjack' | 'win' | 'push' | 'lose';

export interface HandSettlement {
  hand: HandId;
  outcome: HandOutcome;
  bet: number;
  payout: number;
}

export interface Outcome {
  hands: HandSettlement[];
  payout: number;
  stack: number;
  reshuffle: boolean;
}

export interface HandView {
  cards: Card[];
  evaluation: HandValue;
  status: HandStatus;
  bet: number;
}

export interface TableView {
  phase: TablePhase;
  stack: number;
  bet: number;
  splitBet: number | null;
  betPlaced: boolean;
  dealer: { cards: Card[]; evaluation: HandValue };
  player: HandView;
  split: HandView | null;
  active: HandId | null;
  reshuffle: boolean;
}
