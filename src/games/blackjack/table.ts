import { sameRank, type Card } from '../../cards/Card.js';
import { describeAmountError, parseAmount } from '../../lib/amount.js';
import { err, ok, type Result } from '../../lib/result.js';
import { BlackjackError } from '../../util/errors.js';
import type { RNG } from '../../util/rng.js';
import { evaluateHand } from './hand.js';
import { payoutFor } from './payout.js';
import { Shoe } from './shoe.js';
import type {
  Action,
  BetRejection,
  ExitReason,
  HandId,
  HandSettlement,
  HandStatus,
  HandValue,
  HandView,
  Outcome,
  TableError,
  TablePhase,
  TableView,
} from './types.js';

export const DEFAULT_DECKS = 6;
export const DEFAULT_CEILING = 999_999;
export const MAX_STACK = Number.MAX_SAFE_INTEGER;
export const DEALER_STANDS_ON = 17;
export const MIN_BET = 1;

const ACTION_KEYS = new Map<string, Action>([
  ['h', 'hit'],
  ['s', 'stand'],
  ['d', 'double'],
  ['2', 'split'],
]);

export type TableOptions = {
  stack: number;
  decks?: number;
  /** Pre-built shoe; `decks` and `rng` are ignored when given. */
  shoe?: Shoe;
  ceiling?: number;
  rng?: RNG;
};

type PlayerHand = {
  id: HandId;
  cards: Card[];
  status: HandStatus;
  bet: number;
  doubled: boolean;
};

function betError(reason: BetRejection, message: string): TableError {
  return { code: 'invalid_bet', reason, message };
}

function checkStack(value: number): Result<number, TableError> {
  if (!Number.isFinite(value) || value < 0 || value > MAX_STACK) {
    return err({ code: 'stack_out_of_range', value, message: `Player stack must be between 0 and ${MAX_STACK}` });
  }
  return ok(value);
}

function notPermitted(action: Action): string {
  switch (action) {
    case 'double':
      return 'You can only double on your first two cards, with enough chips to match the bet.';
    case 'split':
      return 'You can only split a pair of equal rank, once, as your first decision and with enough chips to match the bet.';
    default:
      return 'No hand is waiting for an action.';
  }
}

/**
 * One seat at a blackjack table: the player's stack, the shoe and the cards
 * of the hand in play.
 *
 * Every mutator returns a Result; a rejected call leaves the table exactly
 * as it was. At most one split hand is tracked and split hands cannot be
 * split again. The dealer stands on every 17, soft 17 included.
 */
export class Table {
  private stackValue: number;
  private phaseValue: TablePhase = 'awaiting_bet';
  private betPlaced = false;
  private dealerCards: Card[] = [];
  private player: PlayerHand = { id: 'primary', cards: [], status: 'done', bet: 0, doubled: false };
  private splitHand: PlayerHand | null = null;
  private reshuffleFlag = false;

  private constructor(
    private readonly shoe: Shoe,
    stack: number,
    readonly ceiling: number,
  ) {
    this.stackValue = stack;
    if (this.exitReason()) this.phaseValue = 'finished';
  }

  static create(opts: TableOptions): Result<Table, TableError> {
    const stack = checkStack(opts.stack);
    if (!stack.ok) return stack;
    let shoe = opts.shoe;
    if (!shoe) {
      const built = Shoe.create(opts.decks ?? DEFAULT_DECKS, opts.rng);
      if (!built.ok) return built;
      shoe = built.value;
    }
    return ok(new Table(shoe, stack.value, opts.ceiling ?? DEFAULT_CEILING));
  }

  get stack(): number {
    return this.stackValue;
  }

  get phase(): TablePhase {
    return this.phaseValue;
  }

  get reshuffle(): boolean {
    return this.reshuffleFlag;
  }

  get cardsRemaining(): number {
    return this.shoe.remaining;
  }

  setStack(value: number): Result<number, TableError> {
    const checked = checkStack(value);
    if (checked.ok) this.stackValue = checked.value;
    return checked;
  }

  /**
   * Before the deal this places (or replaces) the bet. Once cards are out
   * the only accepted value is double the active hand's bet, which doubles
   * down: the increment comes off the stack, one card is drawn and the hand
   * is done.
   */
  setBet(raw: string): Result<number, TableError> {
    if (this.phaseValue !== 'awaiting_bet' && this.phaseValue !== 'player_turn') {
      return err(betError('wrong_phase', 'Bets cannot be changed now.'));
    }
    const parsed = parseAmount(raw);
    if (!parsed.ok) return err(betError('bad_number', describeAmountError(parsed.error)));
    const value = parsed.value;
    if (value <= 0) return err(betError('non_positive', 'Bet must be greater than 0'));
    if (this.phaseValue === 'awaiting_bet') return this.placeBet(value);
    const doubled = this.doubleDown(value);
    if (doubled.ok) this.closeFinishedHands();
    return doubled;
  }

  private placeBet(value: number): Result<number, TableError> {
    if (value > this.stackValue) return err(betError('exceeds_stack', 'Bet must not be larger than remaining chips'));
    this.player.bet = value;
    this.betPlaced = true;
    return ok(value);
  }

  private doubleDown(value: number): Result<number, TableError> {
    const hand = this.activeHand();
    if (!hand) return err(betError('wrong_phase', 'No hand is waiting for a bet.'));
    if (hand.doubled || value !== hand.bet * 2 || hand.cards.length !== 2 || evaluateHand(hand.cards).blackjack) {
      return err(betError('not_an_increase', `A placed bet can only be doubled, to ${hand.bet * 2}, on the first two cards.`));
    }
    const increment = value - hand.bet;
    if (increment > this.stackValue) return err(betError('exceeds_stack', 'Bet must not be larger than remaining chips'));
    const drawn = this.take(1);
    if (!drawn.ok) return drawn;
    this.moveChips(-increment);
    hand.bet = value;
    hand.doubled = true;
    hand.cards.push(...drawn.value);
    hand.status = 'done';
    return ok(value);
  }

  dealInitial(): Result<TableView, TableError> {
    if (this.phaseValue !== 'awaiting_bet' || !this.betPlaced) {
      return err({ code: 'wrong_phase', phase: this.phaseValue, message: 'Place a bet before dealing.' });
    }
    if (this.player.bet > this.stackValue) {
      return err(betError('exceeds_stack', 'Bet must not be larger than remaining chips'));
    }
    const drawn = this.take(3);
    if (!drawn.ok) return drawn;
    const [p1, p2, d1] = drawn.value;
    this.moveChips(-this.player.bet);
    this.dealerCards = [d1];
    this.player = { id: 'primary', cards: [p1, p2], status: 'acting', bet: this.player.bet, doubled: false };
    this.splitHand = null;
    this.phaseValue = 'player_turn';
    this.closeFinishedHands();
    return ok(this.view());
  }

  actionPermitted(action: Action): boolean {
    const hand = this.activeHand();
    if (!hand || evaluateHand(hand.cards).blackjack) return false;
    switch (action) {
      case 'hit':
      case 'stand':
        return true;
      case 'double':
        return !hand.doubled && hand.cards.length === 2 && this.stackValue >= hand.bet;
      case 'split':
        return (
          this.splitHand === null &&
          hand.id === 'primary' &&
          hand.cards.length === 2 &&
          sameRank(hand.cards[0], hand.cards[1]) &&
          this.stackValue >= hand.bet
        );
    }
  }

  applyAction(key: string): Result<Action, TableError> {
    const action = ACTION_KEYS.get(key.trim().toLowerCase());
    if (!action) {
      return err({ code: 'illegal_action', action: null, message: 'invalid action! Please press h, s, d or 2' });
    }
    const hand = this.activeHand();
    if (!hand || !this.actionPermitted(action)) {
      return err({ code: 'illegal_action', action, message: notPermitted(action) });
    }
    const done = this.perform(action, hand);
    if (!done.ok) return done;
    this.closeFinishedHands();
    return ok(action);
  }

  private perform(action: Action, hand: PlayerHand): Result<void, TableError> {
    switch (action) {
      case 'hit': {
        const drawn = this.take(1);
        if (!drawn.ok) return drawn;
        hand.cards.push(...drawn.value);
        return ok(undefined);
      }
      case 'stand':
        hand.status = 'done';
        return ok(undefined);
      case 'double': {
        const doubled = this.doubleDown(hand.bet * 2);
        return doubled.ok ? ok(undefined) : doubled;
      }
      case 'split': {
        const drawn = this.take(2);
        if (!drawn.ok) return drawn;
        const [toPrimary, toSplit] = drawn.value;
        const [first, second] = hand.cards;
        this.moveChips(-hand.bet);
        this.splitHand = { id: 'split', cards: [second, toSplit], status: 'acting', bet: hand.bet, doubled: false };
        hand.cards = [first, toPrimary];
        return ok(undefined);
      }
    }
  }

  /**
   * Dealer takes the hole card, then draws to 17 unless the dealer or every
   * player hand already holds blackjack.
   */
  revealDealer(): Result<HandValue, TableError> {
    if (this.phaseValue !== 'dealer_turn') {
      return err({ code: 'wrong_phase', phase: this.phaseValue, message: 'The dealer plays once every hand is finished.' });
    }
    const cards = this.dealerCards.slice();
    const next = (): boolean => {
      const card = this.shoe.peek(cards.length - this.dealerCards.length);
      if (card === undefined) return false;
      cards.push(card);
      return true;
    };
    if (!next()) return this.emptyShoe();
    const playerBlackjack = this.hands().every((h) => evaluateHand(h.cards).blackjack);
    if (!evaluateHand(cards).blackjack && !playerBlackjack) {
      while (evaluateHand(cards).value < DEALER_STANDS_ON) {
        if (!next()) return this.emptyShoe();
      }
    }
    const drawn = this.take(cards.length - this.dealerCards.length);
    if (!drawn.ok) return drawn;
    this.dealerCards.push(...drawn.value);
    this.phaseValue = 'payout';
    return ok(evaluateHand(this.dealerCards));
  }

  settle(): Result<Outcome, TableError> {
    if (this.phaseValue !== 'payout') {
      return err({ code: 'wrong_phase', phase: this.phaseValue, message: 'Hands are settled after the dealer plays.' });
    }
    const dealer = evaluateHand(this.dealerCards);
    const hands: HandSettlement[] = this.hands().map((h) => {
      const { outcome, payout } = payoutFor(evaluateHand(h.cards), dealer, h.bet);
      return { hand: h.id, outcome, bet: h.bet, payout };
    });
    const payout = hands.reduce((acc, h) => acc + h.payout, 0);
    this.moveChips(payout);
    this.advanceShoeCheck();
    this.betPlaced = false;
    this.phaseValue = this.exitReason() ? 'finished' : 'awaiting_bet';
    return ok({ hands, payout, stack: this.stackValue, reshuffle: this.reshuffleFlag });
  }

  /** One-way: once the cut card is passed the flag stays set for this shoe. */
  advanceShoeCheck(): boolean {
    if (!this.reshuffleFlag && this.shoe.needsReshuffle()) this.reshuffleFlag = true;
    return this.reshuffleFlag;
  }

  exitReason(): ExitReason | null {
    if (this.phaseValue !== 'awaiting_bet' && this.phaseValue !== 'finished') return null;
    if (this.stackValue < MIN_BET) return 'out_of_chips';
    if (this.stackValue > this.ceiling) return 'ceiling_reached';
    if (this.reshuffleFlag) return 'reshuffle';
    return null;
  }

  view(): TableView {
    const active = this.activeHand();
    return {
      phase: this.phaseValue,
      stack: this.stackValue,
      bet: this.player.bet,
      splitBet: this.splitHand ? this.splitHand.bet : null,
      betPlaced: this.betPlaced,
      dealer: { cards: this.dealerCards.slice(), evaluation: evaluateHand(this.dealerCards) },
      player: handView(this.player),
      split: this.splitHand ? handView(this.splitHand) : null,
      active: active ? active.id : null,
      reshuffle: this.reshuffleFlag,
    };
  }

  private hands(): PlayerHand[] {
    return this.splitHand ? [this.player, this.splitHand] : [this.player];
  }

  private activeHand(): PlayerHand | null {
    if (this.phaseValue !== 'player_turn') return null;
    return this.hands().find((h) => h.status === 'acting') ?? null;
  }

  // Bust or blackjack ends input for that hand; no acting hand hands over to the dealer.
  private closeFinishedHands() {
    for (const h of this.hands()) {
      if (h.status !== 'acting') continue;
      const { value, blackjack } = evaluateHand(h.cards);
      if (value > 21 || blackjack) h.status = 'done';
    }
    if (this.phaseValue === 'player_turn' && !this.activeHand()) this.phaseValue = 'dealer_turn';
  }

  private take(n: number): Result<Card[], TableError> {
    if (this.shoe.remaining < n) return this.emptyShoe();
    const cards: Card[] = [];
    for (let i = 0; i < n; i++) {
      const card = this.shoe.pop();
      if (!card.ok) return card;
      cards.push(card.value);
    }
    return ok(cards);
  }

  private emptyShoe(): Result<never, TableError> {
    return err({ code: 'empty_shoe', message: 'The shoe is out of cards' });
  }

  private moveChips(delta: number) {
    const moved = this.setStack(this.stackValue + delta);
    if (!moved.ok) throw new BlackjackError(moved.error);
  }
}

function handView(h: PlayerHand): HandView {
  return { cards: h.cards.slice(), evaluation: evaluateHand(h.cards), status: h.status, bet: h.bet };
}
