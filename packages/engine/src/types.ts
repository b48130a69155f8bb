/**
 * Dice Duel Type Definitions
 *
 * Design principles:
 * - Serializable: all state is plain JSON so it can cross the MCP transport
 * - Immutable-friendly: readonly throughout for Redux compatibility
 * - Fixed arity: a hand is always exactly five dice
 */

// =============================================================================
// Primitives
// =============================================================================

/** The two seats at the table */
export type Participant = 'human' | 'computer'

/** Valid die values (1-6) */
export type DieValue = 1 | 2 | 3 | 4 | 5 | 6

/** Number of dice in every hand */
export const DICE_PER_HAND = 5

/** Lowest target score a match may be played to */
export const MIN_TARGET_SCORE = 10

/** Target score used when none is configured */
export const DEFAULT_TARGET_SCORE = 101

/** Five dice, in table order */
export type DiceSet = readonly [DieValue, DieValue, DieValue, DieValue, DieValue]

/**
 * Per-die selection aligned with a DiceSet.
 *
 * On the first reroll `true` means the die is kept. On the second reroll the
 * same mask is reused and `true` means the die is rolled again.
 */
export type KeepMask = readonly [boolean, boolean, boolean, boolean, boolean]

/**
 * Type guard for a five-entry keep mask.
 */
export function isKeepMask(values: readonly unknown[]): values is KeepMask {
  return values.length === DICE_PER_HAND && values.every(v => typeof v === 'boolean')
}

// =============================================================================
// Turn State
// =============================================================================

/**
 * Where a single turn stands.
 *
 * A turn that has not been thrown yet has no record at all.
 */
export type TurnStage = 'thrown' | 'rerolled_once' | 'rerolled_twice' | 'committed'

/** Number of rerolls taken this turn */
export type RerollCount = 0 | 1 | 2

/**
 * One player's turn: the initial throw plus up to two rerolls.
 *
 * Every reroll adds the full sum of the five dice to the running total, so
 * runningTotal === initialRollTotal + firstRerollTotal + secondRerollTotal.
 */
export interface TurnRecord {
  readonly owner: Participant
  readonly stage: TurnStage
  readonly dice: DiceSet
  readonly initialRollTotal: number
  readonly firstRerollTotal: number
  readonly secondRerollTotal: number
  readonly rerollsUsed: RerollCount
  readonly runningTotal: number
  /** Mask used for the first reroll, kept for the second */
  readonly keepMask: KeepMask | null
}

// =============================================================================
// Match State
// =============================================================================

/** Configuration for starting a match */
export interface MatchConfig {
  readonly targetScore: number
}

/** Match lifecycle phases */
export type MatchPhase =
  | 'awaiting_throw'
  | 'awaiting_human_decision'
  | 'computer_turn'
  | 'tie_break'
  | 'complete'

/** A committed turn, as recorded in the match history */
export interface CompletedTurn {
  readonly owner: Participant
  readonly round: number
  readonly dice: DiceSet
  readonly rerollsUsed: RerollCount
  readonly total: number
}

/** One sudden-death roll-off */
export interface TieBreakRoll {
  readonly humanDice: DiceSet
  readonly computerDice: DiceSet
  readonly humanTotal: number
  readonly computerTotal: number
}

export interface TieBreakState {
  readonly attempts: readonly TieBreakRoll[]
}

/**
 * Complete match state
 *
 * Scores only ever grow. `turn` holds the turn in progress, or the last
 * committed turn until the next throw replaces it.
 */
export interface MatchState {
  readonly config: MatchConfig
  readonly humanScore: number
  readonly computerScore: number
  readonly phase: MatchPhase
  /** 1-based; a round is the human's turn followed by the computer's */
  readonly round: number
  readonly turn: TurnRecord | null
  readonly winner: Participant | null
  /** Null until both players reach the target in the same round */
  readonly tieBreak: TieBreakState | null
  readonly history: readonly CompletedTurn[]
}
