/**
 * Match Operations
 *
 * Every engine operation is a sync thunk. The payload creator validates the
 * request against the current state, rolls whatever dice it needs through the
 * injected roller, and returns a Result holding the next MatchState. The
 * match slice stores that state as-is, so a failed operation changes nothing.
 */

import type { DiceRoller } from './dice'
import { sumDice } from './dice'
import type {
  ComputerStepError,
  InvalidPhaseError,
  NoMatchError,
  RerollError,
  ScoreError,
  StartMatchError,
  ThrowError,
  TieBreakError
} from './errors'
import { type Result, ok, err } from './result'
import { evaluateRoundEnd, getStrategyInput, validateMatchConfig } from './rules'
import { decideFirstReroll, decideSecondReroll, decideWhichDiceToKeep } from './strategy'
import { buildCreateSyncThunk } from './syncThunk'
import { resolveTieBreak, rollTieBreak } from './tieBreak'
import { canReroll, commitTurn, rerollTurn, scoreTurn, throwTurn } from './turn'
import type {
  CompletedTurn,
  DiceSet,
  KeepMask,
  MatchConfig,
  MatchPhase,
  MatchState,
  Participant,
  TieBreakRoll,
  TurnRecord
} from './types'
import { isKeepMask } from './types'

/** State shape for operations - matches the expected store shape */
export type RootState = { match: MatchState | null }

/** Extra argument handed to every payload creator */
export interface EngineExtra {
  readonly roller: DiceRoller
}

// =============================================================================
// Result Types
// =============================================================================

/** Every successful operation carries the state it leads to */
interface Transition {
  readonly match: MatchState
}

export interface ThrowResult extends Transition {
  readonly turn: TurnRecord
}

export interface HumanRerollResult extends Transition {
  readonly turn: TurnRecord
  /** True when this was the second reroll and the turn auto-committed */
  readonly committed: boolean
}

export interface HumanScoreResult extends Transition {
  readonly turn: TurnRecord
  readonly total: number
}

export type ComputerStepResult = Transition &
  (
    | {
        readonly decision: 'reroll'
        readonly rerollNumber: 1 | 2
        /** Positions held (first reroll) or rolled again (second reroll) */
        readonly mask: KeepMask
        readonly turn: TurnRecord
        readonly log: readonly string[]
      }
    | {
        readonly decision: 'stand'
        readonly rerollNumber: 1 | 2
        readonly turn: TurnRecord
        readonly log: readonly string[]
      }
  )

export interface ComputerCommitResult extends Transition {
  readonly turn: TurnRecord
  readonly total: number
}

export interface AbandonTurnResult extends Transition {
  readonly discarded: TurnRecord | null
}

export interface TieBreakResult extends Transition {
  readonly roll: TieBreakRoll
  readonly winner: Participant | null
}

// =============================================================================
// Input Types
// =============================================================================

export interface HumanRerollInput {
  /**
   * First reroll: dice to keep (1-4 of them).
   * Second reroll: dice to roll again; omit to reuse the first-reroll mask.
   */
  readonly keepMask?: readonly boolean[]
}

// =============================================================================
// Helpers
// =============================================================================

const createSyncThunk = buildCreateSyncThunk<RootState, EngineExtra>()

const NO_MATCH: NoMatchError = {
  type: 'no_match',
  message: 'No match in progress. Use startMatch first.'
}

function phaseError(phase: MatchPhase, action: string): InvalidPhaseError {
  return {
    type: 'invalid_phase',
    phase,
    message: `Cannot ${action} in ${phase} phase.`
  }
}

function formatDice(dice: readonly number[]): string {
  return dice.join(', ')
}

function maskedValues(dice: DiceSet, mask: KeepMask): number[] {
  return dice.filter((_, i) => mask[i])
}

function toCompletedTurn(turn: TurnRecord, round: number): CompletedTurn {
  return {
    owner: turn.owner,
    round,
    dice: turn.dice,
    rerollsUsed: turn.rerollsUsed,
    total: turn.runningTotal
  }
}

/**
 * Bank the human's committed turn and hand over to the computer.
 */
function afterHumanCommit(match: MatchState, turn: TurnRecord): MatchState {
  return {
    ...match,
    humanScore: match.humanScore + turn.runningTotal,
    phase: 'computer_turn',
    turn,
    history: [...match.history, toCompletedTurn(turn, match.round)]
  }
}

/**
 * The human's turn in progress, or an error explaining why there is none.
 */
type ActiveTurn = Result<{ match: MatchState; turn: TurnRecord }, NoMatchError | InvalidPhaseError>

function getHumanTurn(match: MatchState | null, action: string): ActiveTurn {
  if (match === null) return err(NO_MATCH)
  const turn = match.turn
  if (match.phase !== 'awaiting_human_decision' || turn === null || turn.owner !== 'human') {
    return err(phaseError(match.phase, action))
  }
  return ok({ match, turn })
}

/**
 * The computer's turn in progress, or an error explaining why there is none.
 */
function getComputerTurn(match: MatchState | null, action: string): ActiveTurn {
  if (match === null) return err(NO_MATCH)
  if (match.phase !== 'computer_turn') {
    return err(phaseError(match.phase, action))
  }
  const turn = match.turn
  if (turn === null || turn.owner !== 'computer') {
    return err({
      type: 'invalid_phase',
      phase: match.phase,
      message: `Cannot ${action} before the computer has thrown.`
    })
  }
  return ok({ match, turn })
}

// =============================================================================
// Operations
// =============================================================================

/**
 * Start a new match. Scores reset to zero and the human throws first.
 */
export const performStartMatch = createSyncThunk<Result<Transition, StartMatchError>, MatchConfig>(
  'match/performStartMatch',
  config => {
    const validated = validateMatchConfig(config)
    if (!validated.ok) return validated

    return ok({
      match: {
        config: validated.value,
        humanScore: 0,
        computerScore: 0,
        phase: 'awaiting_throw',
        round: 1,
        turn: null,
        winner: null,
        tieBreak: null,
        history: []
      }
    })
  }
)

/**
 * Throw all five dice to open the human's turn.
 */
export const performHumanThrow = createSyncThunk<Result<ThrowResult, ThrowError>>(
  'match/performHumanThrow',
  (_arg, { getState, extra }) => {
    const match = getState().match
    if (match === null) return err(NO_MATCH)
    if (match.phase !== 'awaiting_throw') {
      return err(phaseError(match.phase, 'throw'))
    }

    const turn = throwTurn({ owner: 'human', roller: extra.roller })
    return ok({
      turn,
      match: { ...match, phase: 'awaiting_human_decision', turn }
    })
  }
)

/**
 * Reroll part of the human's hand. After the second reroll the turn
 * commits on its own and play passes to the computer.
 */
export const performHumanReroll = createSyncThunk<Result<HumanRerollResult, RerollError>, HumanRerollInput>(
  'match/performHumanReroll',
  (input, { getState, extra }) => {
    const current = getHumanTurn(getState().match, 'reroll')
    if (!current.ok) return current
    const { match, turn } = current.value

    let keepMask: KeepMask | null = null
    if (input.keepMask !== undefined) {
      if (!isKeepMask(input.keepMask)) {
        return err({
          type: 'invalid_input',
          field: 'keepMask',
          message: `Keep mask must be exactly 5 booleans (got ${String(input.keepMask.length)} entries).`
        })
      }
      const [a, b, c, d, e] = input.keepMask
      keepMask = [a, b, c, d, e]
    }

    const rerolled = rerollTurn({ turn, keepMask, roller: extra.roller, enforceKeepRange: true })
    if (!rerolled.ok) return rerolled

    if (rerolled.value.stage !== 'rerolled_twice') {
      return ok({
        turn: rerolled.value,
        committed: false,
        match: { ...match, turn: rerolled.value }
      })
    }

    const committed = commitTurn(rerolled.value)
    if (!committed.ok) return committed
    return ok({
      turn: committed.value,
      committed: true,
      match: afterHumanCommit(match, committed.value)
    })
  }
)

/**
 * End the human's turn early and bank the running total.
 */
export const performHumanScore = createSyncThunk<Result<HumanScoreResult, ScoreError>>(
  'match/performHumanScore',
  (_arg, { getState }) => {
    const current = getHumanTurn(getState().match, 'score')
    if (!current.ok) return current
    const { match, turn } = current.value

    const scored = scoreTurn(turn)
    if (!scored.ok) return scored

    return ok({
      turn: scored.value,
      total: scored.value.runningTotal,
      match: afterHumanCommit(match, scored.value)
    })
  }
)

/**
 * Throw all five dice to open the computer's turn.
 */
export const performComputerThrow = createSyncThunk<Result<ThrowResult, ThrowError>>(
  'match/performComputerThrow',
  (_arg, { getState, extra }) => {
    const match = getState().match
    if (match === null) return err(NO_MATCH)
    if (match.phase !== 'computer_turn') {
      return err(phaseError(match.phase, 'throw for the computer'))
    }
    const previous = match.turn
    if (previous !== null && previous.owner === 'computer') {
      return err({
        type: 'invalid_phase',
        phase: match.phase,
        stage: previous.stage,
        message: 'The computer has already thrown this turn.'
      })
    }

    const turn = throwTurn({ owner: 'computer', roller: extra.roller })
    return ok({ turn, match: { ...match, turn } })
  }
)

/**
 * Let the strategy make the computer's next reroll decision and carry it out.
 *
 * First reroll: the strategy picks which dice to hold.
 * Second reroll: the first-reroll mask is reused and the dice it held are
 * the ones rolled again; the strategy is not consulted for the mask.
 */
export const performComputerStep = createSyncThunk<Result<ComputerStepResult, ComputerStepError>>(
  'match/performComputerStep',
  (_arg, { getState, extra }) => {
    const current = getComputerTurn(getState().match, 'decide a reroll')
    if (!current.ok) return current
    const { match, turn } = current.value

    if (!canReroll(turn)) {
      return err({
        type: 'invalid_phase',
        phase: match.phase,
        stage: turn.stage,
        message: 'The computer has no rerolls left this turn.'
      })
    }

    const rerollNumber = turn.stage === 'thrown' ? 1 : 2
    const input = getStrategyInput({ state: match, dice: turn.dice })
    const shouldReroll =
      rerollNumber === 1
        ? decideFirstReroll(input)
        : decideSecondReroll({ ...input, firstRollDice: turn.dice })

    if (!shouldReroll) {
      return ok({
        decision: 'stand',
        rerollNumber,
        turn,
        log: [`Decided not to reroll #${String(rerollNumber)}`],
        match
      })
    }

    const mask = rerollNumber === 1 ? decideWhichDiceToKeep(input) : turn.keepMask
    if (mask === null) {
      return err({
        type: 'invalid_phase',
        phase: match.phase,
        stage: turn.stage,
        message: 'No keep mask recorded from the first reroll.'
      })
    }

    const rerolled = rerollTurn({
      turn,
      keepMask: rerollNumber === 1 ? mask : null,
      roller: extra.roller,
      enforceKeepRange: false
    })
    if (!rerolled.ok) return rerolled
    const next = rerolled.value

    const verb = rerollNumber === 1 ? 'keeping' : 'rerolling'
    return ok({
      decision: 'reroll',
      rerollNumber,
      mask,
      turn: next,
      log: [
        `Reroll #${String(rerollNumber)}: ${verb} [${formatDice(maskedValues(turn.dice, mask))}]`,
        `New roll: ${formatDice(next.dice)} = ${String(sumDice(next.dice))}`
      ],
      match: { ...match, turn: next }
    })
  }
)

/**
 * Bank the computer's running total and settle the round.
 */
export const performComputerCommit = createSyncThunk<Result<ComputerCommitResult, ComputerStepError>>(
  'match/performComputerCommit',
  (_arg, { getState }) => {
    const current = getComputerTurn(getState().match, 'commit')
    if (!current.ok) return current
    const { match, turn } = current.value

    const committed = commitTurn(turn)
    if (!committed.ok) return committed

    const computerScore = match.computerScore + committed.value.runningTotal
    const outcome = evaluateRoundEnd({
      humanScore: match.humanScore,
      computerScore,
      targetScore: match.config.targetScore
    })

    return ok({
      turn: committed.value,
      total: committed.value.runningTotal,
      match: {
        ...match,
        computerScore,
        phase: outcome.phase,
        winner: outcome.winner,
        round: outcome.phase === 'awaiting_throw' ? match.round + 1 : match.round,
        turn: committed.value,
        tieBreak: outcome.phase === 'tie_break' ? { attempts: [] } : match.tieBreak,
        history: [...match.history, toCompletedTurn(committed.value, match.round)]
      }
    })
  }
)

/**
 * Throw away the computer's turn in progress. Scores and phase stay as they
 * were, so the turn can be run again from the top.
 */
export const performAbandonComputerTurn = createSyncThunk<Result<AbandonTurnResult, ThrowError>>(
  'match/performAbandonComputerTurn',
  (_arg, { getState }) => {
    const match = getState().match
    if (match === null) return err(NO_MATCH)
    if (match.phase !== 'computer_turn') {
      return err(phaseError(match.phase, 'abandon the computer turn'))
    }

    const turn = match.turn
    const discarded = turn !== null && turn.owner === 'computer' ? turn : null
    return ok({
      discarded,
      match: discarded === null ? match : { ...match, turn: null }
    })
  }
)

/**
 * Roll one sudden-death attempt. Equal sums leave the match in tie_break
 * and the caller rolls again.
 */
export const performTieBreakRoll = createSyncThunk<Result<TieBreakResult, TieBreakError>>(
  'match/performTieBreakRoll',
  (_arg, { getState, extra }) => {
    const match = getState().match
    if (match === null) return err(NO_MATCH)
    if (match.phase !== 'tie_break') {
      return err(phaseError(match.phase, 'roll a tie-break'))
    }

    const roll = rollTieBreak(extra.roller)
    const winner = resolveTieBreak(roll)
    const attempts = [...(match.tieBreak?.attempts ?? []), roll]

    return ok({
      roll,
      winner,
      match: {
        ...match,
        phase: winner === null ? 'tie_break' : 'complete',
        winner,
        tieBreak: { attempts }
      }
    })
  }
)
