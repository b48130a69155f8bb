/**
 * Computer Turn Driver
 *
 * Plays the computer's turn as a lazy sequence of decision points:
 *
 *   initial_roll -> reroll #1 (if taken) -> reroll #2 (if taken) -> committed
 *
 * Between decision points the driver awaits `pause(delayMs)` so a viewer can
 * follow along. The pause is only pacing: decisions depend on the dice and
 * scores alone, never on timing. If the abort signal fires at a pause, the
 * turn in progress is discarded and nothing is committed.
 *
 * Stopping the generator early (`break` in `for await`, or `return()`) also
 * discards the uncommitted turn. The generator is single-use; run a fresh
 * one for every computer turn.
 */

import { sumDice } from './dice'
import type { ComputerTurnError } from './errors'
import {
  performAbandonComputerTurn,
  performComputerCommit,
  performComputerStep,
  performComputerThrow
} from './operations'
import { type Result, ok, err } from './result'
import { type MatchStore, resultOf } from './store'
import type { DiceSet, MatchPhase, MatchState, Participant } from './types'

// =============================================================================
// Types
// =============================================================================

export type ComputerTurnStep =
  | {
      readonly kind: 'initial_roll'
      readonly dice: DiceSet
      readonly rollTotal: number
      readonly runningTotal: number
      readonly log: readonly string[]
    }
  | {
      readonly kind: 'reroll'
      readonly rerollNumber: 1 | 2
      readonly dice: DiceSet
      readonly rollTotal: number
      readonly runningTotal: number
      readonly log: readonly string[]
    }
  | {
      readonly kind: 'committed'
      readonly dice: DiceSet
      /** Points banked this turn */
      readonly total: number
      readonly computerScore: number
      readonly phase: MatchPhase
      readonly winner: Participant | null
      readonly log: readonly string[]
    }

export interface ComputerTurnOutcome {
  readonly total: number
  readonly match: MatchState
  /** Every log line of the turn, in order */
  readonly log: readonly string[]
}

export interface ComputerTurnOptions {
  /** Pause length between decision points. Defaults to 0. */
  readonly delayMs?: number
  /** Suspension point between decisions. Defaults to a timer. */
  readonly pause?: (ms: number) => Promise<void>
  readonly signal?: AbortSignal
}

export type ComputerTurn = AsyncGenerator<
  ComputerTurnStep,
  Result<ComputerTurnOutcome, ComputerTurnError>,
  undefined
>

// =============================================================================
// Driver
// =============================================================================

const MAX_REROLLS = 2

/**
 * Resolve after `ms` milliseconds without blocking the event loop.
 */
export function wait(ms: number): Promise<void> {
  return new Promise(resolve => {
    setTimeout(resolve, ms)
  })
}

function aborted(store: MatchStore): Result<never, ComputerTurnError> {
  const abandoned = resultOf(store.dispatch(performAbandonComputerTurn()))
  if (!abandoned.ok) return abandoned
  return err({ type: 'aborted', message: 'Computer turn aborted; nothing was committed.' })
}

/**
 * Drop a computer turn left behind by a consumer that stopped early.
 */
function discardUnfinishedTurn(store: MatchStore): void {
  const match = store.getState().match
  if (match === null || match.phase !== 'computer_turn') return
  if (match.turn === null || match.turn.owner !== 'computer') return
  store.dispatch(performAbandonComputerTurn())
}

/**
 * Run the computer's turn against a store whose match is in computer_turn.
 *
 * Yields one step per decision point and finishes with the committed score.
 * The generator's return value reports the outcome, or why the turn could
 * not be played.
 */
export async function* runComputerTurn(
  store: MatchStore,
  { delayMs = 0, pause = wait, signal }: ComputerTurnOptions = {}
): ComputerTurn {
  if (signal?.aborted === true) {
    return err({ type: 'aborted', message: 'Computer turn aborted before it started.' })
  }

  const thrown = resultOf(store.dispatch(performComputerThrow()))
  if (!thrown.ok) return thrown

  let finished = false
  try {
    const log: string[] = []
    const opening = thrown.value.turn
    const openingLine = `First roll: ${opening.dice.join(', ')} = ${String(opening.initialRollTotal)}`
    log.push(openingLine)
    yield {
      kind: 'initial_roll',
      dice: opening.dice,
      rollTotal: opening.initialRollTotal,
      runningTotal: opening.runningTotal,
      log: [openingLine]
    }

    const standLines: string[] = []
    for (let taken = 0; taken < MAX_REROLLS; taken++) {
      await pause(delayMs)
      if (signal?.aborted) return aborted(store)

      const step = resultOf(store.dispatch(performComputerStep()))
      if (!step.ok) return step

      log.push(...step.value.log)
      if (step.value.decision === 'stand') {
        standLines.push(...step.value.log)
        break
      }

      const { turn, rerollNumber } = step.value
      yield {
        kind: 'reroll',
        rerollNumber,
        dice: turn.dice,
        rollTotal: sumDice(turn.dice),
        runningTotal: turn.runningTotal,
        log: step.value.log
      }
    }

    const committed = resultOf(store.dispatch(performComputerCommit()))
    if (!committed.ok) return committed

    finished = true
    const { match, total, turn } = committed.value
    const finalLine = `Final total: ${String(total)}`
    log.push(finalLine)
    yield {
      kind: 'committed',
      dice: turn.dice,
      total,
      computerScore: match.computerScore,
      phase: match.phase,
      winner: match.winner,
      log: [...standLines, finalLine]
    }

    return ok({ total, match, log })
  } finally {
    if (!finished) discardUnfinishedTurn(store)
  }
}
