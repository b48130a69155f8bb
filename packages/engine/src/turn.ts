/**
 * Turn Engine
 *
 * Pure state machine for a single player's turn:
 *
 *   (no record) -> thrown -> rerolled_once -> rerolled_twice -> committed
 *                    |             |                              ^
 *                    +-------------+---------- score -------------+
 *
 * Functions take a TurnRecord and return a new one; nothing is mutated.
 * A failed transition returns an error and the caller keeps the old record.
 */

import type { DiceRoller } from './dice'
import { countSelected, invertMask, rerollPositions, rollDiceSet, sumDice } from './dice'
import type { InvalidPhaseError, TurnError } from './errors'
import { type Result, ok, err } from './result'
import type { KeepMask, Participant, TurnRecord } from './types'
import { DICE_PER_HAND } from './types'

/** Fewest dice a human may keep on the first reroll */
export const MIN_KEPT_DICE = 1

/** Most dice a human may keep on the first reroll */
export const MAX_KEPT_DICE = DICE_PER_HAND - 1

/**
 * Throw all five dice to open a turn.
 */
export function throwTurn({ owner, roller }: { owner: Participant; roller: DiceRoller }): TurnRecord {
  const dice = rollDiceSet(roller)
  const total = sumDice(dice)
  return {
    owner,
    stage: 'thrown',
    dice,
    initialRollTotal: total,
    firstRerollTotal: 0,
    secondRerollTotal: 0,
    rerollsUsed: 0,
    runningTotal: total,
    keepMask: null
  }
}

/**
 * Whether a reroll is still available on this turn.
 */
export function canReroll(turn: TurnRecord): boolean {
  return turn.stage === 'thrown' || turn.stage === 'rerolled_once'
}

function stageError(turn: TurnRecord, action: string): InvalidPhaseError {
  return {
    type: 'invalid_phase',
    stage: turn.stage,
    message: `Cannot ${action} when the turn is ${turn.stage.replace('_', ' ')}.`
  }
}

/**
 * Reroll part of the hand.
 *
 * First reroll: `keepMask` marks the dice to HOLD and is remembered on the
 * record. With `enforceKeepRange` the mask must hold between 1 and 4 dice.
 *
 * Second reroll: no mask is taken. The stored first-reroll mask now marks
 * the dice to ROLL AGAIN, so the dice held last time are rerolled and the
 * dice just rerolled stay put.
 *
 * Either way the sum of all five dice afterwards is added to runningTotal.
 */
export function rerollTurn({
  turn,
  keepMask,
  roller,
  enforceKeepRange
}: {
  turn: TurnRecord
  keepMask: KeepMask | null
  roller: DiceRoller
  enforceKeepRange: boolean
}): Result<TurnRecord, TurnError> {
  if (!canReroll(turn)) {
    return err(stageError(turn, 'reroll'))
  }

  if (turn.stage === 'thrown') {
    if (keepMask === null) {
      return err({
        type: 'invalid_input',
        field: 'keepMask',
        message: 'The first reroll needs a keep mask of 5 booleans.'
      })
    }

    const keptCount = countSelected(keepMask)
    if (enforceKeepRange && (keptCount < MIN_KEPT_DICE || keptCount > MAX_KEPT_DICE)) {
      return err({
        type: 'invalid_selection',
        keptCount,
        message: `Select ${String(MIN_KEPT_DICE)}-${String(MAX_KEPT_DICE)} dice to keep (got ${String(keptCount)}).`
      })
    }

    const dice = rerollPositions({
      dice: turn.dice,
      reroll: invertMask(keepMask),
      roller
    })
    const rollTotal = sumDice(dice)
    return ok<TurnRecord>({
      ...turn,
      stage: 'rerolled_once',
      dice,
      firstRerollTotal: rollTotal,
      rerollsUsed: 1,
      runningTotal: turn.runningTotal + rollTotal,
      keepMask
    })
  }

  if (keepMask !== null) {
    return err({
      type: 'invalid_input',
      field: 'keepMask',
      message: 'The second reroll reuses the first-reroll selection; no keep mask is accepted.'
    })
  }
  if (turn.keepMask === null) {
    return err({
      type: 'invalid_input',
      field: 'keepMask',
      message: 'No keep mask from the first reroll to reuse.'
    })
  }

  const dice = rerollPositions({ dice: turn.dice, reroll: turn.keepMask, roller })
  const rollTotal = sumDice(dice)
  return ok<TurnRecord>({
    ...turn,
    stage: 'rerolled_twice',
    dice,
    secondRerollTotal: rollTotal,
    rerollsUsed: 2,
    runningTotal: turn.runningTotal + rollTotal
  })
}

/**
 * Stop rerolling and bank the running total.
 * Only allowed while a reroll is still available.
 */
export function scoreTurn(turn: TurnRecord): Result<TurnRecord, InvalidPhaseError> {
  if (!canReroll(turn)) {
    return err(stageError(turn, 'score'))
  }
  return ok<TurnRecord>({ ...turn, stage: 'committed' })
}

/**
 * Close the turn. A committed turn cannot be committed again, so its
 * total is never added twice.
 */
export function commitTurn(turn: TurnRecord): Result<TurnRecord, InvalidPhaseError> {
  if (turn.stage === 'committed') {
    return err(stageError(turn, 'commit'))
  }
  return ok<TurnRecord>({ ...turn, stage: 'committed' })
}
