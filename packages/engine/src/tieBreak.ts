/**
 * Tie-Breaker
 *
 * Sudden death for when both players reach the target in the same round:
 * each side rolls five fresh dice and the higher sum takes the match.
 */

import type { DiceRoller } from './dice'
import { rollDiceSet, sumDice } from './dice'
import type { Participant, TieBreakRoll } from './types'

/**
 * Roll one tie-break attempt. The human's dice are rolled first.
 */
export function rollTieBreak(roller: DiceRoller): TieBreakRoll {
  const humanDice = rollDiceSet(roller)
  const computerDice = rollDiceSet(roller)
  return {
    humanDice,
    computerDice,
    humanTotal: sumDice(humanDice),
    computerTotal: sumDice(computerDice)
  }
}

/**
 * Winner of an attempt, or null when the sums are equal and the
 * tie-break has to be rolled again.
 */
export function resolveTieBreak(roll: TieBreakRoll): Participant | null {
  if (roll.humanTotal === roll.computerTotal) return null
  return roll.humanTotal > roll.computerTotal ? 'human' : 'computer'
}
