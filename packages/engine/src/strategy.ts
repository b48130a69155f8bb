/**
 * Computer Strategy
 *
 * Heuristic policy for the computer seat. Every function here is pure:
 * the same dice and score situation always produce the same decision.
 *
 * Situational inputs:
 * - scoreDifference = computerScore - humanScore (negative when behind)
 * - pointsToTarget  = targetScore - computerScore
 *
 * Rules are checked top to bottom and the first one that applies decides.
 */

import type { DiceSet, DieValue, KeepMask } from './types'
import { sumDice } from './dice'

/** Dice at or above this value count as high */
const HIGH_DIE = 5

/** Dice at or below this value count as low */
const LOW_DIE = 2

export interface StrategyInput {
  readonly dice: DiceSet
  readonly scoreDifference: number
  readonly pointsToTarget: number
}

/**
 * Decide whether to take the first reroll.
 */
export function decideFirstReroll({ dice, scoreDifference, pointsToTarget }: StrategyInput): boolean {
  const total = sumDice(dice)
  const highCount = dice.filter(d => d >= HIGH_DIE).length
  const lowCount = dice.filter(d => d <= LOW_DIE).length

  // Already strong
  if (highCount >= 3 && total >= 22) return false
  // Too many weak dice
  if (lowCount >= 3) return true

  if (pointsToTarget < 30) return total < 20
  if (scoreDifference < -10) return total < 18
  if (scoreDifference > 10) return total < 15
  return total < 17
}

/**
 * Decide whether to take the second reroll.
 *
 * `firstRollDice` is the hand as it stood right after the first reroll;
 * high dice that are still unchanged from it count as locked in.
 */
export function decideSecondReroll({
  dice,
  firstRollDice,
  scoreDifference,
  pointsToTarget
}: StrategyInput & { readonly firstRollDice: DiceSet }): boolean {
  const total = sumDice(dice)
  if (total >= 25) return false

  const highKept = dice.filter((d, i) => d >= HIGH_DIE && d === firstRollDice[i]).length
  if (highKept >= 3) return false

  if (pointsToTarget < 20) return true
  if (scoreDifference < -20) return true
  if (scoreDifference > 20) return false
  return total < 20
}

function keepMiddleDie(value: DieValue, scoreDifference: number, pointsToTarget: number): boolean {
  if (scoreDifference > 15) return true
  if (pointsToTarget < 30) return value === 4
  if (scoreDifference < -15) return false
  return value === 4
}

function keepDie(value: DieValue, scoreDifference: number, pointsToTarget: number): boolean {
  if (value >= HIGH_DIE) return true
  if (value <= LOW_DIE) return false
  return keepMiddleDie(value, scoreDifference, pointsToTarget)
}

/**
 * Choose which dice to hold for the first reroll.
 *
 * The result always keeps at least one die: if no die qualifies, the first
 * occurrence of the highest value is kept.
 */
export function decideWhichDiceToKeep({ dice, scoreDifference, pointsToTarget }: StrategyInput): KeepMask {
  const keep = (i: 0 | 1 | 2 | 3 | 4): boolean => keepDie(dice[i], scoreDifference, pointsToTarget)
  const mask: KeepMask = [keep(0), keep(1), keep(2), keep(3), keep(4)]
  if (mask.some(Boolean)) return mask

  // Strict > keeps the lowest index on ties
  let best = 0
  dice.forEach((d, i) => {
    if (d > dice[best]) best = i
  })
  return [best === 0, best === 1, best === 2, best === 3, best === 4]
}
