/**
 * Dice Utilities
 *
 * Random sources, single-die rolls and five-dice hands.
 */

import type { DiceSet, DieValue, KeepMask } from './types'

// =============================================================================
// Random Sources
// =============================================================================

/**
 * Source of uniformly distributed numbers in [0, 1).
 */
export type RandomSource = () => number

/**
 * Anything that can roll a single die. Injected into the store so tests
 * and replays can control every roll.
 */
export interface DiceRoller {
  rollDie(): DieValue
}

/**
 * Seedable PRNG (mulberry32). Same seed, same sequence.
 */
export function createSeededSource(seed: number): RandomSource {
  let s = seed | 0
  return () => {
    s = (s + 0x6d2b79f5) | 0
    let t = Math.imul(s ^ (s >>> 15), 1 | s)
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/**
 * Map a [0, 1) sample onto a die face.
 */
export function toDieValue(sample: number): DieValue {
  const face = Math.min(Math.floor(sample * 6), 5) + 1
  switch (face) {
    case 1:
      return 1
    case 2:
      return 2
    case 3:
      return 3
    case 4:
      return 4
    case 5:
      return 5
    default:
      return 6
  }
}

/**
 * Build a roller over a random source. Defaults to Math.random.
 */
export function createDiceRoller(source: RandomSource = Math.random): DiceRoller {
  return {
    rollDie: () => toDieValue(source())
  }
}

// =============================================================================
// Hands
// =============================================================================

/**
 * Roll five fresh dice.
 */
export function rollDiceSet(roller: DiceRoller): DiceSet {
  return [roller.rollDie(), roller.rollDie(), roller.rollDie(), roller.rollDie(), roller.rollDie()]
}

/**
 * Roll the positions where `reroll` is true, leaving the rest untouched.
 * Dice are rolled left to right so scripted rollers stay predictable.
 */
export function rerollPositions({
  dice,
  reroll,
  roller
}: {
  dice: DiceSet
  reroll: KeepMask
  roller: DiceRoller
}): DiceSet {
  const pick = (i: 0 | 1 | 2 | 3 | 4): DieValue => (reroll[i] ? roller.rollDie() : dice[i])
  return [pick(0), pick(1), pick(2), pick(3), pick(4)]
}

/**
 * Flip every entry of a mask.
 */
export function invertMask(mask: KeepMask): KeepMask {
  return [!mask[0], !mask[1], !mask[2], !mask[3], !mask[4]]
}

/**
 * Sum of all dice in a hand.
 */
export function sumDice(dice: readonly DieValue[]): number {
  return dice.reduce<number>((total, value) => total + value, 0)
}

/**
 * Number of `true` entries in a mask.
 */
export function countSelected(mask: readonly boolean[]): number {
  return mask.filter(Boolean).length
}
