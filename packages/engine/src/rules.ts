/**
 * Match Rules
 *
 * Pure helpers for match-level decisions: config validation, end-of-round
 * evaluation and the situational inputs fed to the computer strategy.
 */

import type { InvalidConfigError } from './errors'
import { type Result, ok, err } from './result'
import type { DiceSet, MatchConfig, MatchPhase, MatchState, Participant } from './types'
import { MIN_TARGET_SCORE } from './types'
import type { StrategyInput } from './strategy'

/**
 * Validate a match configuration.
 */
export function validateMatchConfig(config: MatchConfig): Result<MatchConfig, InvalidConfigError> {
  const { targetScore } = config
  if (!Number.isInteger(targetScore) || targetScore < MIN_TARGET_SCORE) {
    return err({
      type: 'invalid_config',
      field: 'targetScore',
      message: `Target score must be a whole number of at least ${String(MIN_TARGET_SCORE)} (got ${String(targetScore)}).`
    })
  }
  return ok({ targetScore })
}

export interface RoundOutcome {
  readonly phase: Extract<MatchPhase, 'awaiting_throw' | 'tie_break' | 'complete'>
  readonly winner: Participant | null
}

/**
 * Decide what follows a finished round.
 *
 * - both at or past the target: tie-break
 * - exactly one: that player wins
 * - neither: next round
 */
export function evaluateRoundEnd({
  humanScore,
  computerScore,
  targetScore
}: {
  humanScore: number
  computerScore: number
  targetScore: number
}): RoundOutcome {
  const humanReached = humanScore >= targetScore
  const computerReached = computerScore >= targetScore

  if (humanReached && computerReached) {
    return { phase: 'tie_break', winner: null }
  }
  if (humanReached) {
    return { phase: 'complete', winner: 'human' }
  }
  if (computerReached) {
    return { phase: 'complete', winner: 'computer' }
  }
  return { phase: 'awaiting_throw', winner: null }
}

/**
 * Situational strategy inputs from the computer's point of view.
 */
export function getStrategyInput({ state, dice }: { state: MatchState; dice: DiceSet }): StrategyInput {
  return {
    dice,
    scoreDifference: state.computerScore - state.humanScore,
    pointsToTarget: state.config.targetScore - state.computerScore
  }
}
