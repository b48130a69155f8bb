/**
 * Engine Error Types
 *
 * Every failure is a plain value so it can be returned in a Result and sent
 * over the wire unchanged. None of them are fatal: the caller re-prompts and
 * resubmits.
 */

import type { MatchConfig, MatchPhase, TurnStage } from './types'

export type NoMatchError = {
  readonly type: 'no_match'
  readonly message: string
}

/** Operation invoked outside its legal match phase or turn stage */
export type InvalidPhaseError = {
  readonly type: 'invalid_phase'
  readonly phase?: MatchPhase
  readonly stage?: TurnStage
  readonly message: string
}

/** Human first-reroll keep count outside [1, 4] */
export type InvalidSelectionError = {
  readonly type: 'invalid_selection'
  readonly keptCount: number
  readonly message: string
}

export type InvalidInputError = {
  readonly type: 'invalid_input'
  readonly field: string
  readonly message: string
}

export type InvalidConfigError = {
  readonly type: 'invalid_config'
  readonly field: keyof MatchConfig
  readonly message: string
}

export type AbortedError = {
  readonly type: 'aborted'
  readonly message: string
}

export type TurnError = InvalidPhaseError | InvalidSelectionError | InvalidInputError

export type StartMatchError = InvalidConfigError

export type ThrowError = NoMatchError | InvalidPhaseError

export type RerollError = NoMatchError | TurnError

export type ScoreError = NoMatchError | InvalidPhaseError

export type ComputerStepError = NoMatchError | TurnError

export type TieBreakError = NoMatchError | InvalidPhaseError

export type ComputerTurnError = ComputerStepError | AbortedError
