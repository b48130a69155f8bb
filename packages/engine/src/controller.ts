/**
 * Match Controller
 *
 * Convenience facade over a match store for presentation layers that would
 * rather call methods than dispatch actions. Each method dispatches one
 * operation and returns its Result; nothing here holds state of its own.
 */

import { runComputerTurn, type ComputerTurn, type ComputerTurnOptions } from './computerTurn'
import type { DiceSet, MatchConfig, MatchState } from './types'
import { DEFAULT_TARGET_SCORE } from './types'
import type { RerollError, ScoreError, StartMatchError, ThrowError, TieBreakError } from './errors'
import { resetMatch } from './matchSlice'
import {
  performAbandonComputerTurn,
  performHumanReroll,
  performHumanScore,
  performHumanThrow,
  performStartMatch,
  performTieBreakRoll,
  type AbandonTurnResult,
  type HumanRerollResult,
  type HumanScoreResult,
  type TieBreakResult
} from './operations'
import { type Result, mapResult } from './result'
import { createMatchStore, resultOf, type MatchStore, type MatchStoreOptions } from './store'

export class MatchController {
  readonly store: MatchStore

  constructor(options: MatchStoreOptions = {}) {
    this.store = createMatchStore(options)
  }

  startMatch(config: MatchConfig = { targetScore: DEFAULT_TARGET_SCORE }): Result<MatchState, StartMatchError> {
    const result = resultOf(this.store.dispatch(performStartMatch(config)))
    return mapResult(result, value => value.match)
  }

  humanThrow(): Result<DiceSet, ThrowError> {
    const result = resultOf(this.store.dispatch(performHumanThrow()))
    return mapResult(result, value => value.turn.dice)
  }

  humanReroll(keepMask?: readonly boolean[]): Result<HumanRerollResult, RerollError> {
    return resultOf(this.store.dispatch(performHumanReroll({ keepMask })))
  }

  humanScore(): Result<HumanScoreResult, ScoreError> {
    return resultOf(this.store.dispatch(performHumanScore()))
  }

  runComputerTurn(options?: ComputerTurnOptions): ComputerTurn {
    return runComputerTurn(this.store, options)
  }

  /** Discard a computer turn left in progress */
  abandonComputerTurn(): Result<AbandonTurnResult, ThrowError> {
    return resultOf(this.store.dispatch(performAbandonComputerTurn()))
  }

  tieBreakRoll(): Result<TieBreakResult, TieBreakError> {
    return resultOf(this.store.dispatch(performTieBreakRoll()))
  }

  /** Read-only snapshot; null before the first match starts */
  getMatchState(): MatchState | null {
    return this.store.getState().match
  }

  resetMatch(): void {
    this.store.dispatch(resetMatch())
  }
}
