/**
 * Match Slice
 *
 * Redux slice that owns the MatchState for one match. Operations compute the
 * next state in their payload creators; the slice only stores successful
 * results, so reducers stay free of rules and randomness.
 *
 * The state is null until a match is started.
 */

import { createSelector, createSlice } from '@reduxjs/toolkit'
import {
  performAbandonComputerTurn,
  performComputerCommit,
  performComputerStep,
  performComputerThrow,
  performHumanReroll,
  performHumanScore,
  performHumanThrow,
  performStartMatch,
  performTieBreakRoll,
  type RootState
} from './operations'
import { canReroll } from './turn'
import type { MatchState, Participant } from './types'

export const matchSlice = createSlice({
  name: 'match',
  initialState: null as MatchState | null,
  reducers: {
    /** Abandon the match and clear all state */
    resetMatch(): MatchState | null {
      return null
    }
  },
  extraReducers: builder => {
    builder.addMatcher(performStartMatch.match, (state, action) => {
      const result = action.meta.result
      return result?.ok === true ? result.value.match : state
    })

    builder.addMatcher(performHumanThrow.match, (state, action) => {
      const result = action.meta.result
      return result?.ok === true ? result.value.match : state
    })

    builder.addMatcher(performHumanReroll.match, (state, action) => {
      const result = action.meta.result
      return result?.ok === true ? result.value.match : state
    })

    builder.addMatcher(performHumanScore.match, (state, action) => {
      const result = action.meta.result
      return result?.ok === true ? result.value.match : state
    })

    builder.addMatcher(performComputerThrow.match, (state, action) => {
      const result = action.meta.result
      return result?.ok === true ? result.value.match : state
    })

    builder.addMatcher(performComputerStep.match, (state, action) => {
      const result = action.meta.result
      return result?.ok === true ? result.value.match : state
    })

    builder.addMatcher(performComputerCommit.match, (state, action) => {
      const result = action.meta.result
      return result?.ok === true ? result.value.match : state
    })

    builder.addMatcher(performAbandonComputerTurn.match, (state, action) => {
      const result = action.meta.result
      return result?.ok === true ? result.value.match : state
    })

    builder.addMatcher(performTieBreakRoll.match, (state, action) => {
      const result = action.meta.result
      return result?.ok === true ? result.value.match : state
    })
  }
})

export const { resetMatch } = matchSlice.actions

// =============================================================================
// Selectors
// =============================================================================

export const selectMatchState = (state: RootState): MatchState | null => state.match

export const selectPhase = (state: RootState) => state.match?.phase ?? null
export const selectScores = (state: RootState) =>
  state.match === null
    ? null
    : { human: state.match.humanScore, computer: state.match.computerScore }
export const selectTargetScore = (state: RootState) => state.match?.config.targetScore ?? null
export const selectTurn = (state: RootState) => state.match?.turn ?? null
export const selectWinner = (state: RootState): Participant | null => state.match?.winner ?? null
export const selectIsMatchComplete = (state: RootState) => state.match?.phase === 'complete'
export const selectCanThrow = (state: RootState) => state.match?.phase === 'awaiting_throw'
export const selectTieBreakAttempts = (state: RootState) => state.match?.tieBreak?.attempts ?? []

export const selectCanHumanReroll = createSelector([selectMatchState], match => {
  if (match === null || match.phase !== 'awaiting_human_decision' || match.turn === null) {
    return false
  }
  return canReroll(match.turn)
})

export default matchSlice.reducer
