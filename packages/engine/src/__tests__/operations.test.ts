/**
 * Integration tests for match operations
 *
 * Runs the sync thunk operations against a real store with scripted dice
 * to verify state transitions and Result values.
 */

import { describe, it, expect } from 'vitest'
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
  resetMatch,
  resultOf,
  selectCanHumanReroll,
  selectCanThrow,
  selectIsMatchComplete,
  selectPhase,
  selectScores,
  selectTargetScore,
  selectTieBreakAttempts,
  selectTurn,
  selectWinner,
  type MatchStore
} from '../index'
import { createMatchState, createScriptedStore } from './testUtils'

function getMatch(store: MatchStore) {
  const match = store.getState().match
  if (match === null) throw new Error('Expected a match in progress')
  return match
}

// =============================================================================
// Starting a match
// =============================================================================

describe('performStartMatch', () => {
  it('starts at zero with the human to throw', () => {
    const { store } = createScriptedStore([])
    const result = resultOf(store.dispatch(performStartMatch({ targetScore: 101 })))

    expect(result.ok).toBe(true)
    const match = getMatch(store)
    expect(match.config.targetScore).toBe(101)
    expect(match.humanScore).toBe(0)
    expect(match.computerScore).toBe(0)
    expect(match.phase).toBe('awaiting_throw')
    expect(match.round).toBe(1)
    expect(match.turn).toBeNull()
    expect(selectCanThrow(store.getState())).toBe(true)
  })

  it('rejects a target below the minimum and keeps the state empty', () => {
    const { store } = createScriptedStore([])
    const result = resultOf(store.dispatch(performStartMatch({ targetScore: 9 })))

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.type).toBe('invalid_config')
    expect(store.getState().match).toBeNull()
  })

  it('replaces a match in progress', () => {
    const { store } = createScriptedStore([], createMatchState({ humanScore: 40, computerScore: 33, round: 4 }))
    store.dispatch(performStartMatch({ targetScore: 50 }))

    expect(selectScores(store.getState())).toEqual({ human: 0, computer: 0 })
    expect(getMatch(store).round).toBe(1)
  })
})

// =============================================================================
// Human turn
// =============================================================================

describe('human turn', () => {
  it('fails with no_match before a match starts', () => {
    const { store } = createScriptedStore([])
    const result = resultOf(store.dispatch(performHumanThrow()))

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.type).toBe('no_match')
  })

  it('throws five dice and waits for a decision', () => {
    const { store } = createScriptedStore([6, 6, 6, 6, 6], createMatchState())
    const result = resultOf(store.dispatch(performHumanThrow()))

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.turn.dice).toEqual([6, 6, 6, 6, 6])
    expect(getMatch(store).phase).toBe('awaiting_human_decision')
    expect(selectCanHumanReroll(store.getState())).toBe(true)
  })

  it('cannot throw twice', () => {
    const { store } = createScriptedStore([6, 6, 6, 6, 6], createMatchState())
    store.dispatch(performHumanThrow())
    const result = resultOf(store.dispatch(performHumanThrow()))

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.message).toBe('Cannot throw in awaiting_human_decision phase.')
  })

  it('cannot score before throwing', () => {
    const { store } = createScriptedStore([], createMatchState())
    const result = resultOf(store.dispatch(performHumanScore()))

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error).toEqual({
      type: 'invalid_phase',
      phase: 'awaiting_throw',
      message: 'Cannot score in awaiting_throw phase.'
    })
  })

  it('banks the throw and hands over to the computer', () => {
    const { store } = createScriptedStore([6, 6, 6, 6, 6], createMatchState())
    store.dispatch(performHumanThrow())
    const result = resultOf(store.dispatch(performHumanScore()))

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.total).toBe(30)

    const match = getMatch(store)
    expect(match.humanScore).toBe(30)
    expect(match.phase).toBe('computer_turn')
    expect(match.history).toEqual([
      { owner: 'human', round: 1, dice: [6, 6, 6, 6, 6], rerollsUsed: 0, total: 30 }
    ])
  })

  it('leaves the state untouched on an invalid selection', () => {
    const { store } = createScriptedStore([1, 2, 3, 4, 5], createMatchState())
    store.dispatch(performHumanThrow())
    const before = store.getState().match

    const result = resultOf(
      store.dispatch(performHumanReroll({ keepMask: [false, false, false, false, false] }))
    )

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.type).toBe('invalid_selection')
    expect(store.getState().match).toBe(before)
  })

  it('rejects a keep mask of the wrong length', () => {
    const { store } = createScriptedStore([1, 2, 3, 4, 5], createMatchState())
    store.dispatch(performHumanThrow())

    const result = resultOf(store.dispatch(performHumanReroll({ keepMask: [true] })))

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error).toEqual({
      type: 'invalid_input',
      field: 'keepMask',
      message: 'Keep mask must be exactly 5 booleans (got 1 entries).'
    })
  })

  it('commits automatically after the second reroll', () => {
    const { store, roller } = createScriptedStore([1, 1, 1, 1, 1, 2, 2, 2, 2, 6], createMatchState())
    store.dispatch(performHumanThrow())

    const first = resultOf(
      store.dispatch(performHumanReroll({ keepMask: [true, false, false, false, false] }))
    )
    expect(first.ok).toBe(true)
    if (!first.ok) return
    expect(first.value.committed).toBe(false)
    expect(first.value.turn.dice).toEqual([1, 2, 2, 2, 2])
    expect(first.value.turn.runningTotal).toBe(14)
    expect(getMatch(store).phase).toBe('awaiting_human_decision')

    // The die held last time is the one rolled again
    const second = resultOf(store.dispatch(performHumanReroll({})))
    expect(second.ok).toBe(true)
    if (!second.ok) return
    expect(second.value.committed).toBe(true)
    expect(second.value.turn.dice).toEqual([6, 2, 2, 2, 2])
    expect(second.value.turn.runningTotal).toBe(28)

    const match = getMatch(store)
    expect(match.humanScore).toBe(28)
    expect(match.phase).toBe('computer_turn')
    expect(roller.remaining()).toBe(0)
  })

  it('cannot score a turn that already committed', () => {
    const { store } = createScriptedStore([1, 1, 1, 1, 1, 2, 2, 2, 2, 6], createMatchState())
    store.dispatch(performHumanThrow())
    store.dispatch(performHumanReroll({ keepMask: [true, false, false, false, false] }))
    store.dispatch(performHumanReroll({}))

    const result = resultOf(store.dispatch(performHumanScore()))

    expect(result.ok).toBe(false)
    expect(getMatch(store).humanScore).toBe(28)
  })

  it('rerolls only the first-reroll keeps on the second reroll', () => {
    const { store, roller } = createScriptedStore([1, 1, 1, 1, 1, 6, 6, 6, 6, 3], createMatchState())
    store.dispatch(performHumanThrow())
    store.dispatch(performHumanReroll({ keepMask: [true, false, false, false, false] }))
    const before = store.getState().match

    const fresh = resultOf(
      store.dispatch(performHumanReroll({ keepMask: [false, false, false, false, false] }))
    )
    expect(fresh.ok).toBe(false)
    if (fresh.ok) return
    expect(fresh.error.type).toBe('invalid_input')
    expect(store.getState().match).toBe(before)
    expect(roller.remaining()).toBe(1)

    const second = resultOf(store.dispatch(performHumanReroll({})))
    expect(second.ok).toBe(true)
    if (!second.ok) return
    expect(second.value.turn.dice).toEqual([3, 6, 6, 6, 6])
    expect(second.value.turn.runningTotal).toBe(57)
    expect(getMatch(store).humanScore).toBe(57)
    expect(roller.remaining()).toBe(0)
  })
})

// =============================================================================
// Computer turn operations
// =============================================================================

describe('computer turn operations', () => {
  function afterHumanScored(values: Parameters<typeof createScriptedStore>[0]) {
    const setup = createScriptedStore(values, createMatchState())
    setup.store.dispatch(performHumanThrow())
    setup.store.dispatch(performHumanScore())
    return setup
  }

  it('needs a throw before deciding', () => {
    const { store } = afterHumanScored([1, 1, 1, 1, 1])
    const result = resultOf(store.dispatch(performComputerStep()))

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.message).toBe('Cannot decide a reroll before the computer has thrown.')
  })

  it('throws only once per turn', () => {
    const { store } = afterHumanScored([1, 1, 1, 1, 1, 6, 6, 6, 5, 1])
    store.dispatch(performComputerThrow())
    const result = resultOf(store.dispatch(performComputerThrow()))

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.message).toBe('The computer has already thrown this turn.')
  })

  it('stands on a strong hand and starts the next round', () => {
    const { store } = afterHumanScored([1, 1, 1, 1, 1, 6, 6, 6, 5, 1])
    store.dispatch(performComputerThrow())

    const step = resultOf(store.dispatch(performComputerStep()))
    expect(step.ok).toBe(true)
    if (!step.ok) return
    expect(step.value.decision).toBe('stand')
    expect(step.value.log).toEqual(['Decided not to reroll #1'])

    const commit = resultOf(store.dispatch(performComputerCommit()))
    expect(commit.ok).toBe(true)
    if (!commit.ok) return
    expect(commit.value.total).toBe(24)

    const match = getMatch(store)
    expect(match.computerScore).toBe(24)
    expect(match.phase).toBe('awaiting_throw')
    expect(match.round).toBe(2)
    expect(match.history.map(t => t.owner)).toEqual(['human', 'computer'])
  })

  it('abandons the computer turn without scoring', () => {
    const { store } = afterHumanScored([1, 1, 1, 1, 1, 6, 6, 6, 5, 1])
    store.dispatch(performComputerThrow())

    const result = resultOf(store.dispatch(performAbandonComputerTurn()))
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.discarded?.dice).toEqual([6, 6, 6, 5, 1])

    const match = getMatch(store)
    expect(match.turn).toBeNull()
    expect(match.computerScore).toBe(0)
    expect(match.phase).toBe('computer_turn')
  })

  it('cannot abandon outside the computer turn', () => {
    const { store } = createScriptedStore([], createMatchState())
    const result = resultOf(store.dispatch(performAbandonComputerTurn()))
    expect(result.ok).toBe(false)
  })
})

// =============================================================================
// End of match
// =============================================================================

describe('end of match', () => {
  it('declares the human the winner when only they reach the target', () => {
    // Computer: 20 with 26 to go stands, ending on 95
    const { store } = createScriptedStore(
      [5, 4, 4, 4, 4, 4, 4, 4, 4, 4],
      createMatchState({ humanScore: 80, computerScore: 75 })
    )
    store.dispatch(performHumanThrow())
    store.dispatch(performHumanScore())
    store.dispatch(performComputerThrow())
    const step = resultOf(store.dispatch(performComputerStep()))
    expect(step.ok && step.value.decision).toBe('stand')
    store.dispatch(performComputerCommit())

    const match = getMatch(store)
    expect(match.humanScore).toBe(101)
    expect(match.computerScore).toBe(95)
    expect(match.phase).toBe('complete')
    expect(selectWinner(store.getState())).toBe('human')
    expect(selectIsMatchComplete(store.getState())).toBe(true)
  })

  it('goes to a tie-break when both reach the target', () => {
    const { store } = createScriptedStore(
      [5, 5, 5, 5, 5, 5, 5, 5, 4, 4, 6, 6, 6, 6, 6, 1, 1, 1, 1, 1],
      createMatchState({ humanScore: 80, computerScore: 80 })
    )
    store.dispatch(performHumanThrow())
    store.dispatch(performHumanScore())
    store.dispatch(performComputerThrow())
    store.dispatch(performComputerStep())
    store.dispatch(performComputerCommit())

    let match = getMatch(store)
    expect(match.humanScore).toBe(105)
    expect(match.computerScore).toBe(103)
    expect(match.phase).toBe('tie_break')
    expect(match.winner).toBeNull()
    expect(match.tieBreak).toEqual({ attempts: [] })

    const result = resultOf(store.dispatch(performTieBreakRoll()))
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.roll.humanTotal).toBe(30)
    expect(result.value.roll.computerTotal).toBe(5)
    expect(result.value.winner).toBe('human')

    match = getMatch(store)
    expect(match.phase).toBe('complete')
    expect(match.winner).toBe('human')
  })

  it('keeps rolling the tie-break until the sums differ', () => {
    const { store } = createScriptedStore(
      [3, 3, 3, 3, 3, 3, 3, 3, 3, 3, 1, 1, 1, 1, 1, 2, 2, 2, 2, 2],
      createMatchState({ humanScore: 110, computerScore: 104, phase: 'tie_break', tieBreak: { attempts: [] } })
    )

    const tied = resultOf(store.dispatch(performTieBreakRoll()))
    expect(tied.ok && tied.value.winner).toBeNull()
    expect(getMatch(store).phase).toBe('tie_break')
    expect(selectTieBreakAttempts(store.getState())).toHaveLength(1)

    const decided = resultOf(store.dispatch(performTieBreakRoll()))
    expect(decided.ok && decided.value.winner).toBe('computer')
    expect(getMatch(store).phase).toBe('complete')
    expect(selectTieBreakAttempts(store.getState())).toHaveLength(2)
  })

  it('refuses a tie-break roll outside a tie', () => {
    const { store } = createScriptedStore([], createMatchState())
    const result = resultOf(store.dispatch(performTieBreakRoll()))

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.message).toBe('Cannot roll a tie-break in awaiting_throw phase.')
  })

  it('rejects further play once complete', () => {
    const { store } = createScriptedStore([], createMatchState({ phase: 'complete', winner: 'computer' }))
    expect(resultOf(store.dispatch(performHumanThrow())).ok).toBe(false)
  })
})

describe('resetMatch', () => {
  it('clears the match', () => {
    const { store } = createScriptedStore([], createMatchState())
    store.dispatch(resetMatch())
    expect(store.getState().match).toBeNull()
  })
})

describe('selectors', () => {
  it('return empty values without a match', () => {
    const { store } = createScriptedStore([])
    const state = store.getState()

    expect(selectPhase(state)).toBeNull()
    expect(selectScores(state)).toBeNull()
    expect(selectTargetScore(state)).toBeNull()
    expect(selectTurn(state)).toBeNull()
    expect(selectWinner(state)).toBeNull()
    expect(selectTieBreakAttempts(state)).toEqual([])
    expect(selectCanThrow(state)).toBe(false)
    expect(selectCanHumanReroll(state)).toBe(false)
  })

  it('follow the human turn', () => {
    const { store } = createScriptedStore([2, 2, 3, 3, 4, 5, 5, 5], createMatchState({ config: { targetScore: 40 } }))
    store.dispatch(performHumanThrow())

    expect(selectPhase(store.getState())).toBe('awaiting_human_decision')
    expect(selectTargetScore(store.getState())).toBe(40)
    expect(selectTurn(store.getState())?.runningTotal).toBe(14)

    store.dispatch(performHumanReroll({ keepMask: [false, false, true, true, false] }))
    // [5, 5, 3, 3, 5] = 21 on top of 14
    expect(selectTurn(store.getState())?.runningTotal).toBe(35)
    expect(selectCanHumanReroll(store.getState())).toBe(true)
  })
})
