import { describe, it, expect, vi } from 'vitest'
import {
  performHumanScore,
  performHumanThrow,
  runComputerTurn,
  type ComputerTurn,
  type ComputerTurnStep,
  type DieValue,
  type MatchStore
} from '../index'
import { createMatchState, createScriptedStore } from './testUtils'

async function drain(turn: ComputerTurn) {
  const steps: ComputerTurnStep[] = []
  for (;;) {
    const next = await turn.next()
    if (next.done === true) return { steps, result: next.value }
    steps.push(next.value)
  }
}

function storeAtComputerTurn(values: readonly DieValue[]): MatchStore {
  const { store } = createScriptedStore(values, createMatchState())
  store.dispatch(performHumanThrow())
  store.dispatch(performHumanScore())
  return store
}

// Human banks 30. Computer opens on 15, keeps [5, 6] and rerolls into 22,
// then (30 behind) rolls those two again into 14 for a total of 51.
const TWO_REROLLS: readonly DieValue[] = [6, 6, 6, 6, 6, 1, 1, 2, 5, 6, 3, 4, 4, 2, 1]

// Human banks 5. Computer opens on 24 with four high dice and stands.
const STANDS: readonly DieValue[] = [1, 1, 1, 1, 1, 6, 6, 6, 5, 1]

const noPause = () => Promise.resolve()

describe('runComputerTurn', () => {
  it('plays both rerolls and commits the running total', async () => {
    const store = storeAtComputerTurn(TWO_REROLLS)
    const { steps, result } = await drain(runComputerTurn(store, { pause: noPause }))

    expect(steps.map(s => s.kind)).toEqual(['initial_roll', 'reroll', 'reroll', 'committed'])
    expect(steps.flatMap(s => s.log)).toEqual([
      'First roll: 1, 1, 2, 5, 6 = 15',
      'Reroll #1: keeping [5, 6]',
      'New roll: 3, 4, 4, 5, 6 = 22',
      'Reroll #2: rerolling [5, 6]',
      'New roll: 3, 4, 4, 2, 1 = 14',
      'Final total: 51'
    ])

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.total).toBe(51)
    expect(result.value.log).toHaveLength(6)

    const match = store.getState().match
    expect(match?.computerScore).toBe(51)
    expect(match?.phase).toBe('awaiting_throw')
    expect(match?.round).toBe(2)
  })

  it('reports running totals at every step', async () => {
    const store = storeAtComputerTurn(TWO_REROLLS)
    const { steps } = await drain(runComputerTurn(store, { pause: noPause }))

    const [opening, first, second, committed] = steps
    expect(opening).toEqual({
      kind: 'initial_roll',
      dice: [1, 1, 2, 5, 6],
      rollTotal: 15,
      runningTotal: 15,
      log: ['First roll: 1, 1, 2, 5, 6 = 15']
    })
    expect(first.kind === 'reroll' && first.runningTotal).toBe(37)
    expect(second.kind === 'reroll' && second.runningTotal).toBe(51)
    expect(committed).toEqual({
      kind: 'committed',
      dice: [3, 4, 4, 2, 1],
      total: 51,
      computerScore: 51,
      phase: 'awaiting_throw',
      winner: null,
      log: ['Final total: 51']
    })
  })

  it('pauses before each decision with the configured delay', async () => {
    const store = storeAtComputerTurn(TWO_REROLLS)
    const pause = vi.fn((_ms: number) => Promise.resolve())

    await drain(runComputerTurn(store, { delayMs: 250, pause }))

    expect(pause).toHaveBeenCalledTimes(2)
    expect(pause).toHaveBeenCalledWith(250)
  })

  it('makes the same decisions with the default timer', async () => {
    const store = storeAtComputerTurn(TWO_REROLLS)
    const { result } = await drain(runComputerTurn(store))

    expect(result.ok && result.value.total).toBe(51)
  })

  it('logs a stand and stops asking', async () => {
    const store = storeAtComputerTurn(STANDS)
    const pause = vi.fn((_ms: number) => Promise.resolve())
    const { steps, result } = await drain(runComputerTurn(store, { pause }))

    expect(steps.map(s => s.kind)).toEqual(['initial_roll', 'committed'])
    expect(steps[1].log).toEqual(['Decided not to reroll #1', 'Final total: 24'])
    expect(pause).toHaveBeenCalledTimes(1)
    expect(result.ok && result.value.log).toEqual([
      'First roll: 6, 6, 6, 5, 1 = 24',
      'Decided not to reroll #1',
      'Final total: 24'
    ])
  })

  it('discards the turn when aborted at a pause', async () => {
    const store = storeAtComputerTurn(TWO_REROLLS)
    const controller = new AbortController()
    const pause = () => {
      controller.abort()
      return Promise.resolve()
    }

    const { steps, result } = await drain(runComputerTurn(store, { pause, signal: controller.signal }))

    expect(steps.map(s => s.kind)).toEqual(['initial_roll'])
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.type).toBe('aborted')

    const match = store.getState().match
    expect(match?.turn).toBeNull()
    expect(match?.humanScore).toBe(30)
    expect(match?.computerScore).toBe(0)
    expect(match?.phase).toBe('computer_turn')
  })

  it('does nothing when already aborted', async () => {
    const store = storeAtComputerTurn(TWO_REROLLS)
    const controller = new AbortController()
    controller.abort()
    const before = store.getState().match

    const { steps, result } = await drain(runComputerTurn(store, { signal: controller.signal }))

    expect(steps).toEqual([])
    expect(result.ok).toBe(false)
    expect(store.getState().match).toBe(before)
  })

  it('finishes at once outside the computer turn', async () => {
    const { store } = createScriptedStore([], createMatchState())
    const { steps, result } = await drain(runComputerTurn(store, { pause: noPause }))

    expect(steps).toEqual([])
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error).toEqual({
      type: 'invalid_phase',
      phase: 'awaiting_throw',
      message: 'Cannot throw for the computer in awaiting_throw phase.'
    })
  })

  it('can be run again after an abort', async () => {
    const store = storeAtComputerTurn([...TWO_REROLLS, 6, 6, 6, 5, 1])
    const controller = new AbortController()
    await drain(
      runComputerTurn(store, {
        pause: () => {
          controller.abort()
          return Promise.resolve()
        },
        signal: controller.signal
      })
    )

    // The aborted turn consumed the opening roll [1, 1, 2, 5, 6] only
    const { result } = await drain(runComputerTurn(store, { pause: noPause }))
    expect(result.ok).toBe(true)
  })

  it('discards the turn when the consumer stops early', async () => {
    const store = storeAtComputerTurn([...TWO_REROLLS, 6, 6, 6, 5, 1])

    for await (const step of runComputerTurn(store, { pause: noPause })) {
      if (step.kind === 'initial_roll') break
    }

    const match = store.getState().match
    expect(match?.turn).toBeNull()
    expect(match?.computerScore).toBe(0)
    expect(match?.phase).toBe('computer_turn')

    const { steps, result } = await drain(runComputerTurn(store, { pause: noPause }))
    expect(steps[0]).toMatchObject({ kind: 'initial_roll', dice: [3, 4, 4, 2, 1] })
    expect(result.ok).toBe(true)
  })
})
