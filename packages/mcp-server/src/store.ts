/**
 * Session Store for MCP Server
 *
 * One session per server process: a MatchController for the engine state and
 * a small Redux store for the dice the player has marked to keep. The
 * selection is presentation state; the engine only ever sees a finished
 * keep mask.
 */

import { configureStore, createSlice, type PayloadAction } from '@reduxjs/toolkit'
import {
  MAX_KEPT_DICE,
  MatchController,
  countSelected,
  createDiceRoller,
  createSeededSource,
  err,
  ok,
  type DiceRoller,
  type InvalidInputError,
  type InvalidPhaseError,
  type InvalidSelectionError,
  type KeepMask,
  type MatchState,
  type Result
} from '@dice-duel/engine'
import type { ServerConfig } from './config'

// =============================================================================
// Selection Slice
// =============================================================================

export interface SelectionState {
  readonly keep: KeepMask
}

const initialSelection: SelectionState = {
  keep: [false, false, false, false, false]
}

const selectionSlice = createSlice({
  name: 'selection',
  initialState: initialSelection,
  reducers: {
    setSelection: (_state, action: PayloadAction<KeepMask>) => {
      return { keep: action.payload }
    },
    clearSelection: () => initialSelection
  }
})

export const { setSelection, clearSelection } = selectionSlice.actions

export type ToggleError = InvalidInputError | InvalidSelectionError | InvalidPhaseError

/**
 * Flip one die in the selection. At most four dice may be kept.
 */
export function toggleKeep(keep: KeepMask, index: number): Result<KeepMask, ToggleError> {
  if (!Number.isInteger(index) || index < 0 || index >= keep.length) {
    return err({
      type: 'invalid_input',
      field: 'index',
      message: `Die index must be 0-4 (got ${String(index)}).`
    })
  }

  const keptCount = countSelected(keep)
  if (!keep[index] && keptCount >= MAX_KEPT_DICE) {
    return err({
      type: 'invalid_selection',
      keptCount: keptCount + 1,
      message: `At most ${String(MAX_KEPT_DICE)} dice can be kept.`
    })
  }

  const flip = (i: number) => (i === index ? !keep[i] : keep[i])
  return ok<KeepMask>([flip(0), flip(1), flip(2), flip(3), flip(4)])
}

/**
 * Dice can be selected between the human's throw and their first reroll.
 */
export function isSelectionOpen(match: MatchState | null): boolean {
  return (
    match !== null &&
    match.phase === 'awaiting_human_decision' &&
    match.turn !== null &&
    match.turn.stage === 'thrown'
  )
}

// =============================================================================
// Session
// =============================================================================

export interface SessionOptions {
  readonly config: ServerConfig
  /** Overrides the roller built from config.seed */
  readonly roller?: DiceRoller
}

function createSelectionStore() {
  return configureStore({
    reducer: { selection: selectionSlice.reducer }
  })
}

export type SelectionStore = ReturnType<typeof createSelectionStore>

export interface GameSession {
  readonly config: ServerConfig
  readonly controller: MatchController
  readonly selection: SelectionStore
}

export function createSession({ config, roller }: SessionOptions): GameSession {
  const sessionRoller =
    roller ?? createDiceRoller(config.seed === undefined ? Math.random : createSeededSource(config.seed))
  return {
    config,
    controller: new MatchController({ roller: sessionRoller }),
    selection: createSelectionStore()
  }
}
