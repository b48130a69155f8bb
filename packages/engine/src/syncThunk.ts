/**
 * Sync Thunk - Synchronous thunk pattern for Redux
 *
 * An operation is dispatched as a plain action that carries its own
 * payload creator. The middleware runs the creator with the current state
 * and the injected extra argument (here: the dice roller), stores the
 * Result on the action, and reducers apply it. Dispatch stays synchronous,
 * so every engine operation is atomic.
 */

import type { PayloadAction } from '@reduxjs/toolkit'

// =============================================================================
// Types
// =============================================================================

/**
 * What a payload creator can see.
 */
export interface SyncThunkAPI<TState, TExtra> {
  getState: () => TState
  extra: TExtra
}

export type PayloadCreator<TState, TExtra, TReturn, TArg> = (
  arg: TArg,
  thunkAPI: SyncThunkAPI<TState, TExtra>
) => TReturn

/**
 * Metadata attached to sync thunk actions. `result` is filled in by the
 * middleware before the action reaches the reducers.
 */
export interface SyncThunkMeta<TState, TExtra, TReturn, TArg> {
  payloadCreator: PayloadCreator<TState, TExtra, TReturn, TArg>
  result?: TReturn
}

export type SyncThunkAction<TState, TExtra, TReturn, TArg = void> = PayloadAction<
  TArg,
  string,
  SyncThunkMeta<TState, TExtra, TReturn, TArg>
>

export interface SyncThunkActionCreator<TState, TExtra, TReturn, TArg = void> {
  (arg: TArg): SyncThunkAction<TState, TExtra, TReturn, TArg>
  type: string
  match: (action: unknown) => action is SyncThunkAction<TState, TExtra, TReturn, TArg>
}

export interface CreateSyncThunk<TState, TExtra> {
  <TReturn, TArg = void>(
    typePrefix: string,
    payloadCreator: PayloadCreator<TState, TExtra, TReturn, TArg>
  ): SyncThunkActionCreator<TState, TExtra, TReturn, TArg>
}

// =============================================================================
// Guards
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

/**
 * Type guard to check if an action is a sync thunk action.
 */
export function isSyncThunkAction(
  action: unknown
): action is SyncThunkAction<unknown, unknown, unknown, unknown> {
  return (
    isRecord(action) &&
    typeof action.type === 'string' &&
    isRecord(action.meta) &&
    typeof action.meta.payloadCreator === 'function'
  )
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Build a factory for sync thunks bound to a state shape and extra argument.
 *
 * ```ts
 * const createSyncThunk = buildCreateSyncThunk<RootState, EngineExtra>()
 *
 * const performThrow = createSyncThunk<Result<DiceSet, ThrowError>>(
 *   'match/performThrow',
 *   (_arg, { getState, extra }) => ok(rollDiceSet(extra.roller))
 * )
 * ```
 */
export function buildCreateSyncThunk<TState, TExtra>(): CreateSyncThunk<TState, TExtra> {
  return function createSyncThunk<TReturn, TArg = void>(
    type: string,
    payloadCreator: PayloadCreator<TState, TExtra, TReturn, TArg>
  ): SyncThunkActionCreator<TState, TExtra, TReturn, TArg> {
    const actionCreator = (arg: TArg): SyncThunkAction<TState, TExtra, TReturn, TArg> => ({
      type,
      payload: arg,
      meta: { payloadCreator }
    })

    const match = (action: unknown): action is SyncThunkAction<TState, TExtra, TReturn, TArg> =>
      isRecord(action) && action.type === type

    return Object.assign(actionCreator, { type, match })
  }
}
