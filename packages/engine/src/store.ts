/**
 * Match Store
 *
 * One store per match session. The dice roller is injected through the sync
 * thunk middleware, so a seeded or scripted roller makes a whole match
 * reproducible.
 */

import { configureStore } from '@reduxjs/toolkit'
import { createDiceRoller, type DiceRoller } from './dice'
import matchReducer from './matchSlice'
import type { EngineExtra } from './operations'
import { createSyncThunkMiddleware } from './syncThunkMiddleware'
import type { MatchState } from './types'

export interface MatchStoreOptions {
  /** Defaults to a Math.random roller */
  readonly roller?: DiceRoller
  /** Resume from an existing match instead of starting empty */
  readonly initialMatch?: MatchState | null
}

export function createMatchStore({ roller = createDiceRoller(), initialMatch = null }: MatchStoreOptions = {}) {
  const extra: EngineExtra = { roller }
  return configureStore({
    reducer: { match: matchReducer },
    preloadedState: { match: initialMatch },
    middleware: getDefaultMiddleware =>
      getDefaultMiddleware({
        // Sync thunk actions carry their payload creator in meta
        serializableCheck: {
          ignoredActionPaths: ['meta.payloadCreator']
        }
      }).concat(createSyncThunkMiddleware(extra))
  })
}

export type MatchStore = ReturnType<typeof createMatchStore>
export type AppDispatch = MatchStore['dispatch']

/**
 * Pull the Result out of a dispatched operation.
 *
 * ```ts
 * const thrown = resultOf(store.dispatch(performHumanThrow()))
 * ```
 *
 * Throws only when the store was built without the sync thunk middleware,
 * which is a wiring bug rather than a game error.
 */
export function resultOf<TReturn>(action: {
  readonly type: string
  readonly meta: { readonly result?: TReturn }
}): TReturn {
  const result = action.meta.result
  if (result === undefined) {
    throw new Error(`${action.type} was not handled by the sync thunk middleware`)
  }
  return result
}
