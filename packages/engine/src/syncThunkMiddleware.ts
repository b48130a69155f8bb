/**
 * Sync Thunk Middleware
 *
 * Runs the payload creator of every sync thunk action, stores its Result in
 * action.meta.result and passes the action on to the reducers.
 */

import type { Middleware } from '@reduxjs/toolkit'
import { isSyncThunkAction } from './syncThunk'

/**
 * Creates middleware that executes sync thunk payload creators with the
 * given extra argument.
 */
export function createSyncThunkMiddleware<TExtra>(extra: TExtra): Middleware {
  return ({ getState }) =>
    next =>
    (action: unknown) => {
      if (isSyncThunkAction(action)) {
        action.meta.result = action.meta.payloadCreator(action.payload, { getState, extra })
      }
      return next(action)
    }
}
