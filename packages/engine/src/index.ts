// =============================================================================
// Types
// =============================================================================

export * from './types'
export * from './errors'

// =============================================================================
// Result Type
// =============================================================================

export { type Result, ok, err, mapResult } from './result'

// =============================================================================
// Dice
// =============================================================================

export {
  type DiceRoller,
  type RandomSource,
  createDiceRoller,
  createSeededSource,
  toDieValue,
  rollDiceSet,
  rerollPositions,
  invertMask,
  sumDice,
  countSelected
} from './dice'

// =============================================================================
// Turn Engine, Strategy, Tie-Breaker, Rules
// =============================================================================

export { MIN_KEPT_DICE, MAX_KEPT_DICE, throwTurn, canReroll, rerollTurn, scoreTurn, commitTurn } from './turn'

export {
  type StrategyInput,
  decideFirstReroll,
  decideSecondReroll,
  decideWhichDiceToKeep
} from './strategy'

export { rollTieBreak, resolveTieBreak } from './tieBreak'

export { type RoundOutcome, validateMatchConfig, evaluateRoundEnd, getStrategyInput } from './rules'

// =============================================================================
// Sync Thunk Infrastructure
// =============================================================================

export {
  buildCreateSyncThunk,
  isSyncThunkAction,
  type SyncThunkAPI,
  type PayloadCreator,
  type SyncThunkMeta,
  type SyncThunkAction,
  type SyncThunkActionCreator,
  type CreateSyncThunk
} from './syncThunk'

export { createSyncThunkMiddleware } from './syncThunkMiddleware'

// =============================================================================
// Match Slice, Operations, Store
// =============================================================================

export {
  matchSlice,
  default as matchReducer,
  resetMatch,
  selectMatchState,
  selectPhase,
  selectScores,
  selectTargetScore,
  selectTurn,
  selectWinner,
  selectIsMatchComplete,
  selectCanThrow,
  selectTieBreakAttempts,
  selectCanHumanReroll
} from './matchSlice'

export {
  performStartMatch,
  performHumanThrow,
  performHumanReroll,
  performHumanScore,
  performComputerThrow,
  performComputerStep,
  performComputerCommit,
  performAbandonComputerTurn,
  performTieBreakRoll,
  type RootState,
  type EngineExtra,
  type ThrowResult,
  type HumanRerollResult,
  type HumanScoreResult,
  type ComputerStepResult,
  type ComputerCommitResult,
  type AbandonTurnResult,
  type TieBreakResult,
  type HumanRerollInput
} from './operations'

export { createMatchStore, resultOf, type MatchStore, type MatchStoreOptions, type AppDispatch } from './store'

// =============================================================================
// Computer Turn, Controller
// =============================================================================

export {
  runComputerTurn,
  wait,
  type ComputerTurn,
  type ComputerTurnStep,
  type ComputerTurnOutcome,
  type ComputerTurnOptions
} from './computerTurn'

export { MatchController } from './controller'
