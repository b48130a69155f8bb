/**
 * MCP Server Module
 *
 * Exports for the dice duel MCP server.
 */

export { loadConfig, type ServerConfig } from './config'
export {
  createSession,
  toggleKeep,
  isSelectionOpen,
  setSelection,
  clearSelection,
  type GameSession,
  type SessionOptions,
  type SelectionState
} from './store'
export { createDiceServer } from './tools'
export { renderDice, renderScoreboard, renderFullMatchState, formatRoll } from './asciiDice'
export { MatchResponseOutputSchema } from './schemas'
export type { DiceStructuredContent } from './types'
