/**
 * Shared type definitions for the dice MCP server.
 */

import type { KeepMask, MatchState } from '@dice-duel/engine'

/**
 * Structured content returned by every match tool.
 *
 * The index signature is required by the MCP SDK's structuredContent type.
 */
export interface DiceStructuredContent {
  [key: string]: unknown
  matchState: MatchState | null
  /** Dice currently marked to keep for the next reroll */
  selection: KeepMask
  /** Strategy log of the computer turn that just ran */
  log?: readonly string[]
}
