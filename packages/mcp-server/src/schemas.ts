/**
 * Zod schemas for MCP tool output validation.
 *
 * These schemas define the shape of structuredContent returned by tool handlers.
 * The MCP SDK validates structuredContent against these schemas, so every field
 * returned in structuredContent MUST be declared here.
 */

import { z } from 'zod'
import { MIN_TARGET_SCORE } from '@dice-duel/engine'

export const ParticipantSchema = z.enum(['human', 'computer'])

export const DieValueSchema = z.union([
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
  z.literal(6)
])

export const DiceSetSchema = z.tuple([DieValueSchema, DieValueSchema, DieValueSchema, DieValueSchema, DieValueSchema])

export const KeepMaskSchema = z.tuple([z.boolean(), z.boolean(), z.boolean(), z.boolean(), z.boolean()])

export const RerollCountSchema = z.union([z.literal(0), z.literal(1), z.literal(2)])

export const TurnStageSchema = z.enum(['thrown', 'rerolled_once', 'rerolled_twice', 'committed'])

export const TurnRecordSchema = z.object({
  owner: ParticipantSchema,
  stage: TurnStageSchema,
  dice: DiceSetSchema,
  initialRollTotal: z.number().int().min(5),
  firstRerollTotal: z.number().int().min(0),
  secondRerollTotal: z.number().int().min(0),
  rerollsUsed: RerollCountSchema,
  runningTotal: z.number().int().min(5),
  keepMask: KeepMaskSchema.nullable()
})

export const MatchPhaseSchema = z.enum([
  'awaiting_throw',
  'awaiting_human_decision',
  'computer_turn',
  'tie_break',
  'complete'
])

export const CompletedTurnSchema = z.object({
  owner: ParticipantSchema,
  round: z.number().int().min(1),
  dice: DiceSetSchema,
  rerollsUsed: RerollCountSchema,
  total: z.number().int().min(5)
})

export const TieBreakRollSchema = z.object({
  humanDice: DiceSetSchema,
  computerDice: DiceSetSchema,
  humanTotal: z.number().int(),
  computerTotal: z.number().int()
})

export const MatchStateSchema = z.object({
  config: z.object({ targetScore: z.number().int().min(MIN_TARGET_SCORE) }),
  humanScore: z.number().int().min(0),
  computerScore: z.number().int().min(0),
  phase: MatchPhaseSchema,
  round: z.number().int().min(1),
  turn: TurnRecordSchema.nullable(),
  winner: ParticipantSchema.nullable(),
  tieBreak: z.object({ attempts: z.array(TieBreakRollSchema) }).nullable(),
  history: z.array(CompletedTurnSchema)
})

/** Output schema shape shared by every match tool */
export const MatchResponseOutputSchema = {
  matchState: MatchStateSchema.nullable(),
  selection: KeepMaskSchema,
  log: z.array(z.string()).optional()
}
