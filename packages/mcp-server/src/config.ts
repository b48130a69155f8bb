/**
 * Server Configuration
 *
 * Read once from the environment at startup. Invalid values stop the server.
 */

import { z } from 'zod'
import { DEFAULT_TARGET_SCORE, MIN_TARGET_SCORE } from '@dice-duel/engine'

// An empty variable counts as unset
const blankAsUnset = (value: unknown) => (value === '' ? undefined : value)

const EnvSchema = z.object({
  DICE_TARGET_SCORE: z.preprocess(
    blankAsUnset,
    z.coerce.number().int().min(MIN_TARGET_SCORE).default(DEFAULT_TARGET_SCORE)
  ),
  DICE_COMPUTER_DELAY_MS: z.preprocess(blankAsUnset, z.coerce.number().int().min(0).default(0)),
  DICE_SEED: z.preprocess(blankAsUnset, z.coerce.number().int().optional())
})

export interface ServerConfig {
  /** Target used when dice_start_match is called without one */
  readonly targetScore: number
  /** Pause between the computer's decisions */
  readonly computerDelayMs: number
  /** Seeds the dice for reproducible sessions */
  readonly seed?: number
}

export function loadConfig(env: Readonly<Record<string, string | undefined>> = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    throw new Error(`Invalid configuration: ${issues.join('; ')}`)
  }

  const { DICE_TARGET_SCORE, DICE_COMPUTER_DELAY_MS, DICE_SEED } = parsed.data
  return {
    targetScore: DICE_TARGET_SCORE,
    computerDelayMs: DICE_COMPUTER_DELAY_MS,
    ...(DICE_SEED === undefined ? {} : { seed: DICE_SEED })
  }
}
