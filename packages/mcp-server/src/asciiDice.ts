/**
 * ASCII Dice Renderer
 *
 * Renders the match as plain text for hosts that do not show structured
 * content.
 */

import type { DiceSet, KeepMask, MatchPhase, MatchState, Participant } from '@dice-duel/engine'
import { MAX_KEPT_DICE } from '@dice-duel/engine'

// =============================================================================
// Constants
// =============================================================================

const PARTICIPANT_NAMES: Record<Participant, string> = {
  human: 'Human',
  computer: 'Computer'
}

const NEXT_ACTION: Record<MatchPhase, string> = {
  awaiting_throw: 'dice_throw',
  awaiting_human_decision: 'dice_toggle_keep / dice_reroll or dice_score',
  computer_turn: 'dice_computer_turn',
  tie_break: 'dice_tie_break',
  complete: 'dice_start_match for a new match'
}

// =============================================================================
// Helper Functions
// =============================================================================

export function participantName(participant: Participant): string {
  return PARTICIPANT_NAMES[participant]
}

/**
 * "3, 4, 4, 2, 1 = 14"
 */
export function formatRoll(dice: DiceSet): string {
  const sum = dice.reduce<number>((total, d) => total + d, 0)
  return `${dice.join(', ')} = ${String(sum)}`
}

// =============================================================================
// Main Renderer
// =============================================================================

/**
 * Dice in table order with their positions underneath. Kept dice are drawn
 * as <n>, the rest as [n].
 */
export function renderDice({ dice, keep = null }: { dice: DiceSet; keep?: KeepMask | null }): string {
  const cells = dice.map((d, i) => (keep !== null && keep[i] ? `<${String(d)}>` : `[${String(d)}]`))
  const positions = dice.map((_, i) => ` ${String(i)} `)
  return `${cells.join(' ')}\n${positions.join(' ').trimEnd()}`
}

/**
 * Scores and progress, one line each
 */
export function renderScoreboard({ match }: { match: MatchState }): string {
  return [
    `Round ${String(match.round)} | Target ${String(match.config.targetScore)}`,
    `Human ${String(match.humanScore)} - Computer ${String(match.computerScore)}`
  ].join('\n')
}

/**
 * Render the full match state (scores, dice, tie-break attempts, next step)
 */
export function renderFullMatchState({
  match,
  selection
}: {
  match: MatchState | null
  selection: KeepMask
}): string {
  if (match === null) {
    return 'No match in progress. Use dice_start_match to begin.'
  }

  const lines: string[] = [renderScoreboard({ match }), `Phase: ${match.phase}`]

  const turn = match.turn
  if (turn !== null) {
    const selecting = match.phase === 'awaiting_human_decision' && turn.stage === 'thrown'
    lines.push('')
    lines.push(`${participantName(turn.owner)} dice:`)
    lines.push(renderDice({ dice: turn.dice, keep: selecting ? selection : null }))
    lines.push(`Running total: ${String(turn.runningTotal)} (rerolls used: ${String(turn.rerollsUsed)}/2)`)
    if (selecting) {
      lines.push(`Select 1-${String(MAX_KEPT_DICE)} dice to keep before rerolling.`)
    }
  }

  const attempts = match.tieBreak?.attempts ?? []
  if (attempts.length > 0) {
    lines.push('')
    attempts.forEach((attempt, i) => {
      lines.push(
        `Tie-break #${String(i + 1)}: Human ${String(attempt.humanTotal)} vs Computer ${String(attempt.computerTotal)}`
      )
    })
  }

  lines.push('')
  if (match.winner !== null) {
    lines.push(`Winner: ${participantName(match.winner)}`)
  }
  lines.push(`Next: ${NEXT_ACTION[match.phase]}`)

  return lines.join('\n')
}
