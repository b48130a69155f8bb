/**
 * Dice Duel MCP Tools
 *
 * Registers every match tool on an McpServer bound to one game session.
 * Engine errors come back as isError text responses; the session is never
 * left half-updated because every engine operation is atomic.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { z } from 'zod'
import type { KeepMask, MatchState } from '@dice-duel/engine'
import { formatRoll, participantName, renderDice, renderFullMatchState } from './asciiDice'
import { MatchResponseOutputSchema } from './schemas'
import { clearSelection, isSelectionOpen, setSelection, toggleKeep, type GameSession } from './store'
import type { DiceStructuredContent } from './types'

// =============================================================================
// Helpers
// =============================================================================

function errorResponse(message: string): {
  content: { type: 'text'; text: string }[]
  isError: true
} {
  return {
    content: [{ type: 'text' as const, text: `Error: ${message}` }],
    isError: true
  }
}

function textResponse(text: string): {
  content: { type: 'text'; text: string }[]
} {
  return {
    content: [{ type: 'text' as const, text }]
  }
}

function currentSelection(session: GameSession): KeepMask {
  return session.selection.getState().selection.keep
}

/**
 * Create a response with both text content (for hosts that only show text)
 * and structured content carrying the full match state.
 */
function matchResponse(
  session: GameSession,
  text: string,
  log?: readonly string[]
): {
  content: { type: 'text'; text: string }[]
  structuredContent: DiceStructuredContent
} {
  const structured: DiceStructuredContent = {
    matchState: session.controller.getMatchState(),
    selection: currentSelection(session)
  }
  if (log !== undefined) {
    structured.log = log
  }
  return {
    content: [{ type: 'text' as const, text }],
    structuredContent: structured
  }
}

function describeSelection(keep: KeepMask): string {
  const positions = keep.flatMap((kept, i) => (kept ? [String(i)] : []))
  return positions.length === 0 ? 'No dice selected.' : `Keeping positions ${positions.join(', ')}.`
}

function scoreLine(match: MatchState): string {
  return `Human ${String(match.humanScore)} - Computer ${String(match.computerScore)}`
}

/**
 * What the round's end means for the player, after the computer commits.
 */
function describeRoundEnd(match: MatchState): string {
  if (match.phase === 'complete' && match.winner !== null) {
    return `${participantName(match.winner)} wins! Final score: ${scoreLine(match)}.`
  }
  if (match.phase === 'tie_break') {
    return `Both players reached ${String(match.config.targetScore)}. Sudden death: use dice_tie_break.`
  }
  return `${scoreLine(match)}. Your throw (dice_throw).`
}

const RULES: Record<'overview' | 'turn' | 'computer' | 'winning', string> = {
  overview: `DICE DUEL OVERVIEW
==================
- You play against the computer, one turn each per round
- Every turn uses five six-sided dice
- Points from each turn are added to your match score
- First to the target score (default 101) wins`,

  turn: `A TURN
======
1. Throw all five dice (dice_throw). Their sum starts your running total.
2. Either bank the running total (dice_score) or reroll.
3. First reroll: keep 1-4 dice (dice_toggle_keep) and reroll the rest.
   The sum of all five dice is ADDED to the running total.
4. Second reroll: the dice you kept last time are rolled again.
   The sum of all five dice is added again and the turn ends.
You may bank after the throw or after the first reroll.`,

  computer: `THE COMPUTER
============
- Plays the same turn with a fixed strategy
- Stands on strong hands, rerolls weak ones
- Plays more boldly when behind and more safely when ahead
- Its decisions are shown as a log after dice_computer_turn`,

  winning: `WINNING
=======
- The round ends after the computer's turn
- If only one player reached the target, that player wins
- If both did, a sudden-death tie-break decides: each side rolls five
  dice and the higher sum wins. Equal sums roll again.`
}

// =============================================================================
// Server Setup
// =============================================================================

export function createDiceServer(session: GameSession): McpServer {
  const { controller, selection } = session

  const server = new McpServer({
    name: 'dice-duel',
    version: '1.0.0'
  })

  // ===========================================================================
  // Tool: Start Match
  // ===========================================================================

  server.registerTool(
    'dice_start_match',
    {
      description:
        'Start a new dice duel against the computer. Scores reset to zero and the human throws first.',
      inputSchema: {
        targetScore: z
          .number()
          .int()
          .optional()
          .describe('Score needed to win (at least 10). Defaults to the server setting.')
      },
      outputSchema: MatchResponseOutputSchema
    },
    ({ targetScore }) => {
      const target = targetScore ?? session.config.targetScore
      const result = controller.startMatch({ targetScore: target })
      if (!result.ok) {
        return errorResponse(result.error.message)
      }

      selection.dispatch(clearSelection())
      return matchResponse(session, `Match started. First to ${String(target)} wins. Use dice_throw to roll.`)
    }
  )

  // ===========================================================================
  // Tools: Dice Selection
  // ===========================================================================

  server.registerTool(
    'dice_toggle_keep',
    {
      description:
        'Mark or unmark one die (position 0-4) to keep on the first reroll. At most four dice can be kept.',
      inputSchema: {
        index: z.number().int().min(0).max(4).describe('Die position, 0-4 from the left')
      },
      outputSchema: MatchResponseOutputSchema
    },
    ({ index }) => {
      if (!isSelectionOpen(controller.getMatchState())) {
        return errorResponse('Dice can only be selected after a throw and before the first reroll.')
      }

      const toggled = toggleKeep(currentSelection(session), index)
      if (!toggled.ok) {
        return errorResponse(toggled.error.message)
      }

      selection.dispatch(setSelection(toggled.value))
      return matchResponse(session, describeSelection(toggled.value))
    }
  )

  server.registerTool(
    'dice_clear_selection',
    {
      description: 'Unmark all dice.',
      outputSchema: MatchResponseOutputSchema
    },
    () => {
      selection.dispatch(clearSelection())
      return matchResponse(session, 'Selection cleared.')
    }
  )

  // ===========================================================================
  // Tools: Human Turn
  // ===========================================================================

  server.registerTool(
    'dice_throw',
    {
      description: "Throw all five dice to start the human's turn.",
      outputSchema: MatchResponseOutputSchema
    },
    () => {
      const result = controller.humanThrow()
      if (!result.ok) {
        return errorResponse(result.error.message)
      }

      selection.dispatch(clearSelection())
      const text = `You rolled ${formatRoll(result.value)}.\n${renderDice({ dice: result.value })}\nKeep dice with dice_toggle_keep and call dice_reroll, or bank the total with dice_score.`
      return matchResponse(session, text)
    }
  )

  server.registerTool(
    'dice_reroll',
    {
      description:
        'Reroll. First reroll: keeps the selected dice (or keepMask) and rerolls the rest. Second reroll: rerolls the dice kept last time and ends the turn; keepMask is not accepted.',
      inputSchema: {
        keepMask: z
          .array(z.boolean())
          .optional()
          .describe('Five booleans for the first reroll. Overrides the current selection.')
      },
      outputSchema: MatchResponseOutputSchema
    },
    ({ keepMask }) => {
      const mask = keepMask ?? (isSelectionOpen(controller.getMatchState()) ? currentSelection(session) : undefined)
      const result = controller.humanReroll(mask)
      if (!result.ok) {
        return errorResponse(result.error.message)
      }

      selection.dispatch(clearSelection())
      const { turn, committed } = result.value
      const summary = `Reroll #${String(turn.rerollsUsed)}: ${formatRoll(turn.dice)}. Running total: ${String(turn.runningTotal)}.`
      const next = committed
        ? `Turn scored: ${String(turn.runningTotal)}. Computer's turn next (dice_computer_turn).`
        : 'One reroll left: dice_reroll, or bank with dice_score.'
      return matchResponse(session, `${summary}\n${next}`)
    }
  )

  server.registerTool(
    'dice_score',
    {
      description: "Stop rerolling and add the running total to the human's score.",
      outputSchema: MatchResponseOutputSchema
    },
    () => {
      const result = controller.humanScore()
      if (!result.ok) {
        return errorResponse(result.error.message)
      }

      selection.dispatch(clearSelection())
      const { total, match } = result.value
      return matchResponse(
        session,
        `Scored ${String(total)}. ${scoreLine(match)}. Computer's turn next (dice_computer_turn).`
      )
    }
  )

  // ===========================================================================
  // Tool: Computer Turn
  // ===========================================================================

  server.registerTool(
    'dice_computer_turn',
    {
      description: "Play the computer's turn and report its decisions.",
      outputSchema: MatchResponseOutputSchema
    },
    async () => {
      const turn = controller.runComputerTurn({ delayMs: session.config.computerDelayMs })
      let next = await turn.next()
      while (next.done !== true) {
        next = await turn.next()
      }

      const outcome = next.value
      if (!outcome.ok) {
        return errorResponse(outcome.error.message)
      }

      const { match, log } = outcome.value
      return matchResponse(session, [...log, '', describeRoundEnd(match)].join('\n'), log)
    }
  )

  // ===========================================================================
  // Tool: Tie-Break
  // ===========================================================================

  server.registerTool(
    'dice_tie_break',
    {
      description: 'Roll one sudden-death attempt when both players reached the target in the same round.',
      outputSchema: MatchResponseOutputSchema
    },
    () => {
      const result = controller.tieBreakRoll()
      if (!result.ok) {
        return errorResponse(result.error.message)
      }

      const { roll, winner } = result.value
      const summary = `Tie-break: Human ${String(roll.humanTotal)} vs Computer ${String(roll.computerTotal)}.`
      const next = winner === null ? 'Tied again. Roll dice_tie_break again.' : `${participantName(winner)} wins the match!`
      return matchResponse(session, `${summary} ${next}`)
    }
  )

  // ===========================================================================
  // Tools: Read-Only
  // ===========================================================================

  server.registerTool(
    'dice_get_state',
    {
      description: 'Get the current match state: scores, dice, selection and what to do next.',
      outputSchema: MatchResponseOutputSchema
    },
    () => {
      const text = renderFullMatchState({
        match: controller.getMatchState(),
        selection: currentSelection(session)
      })
      return matchResponse(session, text)
    }
  )

  server.registerTool(
    'dice_get_rules',
    {
      description: 'Get the rules. Specify a section: overview, turn, computer, winning, or all.',
      inputSchema: {
        section: z
          .enum(['overview', 'turn', 'computer', 'winning', 'all'])
          .optional()
          .default('overview')
          .describe('Which section of rules to retrieve')
      }
    },
    ({ section }) => {
      if (section === 'all') {
        return textResponse(Object.values(RULES).join('\n\n' + '='.repeat(50) + '\n\n'))
      }
      return textResponse(RULES[section])
    }
  )

  return server
}
