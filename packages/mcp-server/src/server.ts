/**
 * Dice Duel MCP Server
 *
 * Main entry point for the MCP server. Loads configuration, creates the game
 * session and serves the dice tools over stdio.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import { loadConfig } from './config'
import { createSession } from './store'
import { createDiceServer } from './tools'

async function main(): Promise<void> {
  const config = loadConfig()
  const server = createDiceServer(createSession({ config }))

  const transport = new StdioServerTransport()
  await server.connect(transport)

  // Log to stderr so it doesn't interfere with MCP protocol on stdout
  console.error(`Dice duel MCP server running on stdio (target ${String(config.targetScore)})`)
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error)
  process.exit(1)
})
