import 'dotenv/config'

import { createApp } from './api/app.ts'
import { createRagService } from './api/rag/index.ts'
import { loadRagConfig, parseIntEnv } from './src/server/rag/config.ts'
import { startSessionSweeper } from './src/server/rag/conversation/sweepIdleSessions.ts'

const config = loadRagConfig()
const rag = createRagService(config)
const app = createApp({ rag })
const port = parseIntEnv(process.env, 'PORT', 3001)

const stopSweeper = startSessionSweeper(() => rag.sweepSessions(), {
  intervalMs: parseIntEnv(process.env, 'RAG_SESSION_SWEEP_INTERVAL_MS', 60_000),
})

const server = app.listen(port, () => {
  console.log(`API server running at http://localhost:${port}`)
  console.log(`RAG_PROVIDER: ${config.provider}${config.provider === 'sqlite' ? ` (${config.dbPath})` : ''}`)
  console.log(`OLLAMA_URL: ${config.ollamaUrl}`)
  console.log(`OLLAMA_EMBED_MODEL: ${config.embedModel}  OLLAMA_CHAT_MODEL: ${config.chatModel}`)
})

function shutdown(): void {
  stopSweeper()
  server.close(() => {
    rag.close()
    process.exit(0)
  })
}

process.on('SIGINT', shutdown)
process.on('SIGTERM', shutdown)
