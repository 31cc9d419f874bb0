import { loadConfig } from './core/config.js'
import type { Plugin, AppContext } from './core/types.js'
import { WebPlugin } from './connectors/web/index.js'
import { createNewswire } from './extension/newswire/index.js'

async function main() {
  const config = await loadConfig()

  // ==================== Pipeline ====================

  const newswire = createNewswire(config.newswire)

  // ==================== Plugins ====================

  const plugins: Plugin[] = [
    new WebPlugin({
      port: config.connectors.web.port,
      pingSeconds: config.connectors.web.pingSeconds,
    }),
  ]

  const ctx: AppContext = { config, newswire }

  newswire.start()

  for (const plugin of plugins) {
    await plugin.start(ctx)
    console.log(`plugin started: ${plugin.name}`)
  }

  // ==================== Shutdown ====================

  let stopping = false
  const shutdown = async () => {
    if (stopping) return
    stopping = true
    for (const plugin of plugins) {
      try {
        await plugin.stop()
      } catch (err) {
        console.error(`plugin ${plugin.name} failed to stop:`, err)
      }
    }
    await newswire.stop()
    process.exit(0)
  }
  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('shutdown failed:', err)
      process.exit(1)
    })
  }
  process.on('SIGINT', onSignal)
  process.on('SIGTERM', onSignal)
}

main().catch((err) => {
  console.error('fatal:', err)
  process.exit(1)
})
