import { loadConfig } from './config'
import { ConfigError, describeError } from './errors'
import { startMonitor } from './monitor'

const loadConfigOrExit = () => {
  try {
    return loadConfig()
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('[Monitor]', error.message)
      process.exit(1)
    }
    throw error
  }
}

const main = async () => {
  const config = loadConfigOrExit()

  console.log(`[Monitor] Starting motion monitor (${config.motionSource} mode)`)
  const monitor = await startMonitor(config)

  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`[Monitor] Received ${signal}`)
    monitor.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('[Monitor] Shutdown failed:', describeError(error))
        process.exit(1)
      }
    )
  }

  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)
}

main().catch((error: unknown) => {
  console.error('[Monitor] Fatal error:', describeError(error))
  process.exit(1)
})
