// Runner entry point
import { createLogger } from '@taptiles/engine'
import { loadRunnerConfig } from './config.js'
import { runSession } from './session.js'

async function main() {
  const logger = createLogger('runner')
  try {
    const config = loadRunnerConfig()
    const result = await runSession(config, { logger })
    logger.info(`🏁 Run ended (${result.reason}) with score ${result.score}`)
  } catch (err) {
    logger.error({ err }, 'Failed to run session')
    process.exit(1)
  }
}

void main()
