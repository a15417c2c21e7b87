import "dotenv/config"

import { createApp } from "./app.js"
import { CirculationDesk, registerShutdownHooks } from "./lib/circulation/circulation-desk.js"
import { getDeskConfig } from "./lib/config.js"
import { resetPool } from "./lib/db/pool.js"
import { logger } from "./lib/logger.js"
import { Notifier, loadNotifierConfig } from "./lib/notifier.js"
import { initializeDatabase } from "./lib/startup.js"

const PORT = process.env.PORT || 8080

async function startServer() {
  try {
    // Schema first; nothing works without the request tables
    await initializeDatabase()

    const config = getDeskConfig()
    const desk = new CirculationDesk({ config })
    const notifier = new Notifier(loadNotifierConfig())

    registerShutdownHooks(desk, async () => {
      notifier.stopHeartbeat()
      await notifier.notify("shutdown")
      await resetPool()
    })

    const app = createApp({ desk, notifier, maxLoanDays: config.maxLoanDays })

    app.listen(PORT, () => {
      logger.info({ port: PORT }, "Circulation desk server running")
      logger.info(
        `Library configured: ${config.baseUrl ? config.baseUrl : "NO - check LIBRARY_BASE_URL in .env!"}`
      )
    })

    await notifier.notify("startup")
    notifier.startHeartbeat()

    // The browser can also be started later through /rpa/manual-login
    try {
      await desk.start()
    } catch (error) {
      logger.warn({ error }, "Desk browser did not start; it will be retried on the first request")
    }
  } catch (error) {
    logger.fatal({ error }, "Failed to start server")
    process.exit(1)
  }
}

void startServer()
