/**
 * Server startup initialization.
 * Ensures the database schema exists before the server starts serving requests.
 */

import { queryWithRetry } from "./db/pool.js"
import { findSchemaPath, loadSchemaSql } from "./db/schema.js"
import { createComponentLogger } from "./logger.js"

const log = createComponentLogger("startup")

export async function initializeDatabase(): Promise<void> {
  log.info({ schema: findSchemaPath() }, "Applying database schema")
  const sql = loadSchemaSql()
  // The database may still be coming up alongside the service
  await queryWithRetry((db) => db.query(sql), 5)
  log.info("Database ready")
}
