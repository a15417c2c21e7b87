/**
 * Database connection pool management.
 * Provides connection pooling with automatic retry on connection errors.
 */

import pg from "pg"

import { logger } from "../logger.js"

const { Pool } = pg

let pool: pg.Pool | null = null

function createPool(): pg.Pool {
  const connectionString = process.env.DATABASE_URL
  if (!connectionString) {
    throw new Error("DATABASE_URL environment variable is not set")
  }

  const newPool = new Pool({
    connectionString,
    max: 5,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
  })

  // Without a listener an idle-client error crashes the process
  newPool.on("error", (err: Error) => {
    logger.error({ error: err.message }, "Unexpected database pool error")
  })

  return newPool
}

export function getPool(): pg.Pool {
  if (!pool) {
    pool = createPool()
  }
  return pool
}

/**
 * Close the pool. The next getPool() call opens a fresh one.
 */
export async function resetPool(): Promise<void> {
  if (pool) {
    try {
      await pool.end()
    } catch (err) {
      logger.error({ error: err }, "Error closing pool")
    }
    pool = null
  }
}

function isConnectionError(err: unknown): boolean {
  if (err instanceof Error) {
    const message = err.message.toLowerCase()
    return (
      message.includes("connection terminated") ||
      message.includes("connection refused") ||
      message.includes("connection reset") ||
      message.includes("econnreset") ||
      message.includes("econnrefused") ||
      message.includes("etimedout")
    )
  }
  return false
}

/**
 * Execute a query with automatic retry on connection errors.
 * Retries up to 3 times with exponential backoff (100ms, 200ms, 400ms).
 */
export async function queryWithRetry<T>(
  queryFn: (pool: pg.Pool) => Promise<T>,
  maxRetries: number = 3
): Promise<T> {
  let lastError: Error | null = null

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    try {
      return await queryFn(getPool())
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err))

      if (isConnectionError(err) && attempt < maxRetries - 1) {
        const delay = 100 * Math.pow(2, attempt)
        logger.warn(
          { attempt: attempt + 1, maxRetries, delay, error: lastError.message },
          "Database connection error, retrying"
        )
        await new Promise((resolve) => setTimeout(resolve, delay))
        continue
      }

      throw lastError
    }
  }

  throw lastError ?? new Error("Query failed after retries")
}
