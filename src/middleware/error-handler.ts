/**
 * Global error handling middleware.
 */

import type { Request, Response, NextFunction } from "express"

import { createRequestLogger } from "../lib/logger.js"

/**
 * Express error handling middleware.
 * Must be registered after all routes.
 *
 * Malformed JSON bodies answer 400; everything else is logged and answers a
 * generic 500.
 */
export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  const requestLogger = createRequestLogger(req.method, req.path)

  if ("type" in err && err.type === "entity.parse.failed") {
    requestLogger.warn({ err }, "Malformed JSON body")
    res.status(400).json({ error: { message: "Malformed JSON body" } })
    return
  }

  requestLogger.error({ err }, err.message)

  // Don't leak error details to client
  res.status(500).json({
    error: { message: "Internal server error" },
  })
}
