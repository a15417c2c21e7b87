import { Request, Response, NextFunction } from "express"

import { verifyToken } from "../lib/admin-auth.js"
import { logger } from "../lib/logger.js"

// Extend Express Request type to include isAdmin flag
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      isAdmin?: boolean
    }
  }
}

export const ADMIN_COOKIE = "adminToken"

function readToken(req: Request): string | null {
  const token: unknown = req.cookies?.[ADMIN_COOKIE]
  if (typeof token !== "string" || token.trim().length === 0) {
    return null
  }
  return token
}

/**
 * Admin authentication middleware
 * Verifies JWT token from cookies and sets req.isAdmin flag
 * Returns 401 if authentication fails
 */
export function adminAuthMiddleware(req: Request, res: Response, next: NextFunction): void {
  try {
    const token = readToken(req)
    if (!token) {
      res.status(401).json({ error: { message: "Authentication required" } })
      return
    }

    const decoded = verifyToken(token)
    if (!decoded || decoded.isAdmin !== true) {
      res.status(401).json({ error: { message: "Invalid authentication token" } })
      return
    }

    req.isAdmin = true
    next()
  } catch (error) {
    logger.error({ error }, "Admin auth middleware error")
    res.status(500).json({ error: { message: "Authentication error" } })
  }
}

/**
 * Sets req.isAdmin when a valid token is present, never blocks.
 * Used by the auth status endpoint.
 */
export function optionalAdminAuth(req: Request, _res: Response, next: NextFunction): void {
  try {
    const token = readToken(req)
    if (token && verifyToken(token)?.isAdmin === true) {
      req.isAdmin = true
    }
  } catch (error) {
    logger.warn({ error }, "Optional admin auth check failed")
  }
  next()
}
