import { Request, Response } from "express"

import { verifyPin, generateToken, logAdminAction } from "../../lib/admin-auth.js"
import { logger } from "../../lib/logger.js"
import { ADMIN_COOKIE } from "../../middleware/admin-auth.js"

const COOKIE_MAX_AGE = 12 * 60 * 60 * 1000 // matches the JWT expiry

/**
 * POST /admin/api/auth/login
 * Authenticate the librarian with the admin PIN
 */
export async function loginHandler(req: Request, res: Response): Promise<void> {
  try {
    const pin: unknown = req.body?.pin

    logger.info({ ip: req.ip, userAgent: req.get("user-agent") }, "Admin login attempt")

    if (typeof pin !== "string" || pin.trim().length === 0) {
      logger.warn("Login failed: PIN missing or not a string")
      res.status(400).json({ error: { message: "PIN required" } })
      return
    }

    const pinHash = process.env.ADMIN_PIN_HASH
    if (!pinHash) {
      logger.error("ADMIN_PIN_HASH environment variable not set")
      res.status(500).json({ error: { message: "Server configuration error" } })
      return
    }

    const isValid = await verifyPin(pin.trim(), pinHash)

    if (!isValid) {
      logger.warn({ ip: req.ip }, "Login failed: invalid PIN")

      await logAdminAction({
        action: "login_failed",
        ipAddress: req.ip,
        userAgent: req.get("user-agent"),
      })

      res.status(401).json({ error: { message: "Invalid PIN" } })
      return
    }

    const token = generateToken()

    res.cookie(ADMIN_COOKIE, token, {
      httpOnly: true,
      secure: process.env.NODE_ENV === "production",
      sameSite: "strict",
      maxAge: COOKIE_MAX_AGE,
    })

    logger.info({ ip: req.ip }, "Admin login successful")

    await logAdminAction({
      action: "login",
      ipAddress: req.ip,
      userAgent: req.get("user-agent"),
    })

    res.json({ success: true })
  } catch (error) {
    logger.error({ error }, "Login handler error")
    res.status(500).json({ error: { message: "Login failed" } })
  }
}

/**
 * POST /admin/api/auth/logout
 */
export async function logoutHandler(req: Request, res: Response): Promise<void> {
  try {
    res.clearCookie(ADMIN_COOKIE)

    await logAdminAction({
      action: "logout",
      ipAddress: req.ip,
      userAgent: req.get("user-agent"),
    })

    res.json({ success: true })
  } catch (error) {
    logger.error({ error }, "Logout handler error")
    res.status(500).json({ error: { message: "Logout failed" } })
  }
}

/**
 * GET /admin/api/auth/status
 */
export function statusHandler(req: Request, res: Response): void {
  res.json({ authenticated: req.isAdmin === true })
}
