import bcrypt from "bcrypt"
import jwt from "jsonwebtoken"

import { logger } from "./logger.js"
import { getPool } from "./db/pool.js"

const BCRYPT_ROUNDS = 10
const JWT_EXPIRY = "12h"

// JWT payload interface
export interface AdminJWT {
  isAdmin: true
  iat: number // issued at
  exp: number // expiry
}

// Audit log entry interface
export interface AuditLogEntry {
  action: string
  resourceType?: string
  resourceId?: number
  details?: Record<string, unknown>
  ipAddress?: string
  userAgent?: string
}

/**
 * Hash an admin PIN using bcrypt. Used to produce ADMIN_PIN_HASH.
 */
export async function hashPin(pin: string): Promise<string> {
  return bcrypt.hash(pin, BCRYPT_ROUNDS)
}

/**
 * Verify a PIN against a bcrypt hash
 */
export async function verifyPin(pin: string, hash: string): Promise<boolean> {
  return bcrypt.compare(pin, hash)
}

/**
 * Generate a JWT token for admin authentication
 * @returns Signed JWT token
 */
export function generateToken(): string {
  const secret = process.env.JWT_SECRET
  if (!secret) {
    throw new Error("JWT_SECRET environment variable not set")
  }

  const payload = {
    isAdmin: true as const,
  }

  return jwt.sign(payload, secret, { expiresIn: JWT_EXPIRY })
}

function isAdminPayload(value: unknown): value is AdminJWT {
  if (typeof value !== "object" || value === null) return false
  return (
    "isAdmin" in value &&
    value.isAdmin === true &&
    "iat" in value &&
    typeof value.iat === "number" &&
    "exp" in value &&
    typeof value.exp === "number"
  )
}

/**
 * Verify a JWT token and extract payload
 * @returns Decoded JWT payload or null if invalid
 */
export function verifyToken(token: string): AdminJWT | null {
  const secret = process.env.JWT_SECRET
  if (!secret) {
    logger.error("JWT_SECRET environment variable not set")
    return null
  }

  try {
    const decoded: unknown = jwt.verify(token, secret)
    return isAdminPayload(decoded) ? decoded : null
  } catch (error) {
    logger.warn({ error }, "Invalid JWT token")
    return null
  }
}

/**
 * Record an admin action in the audit log. Never throws.
 */
export async function logAdminAction(entry: AuditLogEntry): Promise<void> {
  try {
    const pool = getPool()
    await pool.query(
      `INSERT INTO admin_audit_log
       (action, resource_type, resource_id, details, ip_address, user_agent)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [
        entry.action,
        entry.resourceType || null,
        entry.resourceId || null,
        entry.details ? JSON.stringify(entry.details) : null,
        entry.ipAddress || null,
        entry.userAgent || null,
      ]
    )

    logger.info(
      {
        action: entry.action,
        resourceType: entry.resourceType,
        resourceId: entry.resourceId,
      },
      "Admin action logged"
    )
  } catch (error) {
    // Audit logging failure shouldn't break the request
    logger.error({ error, entry }, "Failed to log admin action")
  }
}
