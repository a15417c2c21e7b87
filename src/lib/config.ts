/**
 * Configuration loading for the circulation desk.
 *
 * Loads the remote library system location, credentials and browser
 * settings from environment variables and provides type-safe access.
 */

import os from "os"
import path from "path"

export interface LibraryCredentials {
  email: string
  password: string
}

/** What to report when neither the network nor the page confirms an action. */
export type AmbiguousOutcomePolicy = "accept" | "reject"

export interface DeskConfig {
  /** Origin of the remote library system, without a trailing slash */
  baseUrl: string
  loginPath: string
  workspacePath: string
  credentials: LibraryCredentials | undefined
  /** Persistent browser profile; keeps cookies between restarts */
  profileDir: string
  headless: boolean
  executablePath: string | undefined
  channel: string | undefined
  maxLoanDays: number
  searchLimit: number
  ambiguousOutcome: AmbiguousOutcomePolicy
}

// Environment variable names
const ENV = {
  BASE_URL: "LIBRARY_BASE_URL",
  LOGIN_PATH: "LIBRARY_LOGIN_PATH",
  WORKSPACE_PATH: "LIBRARY_WORKSPACE_PATH",
  USER_EMAIL: "LIBRARY_USER_EMAIL",
  PASSWORD: "LIBRARY_PASSWORD",

  PROFILE_DIR: "BROWSER_PROFILE_DIR",
  HEADLESS: "BROWSER_HEADLESS",
  EXECUTABLE_PATH: "BROWSER_EXECUTABLE_PATH",
  CHANNEL: "BROWSER_CHANNEL",

  MAX_DAYS: "MAX_DAYS",
  SEARCH_LIMIT: "SEARCH_LIMIT",
  AMBIGUOUS_OUTCOME: "AMBIGUOUS_OUTCOME",
} as const

export const DEFAULT_DESK_CONFIG: DeskConfig = {
  baseUrl: "",
  loginPath: "/auth/login",
  workspacePath: "/workspace/issuance",
  credentials: undefined,
  profileDir: "pw_profile",
  headless: false,
  executablePath: undefined,
  channel: undefined,
  maxLoanDays: 14,
  searchLimit: 4,
  ambiguousOutcome: "reject",
}

/**
 * Expand ~ to home directory in a path.
 */
function expandHomePath(p: string): string {
  if (p.startsWith("~")) {
    return path.join(os.homedir(), p.slice(1))
  }
  return p
}

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const value = parseInt(raw || "", 10)
  return isNaN(value) || value < 1 ? fallback : value
}

function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === "") return fallback
  return ["1", "true", "yes", "on"].includes(raw.trim().toLowerCase())
}

function normalizePath(p: string): string {
  return p.startsWith("/") ? p : `/${p}`
}

function loadCredentials(): LibraryCredentials | undefined {
  const email = process.env[ENV.USER_EMAIL]?.trim()
  const password = process.env[ENV.PASSWORD]
  if (email && password) {
    return { email, password }
  }
  return undefined
}

function loadAmbiguousOutcome(): AmbiguousOutcomePolicy {
  const raw = process.env[ENV.AMBIGUOUS_OUTCOME]?.trim().toLowerCase()
  if (!raw) return DEFAULT_DESK_CONFIG.ambiguousOutcome
  if (raw !== "accept" && raw !== "reject") {
    console.warn(`Invalid ${ENV.AMBIGUOUS_OUTCOME}: ${raw}. Must be "accept" or "reject"`)
    return DEFAULT_DESK_CONFIG.ambiguousOutcome
  }
  return raw
}

/**
 * Load the complete desk configuration from environment.
 */
export function loadDeskConfig(): DeskConfig {
  return {
    baseUrl: (process.env[ENV.BASE_URL] || "").trim().replace(/\/+$/, ""),
    loginPath: normalizePath(process.env[ENV.LOGIN_PATH] || DEFAULT_DESK_CONFIG.loginPath),
    workspacePath: normalizePath(
      process.env[ENV.WORKSPACE_PATH] || DEFAULT_DESK_CONFIG.workspacePath
    ),
    credentials: loadCredentials(),
    profileDir: path.resolve(
      expandHomePath(process.env[ENV.PROFILE_DIR] || DEFAULT_DESK_CONFIG.profileDir)
    ),
    headless: parseBoolean(process.env[ENV.HEADLESS], DEFAULT_DESK_CONFIG.headless),
    executablePath: process.env[ENV.EXECUTABLE_PATH] || undefined,
    channel: process.env[ENV.CHANNEL] || undefined,
    maxLoanDays: parsePositiveInt(process.env[ENV.MAX_DAYS], DEFAULT_DESK_CONFIG.maxLoanDays),
    searchLimit: parsePositiveInt(process.env[ENV.SEARCH_LIMIT], DEFAULT_DESK_CONFIG.searchLimit),
    ambiguousOutcome: loadAmbiguousOutcome(),
  }
}

// Singleton configuration instance
let configInstance: DeskConfig | null = null

/**
 * Get the desk configuration.
 * Loads from environment on first call, then returns cached instance.
 */
export function getDeskConfig(): DeskConfig {
  if (!configInstance) {
    configInstance = loadDeskConfig()
  }
  return configInstance
}

/**
 * Override the desk configuration.
 * Useful for testing or programmatic configuration.
 */
export function setDeskConfig(config: Partial<DeskConfig>): void {
  configInstance = {
    ...DEFAULT_DESK_CONFIG,
    ...config,
  }
}

/**
 * Reset configuration to force reload from environment.
 */
export function resetDeskConfig(): void {
  configInstance = null
}

export function loginUrl(config: DeskConfig): string {
  return `${config.baseUrl}${config.loginPath}`
}

export function workspaceUrl(config: DeskConfig): string {
  return `${config.baseUrl}${config.workspacePath}`
}

/**
 * Clamp a requested loan length to [1, maxLoanDays].
 * Missing or unparseable values get the maximum.
 */
export function clampLoanDays(days: number | undefined, maxLoanDays: number): number {
  if (days === undefined || !Number.isFinite(days)) return maxLoanDays
  return Math.min(Math.max(Math.trunc(days), 1), maxLoanDays)
}
