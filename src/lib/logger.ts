import pino from "pino"

const isProduction = process.env.NODE_ENV === "production"
const isTest = process.env.NODE_ENV === "test"

function defaultLevel(): string {
  if (isTest) return "silent"
  return isProduction ? "info" : "debug"
}

/**
 * Structured logger for the desk service.
 * JSON in production, pino-pretty everywhere else.
 */
export const logger = pino({
  level: process.env.LOG_LEVEL || defaultLevel(),
  transport:
    isProduction || isTest
      ? undefined
      : {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        },
  base: {
    service: "circulation-desk",
    env: process.env.NODE_ENV || "development",
  },
  // Library credentials and the admin PIN travel through request bodies
  redact: {
    paths: [
      "req.headers.authorization",
      "req.headers.cookie",
      "password",
      "pin",
      "credentials.password",
      "body.pin",
      "token",
    ],
    censor: "[REDACTED]",
  },
})

/**
 * Create a child logger scoped to one component of the desk.
 */
export function createComponentLogger(component: string) {
  return logger.child({ component })
}

/**
 * Create a child logger with request context.
 */
export function createRequestLogger(method: string, path: string) {
  return logger.child({ method, path })
}

export type Logger = typeof logger
