/**
 * Locates and reads db/schema.sql.
 */

import { existsSync, readFileSync } from "fs"
import { dirname, join } from "path"
import { fileURLToPath } from "url"

const __dirname = dirname(fileURLToPath(import.meta.url))

/**
 * Find the schema file, handling both development and production paths.
 */
export function findSchemaPath(): string {
  const possiblePaths = [
    join(__dirname, "..", "..", "..", "db", "schema.sql"), // from src/lib/db
    join(__dirname, "..", "..", "..", "..", "db", "schema.sql"), // from dist/src/lib/db
  ]

  for (const path of possiblePaths) {
    if (existsSync(path)) {
      return path
    }
  }

  // Default to first path even if it doesn't exist (will error later with useful message)
  return possiblePaths[0]
}

export function loadSchemaSql(): string {
  return readFileSync(findSchemaPath(), "utf-8")
}
