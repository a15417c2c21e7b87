import { describe, it, expect, vi, beforeEach } from "vitest"
import type pg from "pg"

vi.mock("./db/pool.js", () => ({
  queryWithRetry: vi.fn(),
}))

import { queryWithRetry } from "./db/pool.js"
import { loadSchemaSql } from "./db/schema.js"
import { initializeDatabase } from "./startup.js"

describe("initializeDatabase", () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it("applies db/schema.sql with five connection attempts", async () => {
    const query = vi.fn().mockResolvedValue({ rows: [] })
    vi.mocked(queryWithRetry).mockImplementation(async (fn) => fn({ query } as unknown as pg.Pool))

    await initializeDatabase()

    expect(queryWithRetry).toHaveBeenCalledWith(expect.any(Function), 5)
    expect(query).toHaveBeenCalledWith(loadSchemaSql())
  })

  it("propagates a schema failure", async () => {
    vi.mocked(queryWithRetry).mockRejectedValue(new Error("permission denied for schema public"))

    await expect(initializeDatabase()).rejects.toThrow("permission denied for schema public")
  })
})
