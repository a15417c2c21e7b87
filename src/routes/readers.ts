import { Request, Response, Router } from "express"

import type { DeskOperations } from "../lib/circulation/circulation-desk.js"
import { READER_FIELD, type ReaderRecord } from "../lib/circulation/types.js"
import { logger } from "../lib/logger.js"

const SEARCH_LIMIT = 4
const CARDCODE_SEARCH_LIMIT = 10

function queryParam(req: Request, name: string): string {
  const value = req.query[name]
  return typeof value === "string" ? value.trim() : ""
}

function cardBarcodeOf(reader: ReaderRecord): string | undefined {
  return reader.fields.find((field) => field.code === READER_FIELD.CARD_BARCODE)?.value
}

export function createReadersRouter(desk: DeskOperations): Router {
  const router = Router()

  // GET /api/readers/search?q=
  router.get("/search", async (req: Request, res: Response): Promise<void> => {
    const query = queryParam(req, "q")
    if (query.length < 2) {
      res.status(400).json({ error: { message: "Query must be at least 2 characters" } })
      return
    }

    try {
      const result = await desk.search(query, SEARCH_LIMIT)
      if (!result.ok) {
        res.status(502).json({ error: { message: result.error ?? "Search failed" } })
        return
      }
      res.json({ results: result.results })
    } catch (error) {
      logger.error({ error }, "Error searching readers")
      res.status(500).json({ error: { message: "Failed to search readers" } })
    }
  })

  // GET /api/readers/search-by-cardcode?cardcode=
  // Exact match on the library card barcode among a wider search
  router.get("/search-by-cardcode", async (req: Request, res: Response): Promise<void> => {
    const cardcode = queryParam(req, "cardcode")
    if (cardcode.length < 5 || cardcode.length > 13) {
      res.status(400).json({ error: { message: "Card code must be 5 to 13 characters" } })
      return
    }

    try {
      const result = await desk.search(cardcode, CARDCODE_SEARCH_LIMIT)
      if (!result.ok) {
        res.status(502).json({ error: { message: result.error ?? "Search failed" } })
        return
      }

      const reader = result.results.find((candidate) => cardBarcodeOf(candidate) === cardcode)
      if (!reader) {
        res.status(404).json({ error: { message: "Reader not found with this cardcode" } })
        return
      }
      res.json({ result: reader })
    } catch (error) {
      logger.error({ error }, "Error searching reader by card code")
      res.status(500).json({ error: { message: "Failed to search readers" } })
    }
  })

  return router
}
