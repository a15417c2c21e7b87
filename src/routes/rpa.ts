/**
 * Direct desk endpoints: session health, manual login, immediate issue and
 * return.
 */

import { Request, Response, Router } from "express"

import type { ActionResult } from "../lib/circulation/types.js"
import { clampLoanDays } from "../lib/config.js"
import { recordIssuedBook } from "../lib/db/circulation.js"
import { logger } from "../lib/logger.js"
import { issueBodySchema, parseOrReject, returnBodySchema, type DeskRouteDeps } from "./validation.js"

export interface IssueInput {
  barcode: string
  readerId?: string
  cardBarcode: string
  loanDays?: number
}

/**
 * Issue through the desk and keep a local record when it succeeds.
 * A failed record does not undo the issue.
 */
export async function issueAndRecord(
  deps: DeskRouteDeps,
  input: IssueInput,
  req: Request
): Promise<ActionResult> {
  const loanDays = clampLoanDays(input.loanDays, deps.maxLoanDays)
  const result = await deps.desk.issue({
    itemBarcode: input.barcode,
    readerId: input.readerId,
    readerMatchQuery: input.cardBarcode,
    loanDurationDays: loanDays,
  })

  if (result.ok) {
    try {
      await recordIssuedBook({
        barcode: input.barcode,
        readerId: input.readerId,
        cardBarcode: input.cardBarcode,
        loanDays,
        ip: req.ip,
        userAgent: req.get("user-agent"),
      })
    } catch (error) {
      logger.error({ error, barcode: input.barcode }, "Failed to record issued book")
    }
  }

  return result
}

export function createRpaRouter(deps: DeskRouteDeps): Router {
  const router = Router()

  // ==========================================================================
  // GET /rpa/health
  // ==========================================================================

  router.get("/health", async (_req: Request, res: Response): Promise<void> => {
    try {
      res.json(await deps.desk.health())
    } catch (error) {
      logger.error({ error }, "Error checking desk health")
      res.status(500).json({ error: { message: "Failed to check desk health" } })
    }
  })

  // ==========================================================================
  // POST /rpa/manual-login
  // Opens the login page for a librarian to finish by hand
  // ==========================================================================

  router.post("/manual-login", async (_req: Request, res: Response): Promise<void> => {
    try {
      res.json(await deps.desk.manualLogin())
    } catch (error) {
      logger.error({ error }, "Error opening manual login")
      res.status(500).json({ error: { message: "Failed to open manual login" } })
    }
  })

  // ==========================================================================
  // POST /rpa/issue
  // ==========================================================================

  router.post("/issue", async (req: Request, res: Response): Promise<void> => {
    const body = parseOrReject(issueBodySchema, req.body, res)
    if (!body) return

    try {
      const result = await issueAndRecord(deps, body, req)
      void deps.notifier.notify("issue", {
        path: req.path,
        ip: req.ip,
        extra: { barcode: body.barcode, ok: result.ok },
      })
      res.json(result)
    } catch (error) {
      logger.error({ error, barcode: body.barcode }, "Error issuing book")
      res.status(500).json({ error: { message: "Failed to issue book" } })
    }
  })

  // ==========================================================================
  // POST /rpa/return
  // ==========================================================================

  router.post("/return", async (req: Request, res: Response): Promise<void> => {
    const body = parseOrReject(returnBodySchema, req.body, res)
    if (!body) return

    try {
      const result = await deps.desk.returnItem({
        itemBarcode: body.barcode,
        readerId: body.readerId,
        readerMatchQuery: body.cardBarcode,
      })
      void deps.notifier.notify("return", {
        path: req.path,
        ip: req.ip,
        extra: { barcode: body.barcode, ok: result.ok },
      })
      res.json(result)
    } catch (error) {
      logger.error({ error, barcode: body.barcode }, "Error returning book")
      res.status(500).json({ error: { message: "Failed to return book" } })
    }
  })

  return router
}
