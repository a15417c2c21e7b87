/**
 * Self-service kiosk submissions.
 *
 * Returns are only queued here; a librarian approves them once the book is
 * physically back. Issues run immediately.
 */

import { Request, Response, Router } from "express"

import { createReturnRequest } from "../lib/db/circulation.js"
import { logger } from "../lib/logger.js"
import { issueAndRecord } from "./rpa.js"
import { parseOrReject, submitBodySchema, type DeskRouteDeps } from "./validation.js"

export function createDeskRouter(deps: DeskRouteDeps): Router {
  const router = Router()

  // POST /api/desk/submit
  router.post("/submit", async (req: Request, res: Response): Promise<void> => {
    const body = parseOrReject(submitBodySchema, req.body, res)
    if (!body) return

    void deps.notifier.notify("submit", {
      path: req.path,
      ip: req.ip,
      userAgent: req.get("user-agent"),
      extra: { action: body.action, barcode: body.barcode, readerId: body.readerId ?? "" },
    })

    try {
      if (body.action === "return") {
        const request = await createReturnRequest({
          barcode: body.barcode,
          readerId: body.readerId,
          cardBarcode: body.cardBarcode,
          ip: req.ip,
          userAgent: req.get("user-agent"),
        })
        res.status(201).json({
          ok: true,
          message: "Return request created. A librarian will confirm it once the book is received.",
          requestId: request.id,
          status: request.status,
        })
        return
      }

      if (!body.cardBarcode) {
        res.status(400).json({ error: { message: "cardBarcode is required to issue a book" } })
        return
      }

      const result = await issueAndRecord(
        deps,
        { barcode: body.barcode, readerId: body.readerId, cardBarcode: body.cardBarcode, loanDays: body.loanDays },
        req
      )
      res.json(result)
    } catch (error) {
      logger.error({ error, action: body.action, barcode: body.barcode }, "Error handling desk submission")
      res.status(500).json({ error: { message: "Failed to process submission" } })
    }
  })

  return router
}
