/**
 * Admin review of queued returns, plus circulation stats.
 *
 * Approving a request runs the real return in the library system; the
 * request only becomes APPROVED when that succeeds.
 */

import { Request, Response, Router } from "express"

import { logAdminAction } from "../../lib/admin-auth.js"
import {
  getCirculationStats,
  getReturnRequest,
  listIssuedBooks,
  listReturnRequests,
  markReturnRequestDecided,
  recordReturnRequestError,
} from "../../lib/db/circulation.js"
import { RETURN_REQUEST_STATUSES, type ReturnRequestStatus } from "../../lib/db/types.js"
import { logger } from "../../lib/logger.js"
import { parseId, type DeskRouteDeps } from "../validation.js"

const DECIDED_BY = "admin"
const RECENT_ISSUES_LIMIT = 20

function parseStatus(raw: unknown): ReturnRequestStatus | undefined | null {
  if (raw === undefined || raw === "") return undefined
  if (typeof raw !== "string") return null
  return RETURN_REQUEST_STATUSES.find((status) => status === raw.toUpperCase()) ?? null
}

export function createReturnsRouter(deps: DeskRouteDeps): Router {
  const router = Router()

  // ==========================================================================
  // GET /admin/api/returns?status=
  // ==========================================================================

  router.get("/returns", async (req: Request, res: Response): Promise<void> => {
    const status = parseStatus(req.query.status)
    if (status === null) {
      res.status(400).json({ error: { message: "status must be one of PENDING, APPROVED, REJECTED" } })
      return
    }

    try {
      const requests = await listReturnRequests({ status })
      res.json({ requests })
    } catch (error) {
      logger.error({ error }, "Error listing return requests")
      res.status(500).json({ error: { message: "Failed to list return requests" } })
    }
  })

  // ==========================================================================
  // POST /admin/api/returns/:id/approve
  // ==========================================================================

  router.post("/returns/:id/approve", async (req: Request, res: Response): Promise<void> => {
    const id = parseId(req.params.id)
    if (id === null) {
      res.status(400).json({ error: { message: "Invalid return request id" } })
      return
    }

    try {
      const request = await getReturnRequest(id)
      if (!request || request.status !== "PENDING") {
        res.status(404).json({ error: { message: "Return request not found or not pending" } })
        return
      }
      if (!request.card_barcode) {
        res.status(400).json({ error: { message: "Return request has no card barcode" } })
        return
      }

      const result = await deps.desk.returnItem({
        itemBarcode: request.barcode,
        readerId: request.reader_id ?? undefined,
        readerMatchQuery: request.card_barcode,
      })

      if (!result.ok) {
        await recordReturnRequestError(id, result.message)
        await logAdminAction({
          action: "approve_return_failed",
          resourceType: "return_request",
          resourceId: id,
          details: { barcode: request.barcode, message: result.message, errorKind: result.errorKind },
          ipAddress: req.ip,
          userAgent: req.get("user-agent"),
        })
        res.status(500).json({ error: { message: result.message }, result })
        return
      }

      const decided = await markReturnRequestDecided(id, "APPROVED", DECIDED_BY)
      if (!decided) {
        // Decided by someone else while the return was running
        res.status(409).json({ error: { message: "Return request was already decided" } })
        return
      }

      await logAdminAction({
        action: "approve_return",
        resourceType: "return_request",
        resourceId: id,
        details: { barcode: request.barcode },
        ipAddress: req.ip,
        userAgent: req.get("user-agent"),
      })
      void deps.notifier.notify("admin_approve", {
        path: req.path,
        ip: req.ip,
        extra: { requestId: id, barcode: request.barcode },
      })

      res.json({ ok: true, message: result.message, request: decided })
    } catch (error) {
      logger.error({ error, id }, "Error approving return request")
      res.status(500).json({ error: { message: "Failed to approve return request" } })
    }
  })

  // ==========================================================================
  // POST /admin/api/returns/:id/reject
  // ==========================================================================

  router.post("/returns/:id/reject", async (req: Request, res: Response): Promise<void> => {
    const id = parseId(req.params.id)
    if (id === null) {
      res.status(400).json({ error: { message: "Invalid return request id" } })
      return
    }

    try {
      const decided = await markReturnRequestDecided(id, "REJECTED", DECIDED_BY)
      if (!decided) {
        res.status(404).json({ error: { message: "Return request not found or not pending" } })
        return
      }

      await logAdminAction({
        action: "reject_return",
        resourceType: "return_request",
        resourceId: id,
        details: { barcode: decided.barcode },
        ipAddress: req.ip,
        userAgent: req.get("user-agent"),
      })
      void deps.notifier.notify("admin_reject", {
        path: req.path,
        ip: req.ip,
        extra: { requestId: id, barcode: decided.barcode },
      })

      res.json({ ok: true, request: decided })
    } catch (error) {
      logger.error({ error, id }, "Error rejecting return request")
      res.status(500).json({ error: { message: "Failed to reject return request" } })
    }
  })

  // ==========================================================================
  // GET /admin/api/stats
  // ==========================================================================

  router.get("/stats", async (_req: Request, res: Response): Promise<void> => {
    try {
      const [stats, recentIssues] = await Promise.all([
        getCirculationStats(),
        listIssuedBooks(RECENT_ISSUES_LIMIT),
      ])
      res.json({ ...stats, recentIssues })
    } catch (error) {
      logger.error({ error }, "Error fetching circulation stats")
      res.status(500).json({ error: { message: "Failed to fetch stats" } })
    }
  })

  return router
}
