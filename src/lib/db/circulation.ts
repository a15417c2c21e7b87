/**
 * Return requests and the issued-books log.
 */

import { getPool } from "./pool.js"
import {
  RETURN_REQUEST_STATUSES,
  type CirculationStats,
  type IssuedBookRecord,
  type NewIssuedBook,
  type NewReturnRequest,
  type ReturnRequestRecord,
  type ReturnRequestStatus,
} from "./types.js"

// ============================================================================
// Return requests
// ============================================================================

export async function createReturnRequest(request: NewReturnRequest): Promise<ReturnRequestRecord> {
  const db = getPool()
  const result = await db.query<ReturnRequestRecord>(
    `INSERT INTO return_requests (barcode, reader_id, card_barcode, status, created_ip, created_ua)
     VALUES ($1, $2, $3, 'PENDING', $4, $5)
     RETURNING *`,
    [
      request.barcode,
      request.readerId || null,
      request.cardBarcode || null,
      request.ip || null,
      request.userAgent || null,
    ]
  )
  return result.rows[0]
}

export async function getReturnRequest(id: number): Promise<ReturnRequestRecord | null> {
  const db = getPool()
  const result = await db.query<ReturnRequestRecord>("SELECT * FROM return_requests WHERE id = $1", [id])
  return result.rows[0] ?? null
}

/**
 * Newest first. Without a status, every request is listed.
 */
export async function listReturnRequests(
  options: { status?: ReturnRequestStatus; limit?: number } = {}
): Promise<ReturnRequestRecord[]> {
  const db = getPool()
  const limit = options.limit ?? 100

  if (options.status) {
    const result = await db.query<ReturnRequestRecord>(
      `SELECT * FROM return_requests
       WHERE status = $1
       ORDER BY created_at DESC, id DESC
       LIMIT $2`,
      [options.status, limit]
    )
    return result.rows
  }

  const result = await db.query<ReturnRequestRecord>(
    `SELECT * FROM return_requests
     ORDER BY created_at DESC, id DESC
     LIMIT $1`,
    [limit]
  )
  return result.rows
}

/**
 * Move a PENDING request to its final status. Returns null when the request
 * does not exist or was already decided.
 */
export async function markReturnRequestDecided(
  id: number,
  status: Exclude<ReturnRequestStatus, "PENDING">,
  decidedBy: string
): Promise<ReturnRequestRecord | null> {
  const db = getPool()
  const result = await db.query<ReturnRequestRecord>(
    `UPDATE return_requests
     SET status = $2, decided_at = NOW(), decided_by = $3, last_error = NULL
     WHERE id = $1 AND status = 'PENDING'
     RETURNING *`,
    [id, status, decidedBy]
  )
  return result.rows[0] ?? null
}

export async function recordReturnRequestError(id: number, message: string): Promise<void> {
  const db = getPool()
  await db.query("UPDATE return_requests SET last_error = $2 WHERE id = $1", [id, message])
}

// ============================================================================
// Issued books
// ============================================================================

export async function recordIssuedBook(book: NewIssuedBook): Promise<IssuedBookRecord> {
  const db = getPool()
  const result = await db.query<IssuedBookRecord>(
    `INSERT INTO issued_books (barcode, reader_id, card_barcode, loan_days, issued_by_ip, issued_by_ua)
     VALUES ($1, $2, $3, $4, $5, $6)
     RETURNING *`,
    [
      book.barcode,
      book.readerId || null,
      book.cardBarcode || null,
      book.loanDays,
      book.ip || null,
      book.userAgent || null,
    ]
  )
  return result.rows[0]
}

export async function listIssuedBooks(limit: number = 50): Promise<IssuedBookRecord[]> {
  const db = getPool()
  const result = await db.query<IssuedBookRecord>(
    "SELECT * FROM issued_books ORDER BY issued_at DESC, id DESC LIMIT $1",
    [limit]
  )
  return result.rows
}

// ============================================================================
// Stats
// ============================================================================

export async function getCirculationStats(): Promise<CirculationStats> {
  const db = getPool()

  const [issued, requests] = await Promise.all([
    db.query<{ count: number }>("SELECT COUNT(*)::int AS count FROM issued_books"),
    db.query<{ status: string; count: number }>(
      "SELECT status, COUNT(*)::int AS count FROM return_requests GROUP BY status"
    ),
  ])

  const returnRequests: Record<ReturnRequestStatus, number> = { PENDING: 0, APPROVED: 0, REJECTED: 0 }
  for (const row of requests.rows) {
    const status = RETURN_REQUEST_STATUSES.find((s) => s === row.status)
    if (status) returnRequests[status] = row.count
  }

  return { issuedBooks: issued.rows[0]?.count ?? 0, returnRequests }
}
