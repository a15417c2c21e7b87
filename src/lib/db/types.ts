/**
 * Row types for the circulation desk tables.
 */

export type ReturnRequestStatus = "PENDING" | "APPROVED" | "REJECTED"

export const RETURN_REQUEST_STATUSES: readonly ReturnRequestStatus[] = ["PENDING", "APPROVED", "REJECTED"]

// A return asked for at the self-service desk, waiting for a librarian
export interface ReturnRequestRecord {
  id: number
  barcode: string
  reader_id: string | null
  card_barcode: string | null
  status: ReturnRequestStatus
  created_at: Date
  created_ip: string | null
  created_ua: string | null
  decided_at: Date | null
  decided_by: string | null
  last_error: string | null
}

export interface NewReturnRequest {
  barcode: string
  readerId?: string | null
  cardBarcode?: string | null
  ip?: string | null
  userAgent?: string | null
}

// A successful issue, kept as a local log
export interface IssuedBookRecord {
  id: number
  barcode: string
  reader_id: string | null
  card_barcode: string | null
  loan_days: number
  issued_at: Date
  issued_by_ip: string | null
  issued_by_ua: string | null
}

export interface NewIssuedBook {
  barcode: string
  readerId?: string | null
  cardBarcode?: string | null
  loanDays: number
  ip?: string | null
  userAgent?: string | null
}

export interface CirculationStats {
  issuedBooks: number
  returnRequests: Record<ReturnRequestStatus, number>
}
