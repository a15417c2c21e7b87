/**
 * Type definitions for the circulation desk automation.
 */

import type { AmbiguousOutcomePolicy } from "../config.js"

// ============================================================================
// Session
// ============================================================================

/**
 * Lifecycle of the shared browser session.
 * "logging-in" is only ever entered while the operation lock is held.
 */
export type SessionPhase = "stopped" | "ready" | "logging-in"

export interface SessionHealth {
  ok: boolean
  pageOpen: boolean
  url: string | null
  loggedIn: boolean
  message: string
}

export interface ManualLoginResult {
  ok: boolean
  message: string
  url: string | null
}

// ============================================================================
// Readers
// ============================================================================

export interface ReaderField {
  code: string
  value: string
}

/**
 * A reader as returned by the library's search.
 * externalId is null until the system itself reveals it.
 */
export interface ReaderRecord {
  externalId: string | null
  fields: ReaderField[]
}

export const READER_FIELD = {
  FIRST_NAME: "FIRST_NAME",
  LAST_NAME: "LAST_NAME",
  CARD_BARCODE: "LIBRARY_CARD_BARCODE",
  EMAIL: "EMAIL",
} as const

// ============================================================================
// Actions
// ============================================================================

export type OperationKind = "issue" | "return"

export interface ActionRequest {
  itemBarcode: string
  operationKind: OperationKind
  /** Text used to pick the reader from the search dropdown */
  readerMatchQuery?: string
  /** Reader id known to the caller; recorded, never typed into the UI */
  readerId?: string
  /** Already clamped to [1, maxLoanDays] by the caller */
  loanDurationDays?: number
}

export type ActionOutcome = "success" | "failure" | "security-rejection" | "ambiguous"

export type ErrorKind =
  | "initialization"
  | "authentication-required"
  | "authentication-timeout"
  | "reader-not-found"
  | "reader-not-selected"
  | "reader-query-missing"
  | "element-not-found"
  | "operation-timeout"
  | "security-rejection"
  | "unexpected"

export interface ActionResult {
  ok: boolean
  message: string
  outcome: ActionOutcome
  securityRejection: boolean
  rawResponse?: unknown
  errorKind?: ErrorKind
}

export interface SearchResult {
  ok: boolean
  results: ReaderRecord[]
  error?: string
  errorKind?: ErrorKind
}

// ============================================================================
// Outcome classification
// ============================================================================

export interface CapturedResponse {
  url: string
  status: number
  body: unknown
}

export interface DomSignals {
  errorText: string | null
  successText: string | null
}

export interface ClassificationInput {
  operation: OperationKind
  response: CapturedResponse | null
  dom: DomSignals
  barcodeCleared: boolean
  ambiguousPolicy: AmbiguousOutcomePolicy
}

export interface Classification {
  ok: boolean
  outcome: Exclude<ActionOutcome, "security-rejection">
  message: string
}
