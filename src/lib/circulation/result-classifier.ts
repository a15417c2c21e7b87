/**
 * Decide the outcome of an issue/return from whatever evidence was captured.
 *
 * Precedence: the action endpoint's structured response, then error
 * indicators on the page, then success indicators. With no evidence at all
 * the outcome is "ambiguous" and the configured policy decides `ok`.
 */

import type { Classification, ClassificationInput, CapturedResponse, OperationKind } from "./types.js"

const DEFAULT_SUCCESS_MESSAGE: Record<OperationKind, string> = {
  issue: "Book issued successfully",
  return: "Book returned successfully",
}

type ResponseVerdict = { ok: boolean; message: string } | null

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function messageOf(body: Record<string, unknown>): string | null {
  const message = body.message ?? body.error ?? body.errorMessage
  return typeof message === "string" && message.trim() ? message.trim() : null
}

function stringify(body: unknown): string {
  if (typeof body === "string") return body
  try {
    return JSON.stringify(body) ?? ""
  } catch {
    return String(body)
  }
}

/**
 * Read a verdict from the action endpoint's response, or null when the
 * response carries no explicit signal.
 */
export function classifyResponse(
  operation: OperationKind,
  response: CapturedResponse
): ResponseVerdict {
  const body = response.body

  if (isRecord(body)) {
    const status = body.status
    const message = messageOf(body)

    if (status === 0 || status === "0" || body.success === true) {
      return { ok: true, message: message ?? DEFAULT_SUCCESS_MESSAGE[operation] }
    }
    if (status !== undefined && status !== null) {
      return { ok: false, message: message ?? `Operation failed (status=${String(status)})` }
    }
    if (body.success === false) {
      return { ok: false, message: message ?? "Operation failed" }
    }
  }

  if (response.status >= 400) {
    return { ok: false, message: `Library system answered HTTP ${response.status}` }
  }

  const text = stringify(body).toLowerCase()
  if (text.includes("error") || text.includes("fail")) {
    const message = isRecord(body) ? messageOf(body) : null
    return { ok: false, message: message ?? "Operation failed" }
  }

  return null
}

export function classifyOutcome(input: ClassificationInput): Classification {
  if (input.response) {
    const verdict = classifyResponse(input.operation, input.response)
    if (verdict) {
      return { ...verdict, outcome: verdict.ok ? "success" : "failure" }
    }
  }

  if (input.dom.errorText) {
    return { ok: false, outcome: "failure", message: `Library system reported: ${input.dom.errorText}` }
  }

  if (input.dom.successText) {
    return { ok: true, outcome: "success", message: DEFAULT_SUCCESS_MESSAGE[input.operation] }
  }

  const hint = input.barcodeCleared ? "; the barcode field was cleared" : ""
  return {
    ok: input.ambiguousPolicy === "accept",
    outcome: "ambiguous",
    message: `No confirmation received from the library system${hint}`,
  }
}
