import type { Response } from "express"
import { z } from "zod"

import type { DeskOperations } from "../lib/circulation/circulation-desk.js"
import type { Notifier } from "../lib/notifier.js"

/** What the desk-facing routers are built from. */
export interface DeskRouteDeps {
  desk: DeskOperations
  notifier: Notifier
  maxLoanDays: number
}

const barcode = z
  .string({ required_error: "barcode is required", invalid_type_error: "barcode must be a string" })
  .trim()
  .min(1, "barcode is required")

// Kiosk forms send ids as numbers or strings, blanks mean "not given"
function optionalText(name: string) {
  return z
    .union([z.string(), z.number()], {
      errorMap: () => ({ message: `${name} must be a string` }),
    })
    .nullish()
    .transform((value) => {
      if (value === null || value === undefined) return undefined
      const text = String(value).trim()
      return text.length > 0 ? text : undefined
    })
}

const loanDays = z.coerce
  .number({ invalid_type_error: "loanDays must be a number" })
  .int("loanDays must be a whole number")
  .optional()

export const issueBodySchema = z.object({
  barcode,
  readerId: optionalText("readerId"),
  cardBarcode: z
    .string({ required_error: "cardBarcode is required", invalid_type_error: "cardBarcode must be a string" })
    .trim()
    .min(1, "cardBarcode is required"),
  loanDays,
})

export const returnBodySchema = z.object({
  barcode,
  readerId: optionalText("readerId"),
  cardBarcode: optionalText("cardBarcode"),
})

const ACTION_MESSAGE = 'action must be "issue" or "return"'

export const submitBodySchema = z.object({
  action: z
    .string({ required_error: ACTION_MESSAGE, invalid_type_error: ACTION_MESSAGE })
    .trim()
    .toLowerCase()
    .pipe(z.enum(["issue", "return"], { errorMap: () => ({ message: ACTION_MESSAGE }) })),
  barcode,
  readerId: optionalText("readerId"),
  cardBarcode: optionalText("cardBarcode"),
  loanDays,
})

/**
 * Parse input against a schema. On failure answers 400 with the first issue
 * and returns null.
 */
export function parseOrReject<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  res: Response
): z.infer<T> | null {
  const parsed = schema.safeParse(input)
  if (!parsed.success) {
    const message = parsed.error.issues[0]?.message ?? "Invalid request"
    res.status(400).json({ error: { message } })
    return null
  }
  return parsed.data
}

/** Route parameter as a positive integer id, or null. */
export function parseId(raw: string | undefined): number | null {
  if (!raw || !/^\d+$/.test(raw)) return null
  const id = parseInt(raw, 10)
  return id > 0 ? id : null
}
