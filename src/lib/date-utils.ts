/**
 * Date helpers for loan due dates.
 *
 * Due dates are calendar days at the desk, so these work in local time.
 */

/**
 * Format a Date object to YYYY-MM-DD string (local calendar date).
 */
export function formatDate(date: Date): string {
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, "0")
  const day = String(date.getDate()).padStart(2, "0")
  return `${year}-${month}-${day}`
}

export function addDays(date: Date, days: number): Date {
  const result = new Date(date.getFullYear(), date.getMonth(), date.getDate())
  result.setDate(result.getDate() + days)
  return result
}

/**
 * Due date for a loan starting on `today`, as YYYY-MM-DD.
 */
export function dueDateFor(today: Date, loanDays: number): string {
  return formatDate(addDays(today, loanDays))
}
