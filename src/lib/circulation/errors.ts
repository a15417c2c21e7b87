/**
 * Errors raised while driving the library UI.
 *
 * Each carries a stable `kind` so callers can tell a missing reader from
 * selector rot without parsing messages.
 */

import type { ErrorKind } from "./types.js"

export class CirculationError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind
  ) {
    super(message)
    this.name = "CirculationError"
  }
}

export class InitializationError extends CirculationError {
  constructor(message: string) {
    super(message, "initialization")
    this.name = "InitializationError"
  }
}

export class AuthenticationRequiredError extends CirculationError {
  constructor(message = "Manual login required: library credentials are not configured") {
    super(message, "authentication-required")
    this.name = "AuthenticationRequiredError"
  }
}

export class AuthenticationTimeoutError extends CirculationError {
  constructor(message: string) {
    super(message, "authentication-timeout")
    this.name = "AuthenticationTimeoutError"
  }
}

export class ReaderNotFoundError extends CirculationError {
  constructor(public readonly query: string) {
    super(`Reader not found: ${query}`, "reader-not-found")
    this.name = "ReaderNotFoundError"
  }
}

export class ReaderNotSelectedError extends CirculationError {
  constructor(public readonly query: string) {
    super(`Reader was not selected: ${query}`, "reader-not-selected")
    this.name = "ReaderNotSelectedError"
  }
}

export class ReaderQueryMissingError extends CirculationError {
  constructor() {
    super("A reader query (card barcode or name) is required to issue a book", "reader-query-missing")
    this.name = "ReaderQueryMissingError"
  }
}

export class ElementNotFoundError extends CirculationError {
  constructor(
    public readonly element: string,
    public readonly strategiesTried: string[]
  ) {
    super(`Could not find ${element} (tried: ${strategiesTried.join(", ")})`, "element-not-found")
    this.name = "ElementNotFoundError"
  }
}

export class OperationTimeoutError extends CirculationError {
  constructor(message: string) {
    super(message, "operation-timeout")
    this.name = "OperationTimeoutError"
  }
}

export class SecurityRejectionError extends CirculationError {
  constructor(message = "Book is issued to another reader; return was cancelled") {
    super(message, "security-rejection")
    this.name = "SecurityRejectionError"
  }
}
