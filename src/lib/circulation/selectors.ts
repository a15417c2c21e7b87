/**
 * Selector strategies for the library's web UI.
 *
 * The UI is an Ant Design single-page app whose markup shifts between
 * releases, so each element is described by an ordered list of strategies
 * and resolved by findFirstVisible(). Order matters: earlier entries are
 * the most specific.
 */

export type SelectorStrategy =
  | { kind: "placeholder"; value: string }
  | { kind: "label"; value: string }
  | { kind: "role"; role: "button"; name: RegExp }
  | { kind: "text"; value: string | RegExp }
  | { kind: "css"; value: string }

const placeholder = (value: string): SelectorStrategy => ({ kind: "placeholder", value })
const label = (value: string): SelectorStrategy => ({ kind: "label", value })
const text = (value: string | RegExp): SelectorStrategy => ({ kind: "text", value })
const css = (value: string): SelectorStrategy => ({ kind: "css", value })

export function describeStrategy(strategy: SelectorStrategy): string {
  switch (strategy.kind) {
    case "role":
      return `role=${strategy.role}[name=${String(strategy.name)}]`
    case "text":
      return `text=${String(strategy.value)}`
    case "css":
      return strategy.value
    default:
      return `${strategy.kind}=${strategy.value}`
  }
}

// ============================================================================
// Login page
// ============================================================================

export const LOGIN_EMAIL_FIELDS: SelectorStrategy[] = [
  placeholder("E-mail"),
  placeholder("Email"),
  placeholder("E-mail address"),
  label("E-mail"),
  label("Email"),
  css("input[type='email']"),
  css("input[name='email']"),
  css("input[name*='username']"),
]

export const LOGIN_PASSWORD_FIELDS: SelectorStrategy[] = [
  placeholder("Password"),
  label("Password"),
  css("input[type='password']"),
  css("input[name='password']"),
]

export const LOGIN_SUBMIT_CONTROLS: SelectorStrategy[] = [
  { kind: "role", role: "button", name: /Sign in|Log in|Login|Войти/i },
  text("Sign in"),
  text("Log in"),
  text("Login"),
  text("Войти"),
  css("button[type='submit']"),
]

// ============================================================================
// Issuance workspace
// ============================================================================

/** Present only once the workspace has rendered for a logged-in user. */
export const READER_SEARCH_INPUT: SelectorStrategy[] = [placeholder("Search user")]

export const BARCODE_INPUT: SelectorStrategy[] = [placeholder("Enter barcode")]

// The navigation menu also has "Issuance" and "Return" items; only the
// radio-button toggles inside the workspace switch the form.
export const ISSUANCE_TAB: SelectorStrategy[] = [
  css(".ant-radio-group label.ant-radio-button-wrapper:has-text('Issuance')"),
  css("[class*='ant-radio-group'] label:has-text('Issuance')"),
  css(":has-text('Return'):has-text('Issuance') label:has-text('Issuance')"),
  css("label.ant-radio-button-wrapper:has-text('Return') ~ label.ant-radio-button-wrapper:has-text('Issuance')"),
  css("label.ant-radio-button-wrapper:has-text('Issuance')"),
]

export const RETURN_TAB: SelectorStrategy[] = [
  css(".ant-radio-group label.ant-radio-button-wrapper:has-text('Return')"),
  css("[class*='ant-radio-group'] label:has-text('Return')"),
  css(":has-text('Issuance'):has-text('Return') label:has-text('Return')"),
  css("label.ant-radio-button-wrapper:has-text('Return')"),
]

export const TAB_STRATEGIES = {
  issue: ISSUANCE_TAB,
  return: RETURN_TAB,
} as const

// ============================================================================
// Reader search
// ============================================================================

export const OPEN_DROPDOWN = ".ant-select-dropdown:not(.ant-select-dropdown-hidden)"
export const DROPDOWN_OPTION = `${OPEN_DROPDOWN} [role='option']`
export const ANY_OPTION = "[role='option']"
export const OPTION_CONTENT = ".ant-select-item-option-content"

/** Result elements that may carry a reader id in their attributes. */
export const RESULT_ID_ELEMENTS = "[data-reader-id], [data-id], .reader-item, .search-result-item"

/** Candidate containers for search results, most specific first. */
export const RESULT_ITEM_SELECTORS = [
  ".result",
  "[role='option']",
  ".reader-item",
  ".search-result",
  "[data-reader-id]",
  "[data-id]",
  "div[class*='result']",
  "div[class*='item']",
  "li[class*='result']",
]

export const READER_NOT_SELECTED_WARNING: SelectorStrategy = text(/Select a reader/i)
export const READER_DETAILS_CARD = ".ant-card:has(.ant-descriptions)"
export const READER_DETAILS_LABELS = [/Card barcode/i, /First Name/i, /Last Name/i]
export const READER_CARD_TITLE = ".ant-card-head-title h4"
export const READER_DETAILS_ROWS = ".ant-descriptions table tbody tr"

// ============================================================================
// Issue / return forms
// ============================================================================

export const DIALOG_CONTAINERS: SelectorStrategy[] = [
  css("[role='dialog']"),
  css(".modal"),
  css(".dialog"),
  css("[class*='modal']"),
  css("[class*='dialog']"),
]

export const DUE_DATE_INPUTS = [
  "input[placeholder*='дату']",
  "input[placeholder*='date']",
  "input[placeholder*='Выберите']",
  "input[label*='return-date']",
  "input[label*='return date']",
  "input[name*='return']",
  "input[name*='date']",
  "input[type='date']",
  "input[type='text']",
]

export const DUE_DATE_PLACEHOLDER_HINTS = ["дату", "date", "выберите"]

export const DUE_DATE_LABEL_HINTS = ["return-date", "return date"]

export const CONFIRM_BUTTONS = {
  issue: [
    "button:has-text('Issuance')",
    "button[type='submit']",
    "[role='button']:has-text('Issuance')",
  ],
  return: ["button:has-text('Return')"],
} as const

export const MODAL_CLOSE_CONTROLS: SelectorStrategy[] = [
  css("[role='dialog'] button[aria-label*='close' i]"),
  css("[role='dialog'] .ant-modal-close"),
  css("[role='dialog'] button:has-text('Close')"),
  css("[role='dialog'] button:has-text('×')"),
  css(".ant-modal-close"),
  css(".ant-modal button[aria-label='Close']"),
]

// ============================================================================
// Return warning ("given to another reader")
// ============================================================================

export const CONFIRM_MODAL = ".ant-modal-confirm"

export const CONFIRM_MODAL_CANCEL: SelectorStrategy[] = [
  css(".ant-modal-confirm-btns button:has-text('Отмена')"),
  css(".ant-modal-confirm-btns button:has-text('Cancel')"),
  css(".ant-modal-confirm-btns .ant-btn-default"),
]

// ============================================================================
// Outcome indicators, status regions before page-wide text
// ============================================================================

export const ERROR_INDICATORS: SelectorStrategy[] = [
  css(".ant-message-error"),
  css(".ant-notification-notice-error"),
  css(".ant-alert-error"),
  css(".toast-error"),
  css(".error"),
  text("error"),
  text("failed"),
]

export const SUCCESS_INDICATORS: SelectorStrategy[] = [
  css(".ant-message-success"),
  css(".ant-notification-notice-success"),
  css(".ant-alert-success"),
  css(".toast-success"),
  css(".success"),
  text("success"),
  text("issued"),
  text("completed"),
]

// ============================================================================
// Network endpoints observed during operations
// ============================================================================

export const API_PATHS = {
  readerSearch: [
    "/api/interface-service/issuance/action/reader/profile/list",
    "reader/profile/list",
    "/search",
    "reader/search",
  ],
  readerProfile: "/api/interface-service/issuance/action/reader/profile/",
  issue: "/api/interface-service/issuance/action/issue/book/item",
  return: "/api/interface-service/issuance/action/return/book/item",
} as const
