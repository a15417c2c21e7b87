/**
 * Uniform evaluation of selector strategy lists against a page.
 */

import type { Locator, Page } from "playwright-core"

import { ElementNotFoundError } from "./errors.js"
import { describeStrategy, type SelectorStrategy } from "./selectors.js"

export function toLocator(page: Page, strategy: SelectorStrategy): Locator {
  switch (strategy.kind) {
    case "placeholder":
      return page.getByPlaceholder(strategy.value)
    case "label":
      return page.getByLabel(strategy.value)
    case "role":
      return page.getByRole(strategy.role, { name: strategy.name })
    case "text":
      return page.getByText(strategy.value)
    case "css":
      return page.locator(strategy.value)
  }
}

/**
 * Wait up to timeoutMs for a locator to become visible.
 */
export async function isVisibleWithin(locator: Locator, timeoutMs: number): Promise<boolean> {
  try {
    await locator.waitFor({ state: "visible", timeout: timeoutMs })
    return true
  } catch {
    return false
  }
}

/**
 * Return the first strategy whose first match becomes visible within
 * timeoutMs (per strategy), or null when every strategy is exhausted.
 */
export async function findFirstVisible(
  page: Page,
  strategies: readonly SelectorStrategy[],
  timeoutMs: number
): Promise<Locator | null> {
  for (const strategy of strategies) {
    const candidate = toLocator(page, strategy).first()
    if (await isVisibleWithin(candidate, timeoutMs)) {
      return candidate
    }
  }
  return null
}

/**
 * Like findFirstVisible(), but a miss is an ElementNotFoundError naming
 * every strategy tried.
 */
export async function requireVisible(
  page: Page,
  strategies: readonly SelectorStrategy[],
  timeoutMs: number,
  element: string
): Promise<Locator> {
  const found = await findFirstVisible(page, strategies, timeoutMs)
  if (!found) {
    throw new ElementNotFoundError(element, strategies.map(describeStrategy))
  }
  return found
}

/**
 * Text of the first currently visible match, without waiting.
 * Used for outcome indicators, where absence is the common case.
 */
export async function firstVisibleText(
  page: Page,
  strategies: readonly SelectorStrategy[]
): Promise<string | null> {
  for (const strategy of strategies) {
    try {
      const candidate = toLocator(page, strategy).first()
      if (await candidate.isVisible()) {
        const content = (await candidate.textContent())?.trim()
        return content || describeStrategy(strategy)
      }
    } catch {
      // Detached while probing; try the next one
    }
  }
  return null
}
