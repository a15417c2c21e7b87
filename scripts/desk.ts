#!/usr/bin/env node
/**
 * Drive the circulation desk from a terminal.
 *
 * Usage:
 *   npm run desk -- search "Anna Ivanova" --limit 4
 *   npm run desk -- issue 2100000005088 --card 21000004099 --days 7
 *   npm run desk -- return 2100000005088
 *   npm run desk -- health
 *   npm run desk -- login --wait 180
 *   npm run desk -- hash-pin 2468
 */

import "dotenv/config"
import { Command, InvalidArgumentError } from "commander"

import { hashPin } from "../src/lib/admin-auth.js"
import { CirculationDesk } from "../src/lib/circulation/circulation-desk.js"

const LOGIN_POLL_MS = 2000

export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError("Must be a positive integer")
  }
  const parsed = parseInt(value, 10)
  if (parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer")
  }
  return parsed
}

interface Stoppable {
  stop(): Promise<void>
}

/**
 * Run one desk call, print its result as JSON and stop the browser.
 * Resolves to the process exit code.
 */
export async function runWithDesk<D extends Stoppable, R extends { ok: boolean }>(
  desk: D,
  work: (desk: D) => Promise<R>
): Promise<number> {
  try {
    const result = await work(desk)
    console.log(JSON.stringify(result, null, 2))
    return result.ok ? 0 : 1
  } catch (error) {
    console.error(error instanceof Error ? error.message : error)
    return 1
  } finally {
    await desk.stop()
  }
}

/**
 * Open the login page and wait for the librarian to finish logging in.
 */
export async function waitForManualLogin(
  desk: Pick<CirculationDesk, "manualLogin" | "health">,
  waitSeconds: number,
  sleep: (ms: number) => Promise<void> = (ms) => new Promise((resolve) => setTimeout(resolve, ms))
): Promise<{ ok: boolean; message: string }> {
  const opened = await desk.manualLogin()
  if (!opened.ok) {
    return opened
  }
  console.log(`${opened.message}. Waiting up to ${waitSeconds}s for login...`)

  const deadline = Date.now() + waitSeconds * 1000
  while (Date.now() < deadline) {
    const health = await desk.health()
    if (health.loggedIn) {
      return { ok: true, message: "Logged in; the browser profile keeps the session" }
    }
    await sleep(LOGIN_POLL_MS)
  }
  return { ok: false, message: `Not logged in after ${waitSeconds}s` }
}

const program = new Command()
  .name("circulation-desk")
  .description("Search readers, issue and return books through the library web UI")

program
  .command("search")
  .description("Search readers by card barcode or name")
  .argument("<query>", "Card barcode or part of a name")
  .option("-l, --limit <number>", "Maximum number of readers", parsePositiveInt)
  .action(async (query: string, options: { limit?: number }) => {
    process.exitCode = await runWithDesk(new CirculationDesk(), (desk) => desk.search(query, options.limit))
  })

program
  .command("issue")
  .description("Issue a book to a reader")
  .argument("<barcode>", "Item barcode")
  .requiredOption("-c, --card <barcode>", "Reader's card barcode or name")
  .option("-r, --reader-id <id>", "Reader id, recorded only")
  .option("-d, --days <number>", "Loan length in days", parsePositiveInt)
  .action(async (barcode: string, options: { card: string; readerId?: string; days?: number }) => {
    process.exitCode = await runWithDesk(new CirculationDesk(), (desk) =>
      desk.issue({
        itemBarcode: barcode,
        readerMatchQuery: options.card,
        readerId: options.readerId,
        loanDurationDays: options.days,
      })
    )
  })

program
  .command("return")
  .description("Return a book")
  .argument("<barcode>", "Item barcode")
  .option("-c, --card <barcode>", "Reader's card barcode, when the desk asks for a reader")
  .action(async (barcode: string, options: { card?: string }) => {
    process.exitCode = await runWithDesk(new CirculationDesk(), (desk) =>
      desk.returnItem({ itemBarcode: barcode, readerMatchQuery: options.card })
    )
  })

program
  .command("health")
  .description("Start the browser and report the session state")
  .action(async () => {
    process.exitCode = await runWithDesk(new CirculationDesk(), async (desk) => {
      await desk.start()
      return desk.health()
    })
  })

program
  .command("login")
  .description("Open the login page for a manual login and wait for it")
  .option("-w, --wait <seconds>", "How long to wait for the login", parsePositiveInt, 120)
  .action(async (options: { wait: number }) => {
    process.exitCode = await runWithDesk(new CirculationDesk(), (desk) =>
      waitForManualLogin(desk, options.wait)
    )
  })

program
  .command("hash-pin")
  .description("Print the bcrypt hash of an admin PIN, for ADMIN_PIN_HASH")
  .argument("<pin>", "Admin PIN")
  .action(async (pin: string) => {
    console.log(await hashPin(pin))
  })

// Only run when executed directly
const isMainModule = import.meta.url === `file://${process.argv[1]}`
if (isMainModule) {
  await program.parseAsync()
}
