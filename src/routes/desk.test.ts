import { describe, it, expect, vi, beforeEach } from "vitest"
import request from "supertest"

vi.mock("../lib/db/circulation.js", () => ({
  recordIssuedBook: vi.fn(),
  createReturnRequest: vi.fn(),
  getReturnRequest: vi.fn(),
  listReturnRequests: vi.fn(),
  listIssuedBooks: vi.fn(),
  markReturnRequestDecided: vi.fn(),
  recordReturnRequestError: vi.fn(),
  getCirculationStats: vi.fn(),
}))

import { createReturnRequest, recordIssuedBook } from "../lib/db/circulation.js"
import type { ReturnRequestRecord } from "../lib/db/types.js"
import { actionSuccess, createTestApp } from "../test/fake-desk.js"

function pendingRequest(id: number): ReturnRequestRecord {
  return {
    id,
    barcode: "2100000005088",
    reader_id: "42",
    card_barcode: "21000004099",
    status: "PENDING",
    created_at: new Date("2026-03-10T09:30:00Z"),
    created_ip: null,
    created_ua: null,
    decided_at: null,
    decided_by: null,
    last_error: null,
  }
}

describe("POST /api/desk/submit", () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it("queues a return request instead of returning the book", async () => {
    const { app, desk } = createTestApp()
    vi.mocked(createReturnRequest).mockResolvedValue(pendingRequest(7))

    const res = await request(app)
      .post("/api/desk/submit")
      .send({ action: "return", barcode: "2100000005088", readerId: "42", cardBarcode: "21000004099" })

    expect(res.status).toBe(201)
    expect(res.body).toEqual({
      ok: true,
      message: "Return request created. A librarian will confirm it once the book is received.",
      requestId: 7,
      status: "PENDING",
    })
    expect(createReturnRequest).toHaveBeenCalledWith(
      expect.objectContaining({ barcode: "2100000005088", readerId: "42", cardBarcode: "21000004099" })
    )
    expect(desk.returnItem).not.toHaveBeenCalled()
  })

  it("requires a card barcode to issue", async () => {
    const { app, desk } = createTestApp()

    const res = await request(app).post("/api/desk/submit").send({ action: "issue", barcode: "2100000005088" })

    expect(res.status).toBe(400)
    expect(res.body).toEqual({ error: { message: "cardBarcode is required to issue a book" } })
    expect(desk.issue).not.toHaveBeenCalled()
  })

  it("issues right away and records the loan", async () => {
    const { app, desk } = createTestApp(14)
    desk.issue.mockResolvedValue(actionSuccess("Issued"))

    const res = await request(app)
      .post("/api/desk/submit")
      .send({ action: " Issue ", barcode: "2100000005088", cardBarcode: "21000004099", loanDays: "7" })

    expect(res.status).toBe(200)
    expect(res.body).toEqual(actionSuccess("Issued"))
    expect(desk.issue).toHaveBeenCalledWith({
      itemBarcode: "2100000005088",
      readerId: undefined,
      readerMatchQuery: "21000004099",
      loanDurationDays: 7,
    })
    expect(recordIssuedBook).toHaveBeenCalledWith(expect.objectContaining({ loanDays: 7 }))
  })

  it("rejects an unknown action", async () => {
    const { app } = createTestApp()

    const res = await request(app).post("/api/desk/submit").send({ action: "renew", barcode: "2100000005088" })

    expect(res.status).toBe(400)
    expect(res.body).toEqual({ error: { message: 'action must be "issue" or "return"' } })
  })

  it("notifies about every valid submission", async () => {
    const { app, notify } = createTestApp()
    vi.mocked(createReturnRequest).mockResolvedValue(pendingRequest(1))

    await request(app)
      .post("/api/desk/submit")
      .set("User-Agent", "kiosk")
      .send({ action: "return", barcode: "2100000005088" })

    expect(notify).toHaveBeenCalledWith(
      "submit",
      expect.objectContaining({
        path: "/submit",
        userAgent: "kiosk",
        extra: { action: "return", barcode: "2100000005088", readerId: "" },
      })
    )
  })

  it("answers 500 when the request cannot be stored", async () => {
    const { app } = createTestApp()
    vi.mocked(createReturnRequest).mockRejectedValue(new Error("connection refused"))

    const res = await request(app).post("/api/desk/submit").send({ action: "return", barcode: "2100000005088" })

    expect(res.status).toBe(500)
    expect(res.body).toEqual({ error: { message: "Failed to process submission" } })
  })
})
