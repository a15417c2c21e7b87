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

import { recordIssuedBook } from "../lib/db/circulation.js"
import { actionFailure, actionSuccess, createTestApp } from "../test/fake-desk.js"

describe("rpa routes", () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  describe("GET /rpa/health", () => {
    it("returns the desk health", async () => {
      const { app, desk } = createTestApp()
      const health = {
        ok: true,
        pageOpen: true,
        url: "https://library.test/workspace/issuance",
        loggedIn: true,
        message: "Session ready",
      }
      desk.health.mockResolvedValue(health)

      const res = await request(app).get("/rpa/health")

      expect(res.status).toBe(200)
      expect(res.body).toEqual(health)
    })
  })

  describe("POST /rpa/manual-login", () => {
    it("returns the manual login result", async () => {
      const { app, desk } = createTestApp()
      desk.manualLogin.mockResolvedValue({
        ok: true,
        message: "Login page opened",
        url: "https://library.test/auth/login",
      })

      const res = await request(app).post("/rpa/manual-login")

      expect(res.body).toEqual({ ok: true, message: "Login page opened", url: "https://library.test/auth/login" })
    })
  })

  describe("POST /rpa/issue", () => {
    it("rejects a body without a barcode", async () => {
      const { app, desk } = createTestApp()

      const res = await request(app).post("/rpa/issue").send({ cardBarcode: "21000004099" })

      expect(res.status).toBe(400)
      expect(res.body).toEqual({ error: { message: "barcode is required" } })
      expect(desk.issue).not.toHaveBeenCalled()
    })

    it("rejects a body without a card barcode", async () => {
      const { app } = createTestApp()

      const res = await request(app).post("/rpa/issue").send({ barcode: "2100000005088" })

      expect(res.status).toBe(400)
      expect(res.body).toEqual({ error: { message: "cardBarcode is required" } })
    })

    it("rejects a loan length that is not a number", async () => {
      const { app } = createTestApp()

      const res = await request(app)
        .post("/rpa/issue")
        .send({ barcode: "2100000005088", cardBarcode: "21000004099", loanDays: "two weeks" })

      expect(res.status).toBe(400)
      expect(res.body).toEqual({ error: { message: "loanDays must be a number" } })
    })

    it("clamps the loan length and records the issued book", async () => {
      const { app, desk, notify } = createTestApp(14)
      desk.issue.mockResolvedValue(actionSuccess("Issued"))

      const res = await request(app)
        .post("/rpa/issue")
        .send({ barcode: "2100000005088", readerId: 42, cardBarcode: "21000004099", loanDays: 30 })

      expect(res.status).toBe(200)
      expect(res.body).toEqual(actionSuccess("Issued"))
      expect(desk.issue).toHaveBeenCalledWith({
        itemBarcode: "2100000005088",
        readerId: "42",
        readerMatchQuery: "21000004099",
        loanDurationDays: 14,
      })
      expect(recordIssuedBook).toHaveBeenCalledWith(
        expect.objectContaining({
          barcode: "2100000005088",
          readerId: "42",
          cardBarcode: "21000004099",
          loanDays: 14,
        })
      )
      expect(notify).toHaveBeenCalledWith("issue", expect.objectContaining({ extra: { barcode: "2100000005088", ok: true } }))
    })

    it("uses the maximum loan length when none is given", async () => {
      const { app, desk } = createTestApp(10)
      desk.issue.mockResolvedValue(actionSuccess("Issued"))

      await request(app).post("/rpa/issue").send({ barcode: "2100000005088", cardBarcode: "21000004099" })

      expect(desk.issue).toHaveBeenCalledWith(expect.objectContaining({ loanDurationDays: 10 }))
    })

    it("does not record a failed issue", async () => {
      const { app, desk } = createTestApp()
      desk.issue.mockResolvedValue(actionFailure("Reader not found: 21000004099"))

      const res = await request(app)
        .post("/rpa/issue")
        .send({ barcode: "2100000005088", cardBarcode: "21000004099" })

      expect(res.status).toBe(200)
      expect(res.body.ok).toBe(false)
      expect(res.body.message).toBe("Reader not found: 21000004099")
      expect(recordIssuedBook).not.toHaveBeenCalled()
    })

    it("still reports the issue when the local record fails", async () => {
      const { app, desk } = createTestApp()
      desk.issue.mockResolvedValue(actionSuccess("Issued"))
      vi.mocked(recordIssuedBook).mockRejectedValue(new Error("connection refused"))

      const res = await request(app)
        .post("/rpa/issue")
        .send({ barcode: "2100000005088", cardBarcode: "21000004099" })

      expect(res.status).toBe(200)
      expect(res.body.ok).toBe(true)
    })

    it("answers 500 when the desk throws", async () => {
      const { app, desk } = createTestApp()
      desk.issue.mockRejectedValue(new Error("browser crashed"))

      const res = await request(app)
        .post("/rpa/issue")
        .send({ barcode: "2100000005088", cardBarcode: "21000004099" })

      expect(res.status).toBe(500)
      expect(res.body).toEqual({ error: { message: "Failed to issue book" } })
    })
  })

  describe("POST /rpa/return", () => {
    it("returns immediately without a reader", async () => {
      const { app, desk } = createTestApp()
      desk.returnItem.mockResolvedValue(actionSuccess("Returned"))

      const res = await request(app).post("/rpa/return").send({ barcode: " 2100000005088 ", cardBarcode: "" })

      expect(res.body).toEqual(actionSuccess("Returned"))
      expect(desk.returnItem).toHaveBeenCalledWith({
        itemBarcode: "2100000005088",
        readerId: undefined,
        readerMatchQuery: undefined,
      })
    })

    it("passes the card barcode as the reader query", async () => {
      const { app, desk } = createTestApp()
      desk.returnItem.mockResolvedValue(actionSuccess("Returned"))

      await request(app).post("/rpa/return").send({ barcode: "2100000005088", cardBarcode: "21000004099" })

      expect(desk.returnItem).toHaveBeenCalledWith(
        expect.objectContaining({ readerMatchQuery: "21000004099" })
      )
    })

    it("rejects malformed JSON", async () => {
      const { app, desk } = createTestApp()

      const res = await request(app).post("/rpa/return").set("Content-Type", "application/json").send("{barcode")

      expect(res.status).toBe(400)
      expect(res.body).toEqual({ error: { message: "Malformed JSON body" } })
      expect(desk.returnItem).not.toHaveBeenCalled()
    })
  })
})
