import { describe, it, expect } from "vitest"
import { FakePage, asPage } from "../../test/fake-page.js"
import {
  ReaderTraffic,
  extractReaderList,
  isProfileUrl,
  isSearchUrl,
  readerIdFromOnclick,
  readerIdFromPostData,
  searchValueOf,
  toReaderRecord,
} from "./reader-traffic.js"

const API = "https://library.test/api/interface-service/issuance/action"

describe("url matching", () => {
  it("classifies the profile list as a search", () => {
    expect(isSearchUrl(`${API}/reader/profile/list?page=0`)).toBe(true)
    expect(isProfileUrl(`${API}/reader/profile/list?page=0`)).toBe(false)
  })

  it("recognises single profile calls", () => {
    expect(isProfileUrl(`${API}/reader/profile/?readerId=5`)).toBe(true)
    expect(isSearchUrl(`${API}/reader/profile/?readerId=5`)).toBe(false)
  })
})

describe("extractReaderList", () => {
  it("accepts a bare array or an envelope", () => {
    expect(extractReaderList([{ id: 1 }])).toEqual([{ id: 1 }])
    expect(extractReaderList({ total: 1, items: [{ id: 2 }] })).toEqual([{ id: 2 }])
    expect(extractReaderList({ result: "none", list: [{ id: 3 }] })).toEqual([{ id: 3 }])
  })

  it("returns nothing for other shapes", () => {
    expect(extractReaderList({ status: 0 })).toEqual([])
    expect(extractReaderList(null)).toEqual([])
  })
})

describe("toReaderRecord", () => {
  it("prefers parentId over the other id keys", () => {
    expect(toReaderRecord({ parentId: 9, readerId: 8, id: 7 })?.externalId).toBe("9")
    expect(toReaderRecord({ reader_id: "44" })?.externalId).toBe("44")
  })

  it("leaves the id null when none is present", () => {
    expect(toReaderRecord({ fieldModels: [] })).toEqual({ externalId: null, fields: [] })
  })

  it("normalises field models", () => {
    const record = toReaderRecord({
      id: 1,
      fieldModels: [
        { code: "FIRST_NAME", value: "Anna" },
        { code: "LIBRARY_CARD_BARCODE", value: 123 },
        { code: "EMAIL", value: null },
        { value: "no code" },
      ],
    })

    expect(record?.fields).toEqual([
      { code: "FIRST_NAME", value: "Anna" },
      { code: "LIBRARY_CARD_BARCODE", value: "123" },
      { code: "EMAIL", value: "" },
    ])
  })

  it("rejects non-objects", () => {
    expect(toReaderRecord("reader")).toBeNull()
  })
})

describe("reader id extraction", () => {
  it("reads JSON and form-encoded bodies", () => {
    expect(readerIdFromPostData(JSON.stringify({ readerId: 31 }))).toBe("31")
    expect(readerIdFromPostData(JSON.stringify({ id: "32" }))).toBe("32")
    expect(readerIdFromPostData("readerId=33&tab=info")).toBe("33")
    expect(readerIdFromPostData(null)).toBeNull()
  })

  it("reads onclick handlers", () => {
    expect(readerIdFromOnclick("openReader({readerId: 22})")).toBe("22")
    expect(readerIdFromOnclick("show('readerId=23')")).toBe("23")
    expect(readerIdFromOnclick(null)).toBeNull()
  })
})

describe("searchValueOf", () => {
  const list = `${API}/reader/profile/list/4`

  it("reads the search text from the URL", () => {
    expect(searchValueOf(`${list}?searchValue=Anna%20I&page=0`, null)).toBe("Anna I")
  })

  it("reads JSON and form-encoded bodies", () => {
    expect(searchValueOf(list, JSON.stringify({ page: 0, query: "Boris" }))).toBe("Boris")
    expect(searchValueOf(list, "search=2100&page=0")).toBe("2100")
  })

  it("returns null when the request does not name its search text", () => {
    expect(searchValueOf(`${list}?page=0`, null)).toBeNull()
    expect(searchValueOf(list, JSON.stringify({ page: 0 }))).toBeNull()
  })
})

describe("ReaderTraffic", () => {
  it("keeps the latest non-empty search payload from 2xx responses", async () => {
    const page = new FakePage()
    const traffic = new ReaderTraffic(asPage(page), "Anna")
    traffic.attach()
    traffic.markSubmitted()

    page.respond({ url: `${API}/reader/profile/list`, body: { result: [{ id: 1 }] } })
    page.respond({ url: `${API}/reader/profile/list`, body: { result: [] } })
    page.respond({ url: `${API}/reader/profile/list`, status: 500, body: { result: [{ id: 2 }] } })

    expect(await traffic.readers()).toEqual([{ externalId: "1", fields: [] }])

    page.respond({ url: `${API}/reader/profile/list`, body: [{ id: 3 }] })

    expect(await traffic.readers()).toEqual([{ externalId: "3", fields: [] }])
  })

  it("only takes payloads that answer the full query", async () => {
    const page = new FakePage()
    const traffic = new ReaderTraffic(asPage(page), " Anna ")
    traffic.attach()

    page.respond({ url: `${API}/reader/profile/list?searchValue=An`, body: [{ id: 1 }] })
    page.respond({ url: `${API}/reader/profile/list`, body: [{ id: 2 }] })

    expect(await traffic.readers()).toEqual([])

    traffic.markSubmitted()
    page.respond({
      url: `${API}/reader/profile/list`,
      postData: JSON.stringify({ searchValue: "ANNA" }),
      body: [{ id: 3 }],
    })

    expect(await traffic.readers()).toEqual([{ externalId: "3", fields: [] }])
  })

  it("prefers the latest request when answers arrive out of order", async () => {
    const page = new FakePage()
    const traffic = new ReaderTraffic(asPage(page), "Anna")
    traffic.attach()

    const older = page.request(`${API}/reader/profile/list?searchValue=Anna`)
    const newer = page.request(`${API}/reader/profile/list?searchValue=anna`)
    page.answer(newer, [{ id: 2 }])
    page.answer(older, [{ id: 1 }])

    expect(await traffic.readers()).toEqual([{ externalId: "2", fields: [] }])
  })

  it("takes profile ids from requests before responses", async () => {
    const page = new FakePage()
    const traffic = new ReaderTraffic(asPage(page), "Anna")
    traffic.attach()

    page.respond({ url: `${API}/reader/profile/`, postData: "readerId=70", body: { id: 71 } })
    expect(await traffic.takeProfileId()).toBe("70")

    traffic.resetProfiles()
    page.respond({ url: `${API}/reader/profile/`, body: { readerId: 72 } })
    expect(await traffic.takeProfileId()).toBe("72")

    traffic.resetProfiles()
    expect(await traffic.takeProfileId()).toBeNull()
  })

  it("stops listening after detach", async () => {
    const page = new FakePage()
    const traffic = new ReaderTraffic(asPage(page), "Anna")
    traffic.attach()
    traffic.detach()

    page.respond({ url: `${API}/reader/profile/list`, body: [{ id: 1 }] })

    expect(await traffic.readers()).toEqual([])
    expect(page.listenerCount("request")).toBe(0)
    expect(page.listenerCount("response")).toBe(0)
  })
})
