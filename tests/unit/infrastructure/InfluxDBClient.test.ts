/**
 * InfluxDBClient unit tests
 */

import { z } from "zod"
import { InfluxDBClient } from "../../../src/infrastructure/influxdb/InfluxDBClient"
import {
  ApiError,
  AppError,
  AuthenticationError,
  AuthorizationError,
  ConflictError,
  NotFoundError,
  ValidationError,
} from "../../../src/shared/errors"

function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  })
}

const pingSchema = z.object({ ok: z.boolean() })

describe("InfluxDBClient", () => {
  let client: InfluxDBClient
  let fetchMock: jest.SpyInstance<Promise<Response>, Parameters<typeof fetch>>

  beforeEach(() => {
    client = new InfluxDBClient({ url: "http://influx.test:8086/", token: "test-token", timeoutMs: 1000 })
    fetchMock = jest.spyOn(global, "fetch")
  })

  describe("request", () => {
    it("should prefix the API path, append the query and authenticate", async () => {
      fetchMock.mockResolvedValue(jsonResponse({ ok: true }))

      const result = await client.request("GET", "/orgs", pingSchema, { query: { org: "acme corp" } })

      expect(result).toEqual({ ok: true })
      const [url, init] = fetchMock.mock.calls[0]
      expect(String(url)).toBe("http://influx.test:8086/api/v2/orgs?org=acme+corp")
      expect(init?.method).toBe("GET")
      expect(init?.headers).toEqual({
        Authorization: "Token test-token",
        Accept: "application/json",
      })
      expect(init?.body).toBeUndefined()
    })

    it("should send a JSON body", async () => {
      fetchMock.mockResolvedValue(jsonResponse({ ok: true }, 201))

      await client.request("POST", "/orgs", pingSchema, { body: { name: "acme" } })

      const [, init] = fetchMock.mock.calls[0]
      expect(init?.body).toBe(JSON.stringify({ name: "acme" }))
      expect(init?.headers).toEqual({
        Authorization: "Token test-token",
        Accept: "application/json",
        "Content-Type": "application/json",
      })
    })

    it("should pass the caller's abort signal through unchanged", async () => {
      fetchMock.mockResolvedValue(jsonResponse({ ok: true }))
      const controller = new AbortController()

      await client.request("GET", "/orgs", pingSchema, { signal: controller.signal })

      expect(fetchMock.mock.calls[0][1]?.signal).toBe(controller.signal)
    })

    it("should bound the request with a timeout signal when none is given", async () => {
      fetchMock.mockResolvedValue(jsonResponse({ ok: true }))

      await client.request("GET", "/orgs", pingSchema)

      expect(fetchMock.mock.calls[0][1]?.signal).toBeInstanceOf(AbortSignal)
    })

    it("should reject a payload that does not match the schema", async () => {
      fetchMock.mockResolvedValue(jsonResponse({ ok: "yes" }))

      const promise = client.request("GET", "/orgs", pingSchema)

      await expect(promise).rejects.toThrow(AppError)
      await expect(promise).rejects.toMatchObject({ code: "INVALID_RESPONSE", statusCode: 502 })
    })
  })

  describe("error mapping", () => {
    it("should map 404 to NotFoundError with the backend message", async () => {
      fetchMock.mockResolvedValue(jsonResponse({ code: "not found", message: "organization not found" }, 404))

      const promise = client.request("GET", "/orgs/0000000000000001", pingSchema)

      await expect(promise).rejects.toThrow(NotFoundError)
      await expect(promise).rejects.toThrow("organization not found")
    })

    it.each([
      [400, ValidationError],
      [422, ValidationError],
      [401, AuthenticationError],
      [403, AuthorizationError],
      [409, ConflictError],
    ])("should map %i to %p", async (status, errorClass) => {
      fetchMock.mockResolvedValue(jsonResponse({ code: "some code", message: "rejected" }, status))

      await expect(client.request("GET", "/orgs", pingSchema)).rejects.toThrow(errorClass)
    })

    it("should map other statuses to ApiError with the backend code", async () => {
      fetchMock.mockResolvedValue(jsonResponse({ code: "internal error", message: "storage unavailable" }, 500))

      await expect(client.request("GET", "/orgs", pingSchema)).rejects.toMatchObject({
        name: "ApiError",
        message: "storage unavailable",
        statusCode: 500,
        code: "internal error",
      })
    })

    it("should use a non-JSON body as the message", async () => {
      fetchMock.mockResolvedValue(new Response("upstream exploded", { status: 502 }))

      const promise = client.request("GET", "/orgs", pingSchema)

      await expect(promise).rejects.toThrow(ApiError)
      await expect(promise).rejects.toThrow("upstream exploded")
    })

    it("should fall back to the status code when the body is empty", async () => {
      fetchMock.mockResolvedValue(new Response(null, { status: 503 }))

      await expect(client.request("GET", "/orgs", pingSchema)).rejects.toThrow("HTTP 503")
    })
  })

  describe("requestNoContent", () => {
    it("should resolve on 204", async () => {
      fetchMock.mockResolvedValue(new Response(null, { status: 204 }))

      await expect(client.requestNoContent("DELETE", "/orgs/0000000000000001")).resolves.toBeUndefined()
      expect(String(fetchMock.mock.calls[0][0])).toBe("http://influx.test:8086/api/v2/orgs/0000000000000001")
    })
  })
})
