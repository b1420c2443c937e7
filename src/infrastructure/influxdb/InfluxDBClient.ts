/**
 * InfluxDB API Client
 *
 * Thin JSON-over-HTTP client for the InfluxDB v2 API. Translates non-2xx
 * responses into the shared error classes so callers never inspect status
 * codes or message text.
 */

import type { z } from "zod"
import type { ProviderConfig } from "../../shared/config"
import {
  ApiError,
  AppError,
  AuthenticationError,
  AuthorizationError,
  ConflictError,
  NotFoundError,
  ValidationError,
} from "../../shared/errors"
import { pooledFetch } from "./httpClient"
import { wireErrorSchema } from "./types"

export type HttpMethod = "GET" | "POST" | "PATCH" | "DELETE"

export interface RequestOptions {
  query?: Record<string, string>
  body?: unknown
  signal?: AbortSignal
}

const API_PREFIX = "/api/v2"

export class InfluxDBClient {
  constructor(private config: ProviderConfig) {}

  /**
   * Send a request and decode the JSON response with `schema`
   */
  async request<T>(
    method: HttpMethod,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions = {}
  ): Promise<T> {
    const response = await this.send(method, path, options)
    const payload: unknown = await response.json()
    const result = schema.safeParse(payload)

    if (!result.success) {
      throw new AppError(
        `unexpected response from ${method} ${API_PREFIX}${path}: ${result.error.issues[0].message}`,
        502,
        "INVALID_RESPONSE"
      )
    }

    return result.data
  }

  /**
   * Send a request whose response carries no body (e.g. DELETE → 204)
   */
  async requestNoContent(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<void> {
    await this.send(method, path, options)
  }

  private async send(method: HttpMethod, path: string, options: RequestOptions): Promise<Response> {
    const headers: Record<string, string> = {
      Authorization: `Token ${this.config.token}`,
      Accept: "application/json",
    }

    let body: string | undefined
    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json"
      body = JSON.stringify(options.body)
    }

    const response = await pooledFetch(this.buildUrl(path, options.query), {
      method,
      headers,
      body,
      signal: options.signal ?? AbortSignal.timeout(this.config.timeoutMs),
    })

    if (!response.ok) {
      throw await this.toError(response)
    }

    return response
  }

  private buildUrl(path: string, query?: Record<string, string>): URL {
    const base = this.config.url.replace(/\/+$/, "")
    const url = new URL(`${base}${API_PREFIX}${path}`)

    if (query) {
      for (const [key, value] of Object.entries(query)) {
        url.searchParams.set(key, value)
      }
    }

    return url
  }

  private async toError(response: Response): Promise<AppError> {
    let code: string | undefined
    let message = response.statusText || `HTTP ${response.status}`

    const text = await response.text()
    if (text) {
      try {
        const parsed = wireErrorSchema.safeParse(JSON.parse(text))
        if (parsed.success) {
          code = parsed.data.code
          message = parsed.data.message ?? message
        }
      } catch {
        message = text
      }
    }

    switch (response.status) {
      case 400:
      case 422:
        return new ValidationError(message)
      case 401:
        return new AuthenticationError(message)
      case 403:
        return new AuthorizationError(message)
      case 404:
        return new NotFoundError("Resource", message)
      case 409:
        return new ConflictError(message)
      default:
        return new ApiError(message, response.status, code)
    }
  }
}
