/**
 * JSON over HTTP for the upstream adapters.
 *
 * Status mapping:
 * - 2xx: parsed JSON
 * - 404: null (caller decides whether absence is meaningful)
 * - 408, 425, 429, 5xx: TransientExternalError (retryable)
 * - other 4xx: ExternalRequestError (not retried)
 * Network failures propagate unchanged; the client guard classifies them.
 */

import type { ExternalService } from '../lib/errors'
import { DataShapeError, ExternalRequestError, TransientExternalError } from '../lib/errors'

const RETRYABLE_STATUS_CODES = [408, 425, 429, 500, 502, 503, 504]

export const DEFAULT_HEADERS: Record<string, string> = {
  Accept: 'application/json',
  'User-Agent': 'brewlink-syncer/0.1',
}

export interface JsonRequest {
  url: string
  headers?: Record<string, string>
  signal?: AbortSignal
}

export async function fetchJson(service: ExternalService, request: JsonRequest): Promise<unknown> {
  const response = await fetch(request.url, {
    method: 'GET',
    headers: { ...DEFAULT_HEADERS, ...request.headers },
    signal: request.signal,
  })

  if (response.status === 404) {
    return null
  }

  if (!response.ok) {
    const message = `${service} responded ${response.status} ${response.statusText}`.trim()
    if (RETRYABLE_STATUS_CODES.includes(response.status) || response.status >= 500) {
      throw new TransientExternalError(service, message, { status: response.status })
    }
    throw new ExternalRequestError(service, response.status, message)
  }

  const body = await response.text()
  try {
    return JSON.parse(body)
  } catch {
    throw new DataShapeError(service, `${service} returned a non-JSON body`, [`length=${body.length}`])
  }
}

export function joinUrl(baseUrl: string, path: string, query: Record<string, string | number> = {}): string {
  const url = new URL(path.replace(/^\//, ''), baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`)
  for (const [key, value] of Object.entries(query)) {
    url.searchParams.set(key, String(value))
  }
  return url.toString()
}
