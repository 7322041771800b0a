import type { HttpMethod } from '../types/source'
import { FetchError, SourceAbortedError, errorMessage } from '../utils/errors'

export interface HttpRequest {
  method: HttpMethod
  url: string
  headers: Record<string, string>
  body?: string
  signal?: AbortSignal
  /** `bytes` returns the raw body; `parsed` decodes JSON or text */
  responseType?: 'parsed' | 'bytes'
}

export interface HttpResponse {
  status: number
  /** Header names are lower-cased */
  headers: Record<string, string>
  /** Parsed JSON, text, or `Uint8Array` for `bytes` requests */
  body: unknown
}

/**
 * Transport seam for every request the engine makes.
 */
export interface HttpClient {
  request(request: HttpRequest): Promise<HttpResponse>
}

/**
 * Merges query parameters into a URL, replacing parameters of the same name
 */
export function buildUrl(
  url: string,
  params: Readonly<Record<string, string | number>>
): string {
  const entries = Object.entries(params)
  if (entries.length === 0) {
    return url
  }
  const target = new URL(url)
  for (const [name, value] of entries) {
    target.searchParams.set(name, String(value))
  }
  return target.toString()
}

export function isJsonContentType(contentType: string | undefined): boolean {
  if (!contentType) {
    return false
  }
  const mediaType = contentType.split(';')[0].trim().toLowerCase()
  return mediaType === 'application/json' || mediaType.endsWith('+json')
}

/**
 * `HttpClient` over the global `fetch`.
 */
export class FetchHttpClient implements HttpClient {
  async request(request: HttpRequest): Promise<HttpResponse> {
    let response: Response
    try {
      response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: request.signal,
      })
    } catch (error) {
      if (request.signal?.aborted) {
        throw new SourceAbortedError('Request aborted', { url: request.url })
      }
      throw new FetchError(`Request to ${request.url} failed: ${errorMessage(error)}`, {
        url: request.url,
        retryable: true,
        cause: error,
      })
    }

    const headers: Record<string, string> = {}
    response.headers.forEach((value, name) => {
      headers[name.toLowerCase()] = value
    })

    return {
      status: response.status,
      headers,
      body: await this.readBody(request, response, headers['content-type']),
    }
  }

  private async readBody(
    request: HttpRequest,
    response: Response,
    contentType: string | undefined
  ): Promise<unknown> {
    if (request.responseType === 'bytes') {
      return new Uint8Array(await response.arrayBuffer())
    }
    const text = await response.text()
    if (!isJsonContentType(contentType) || text.length === 0) {
      return text
    }
    try {
      const parsed: unknown = JSON.parse(text)
      return parsed
    } catch (error) {
      throw new FetchError(`Response from ${request.url} is not valid JSON: ${errorMessage(error)}`, {
        url: request.url,
        status: response.status,
        retryable: false,
        cause: error,
      })
    }
  }
}
