// packages/client/src/transport/http.executor.ts
import { request, type Dispatcher } from 'undici'

import { TransportError } from '../core/errors.js'
import { noopLogger, type LoggerLike } from '../core/logger.js'
import type { AccessTokenProvider } from './auth.js'
import type { RequestExecutor } from './request-executor.js'

export type HttpRequestExecutorOptions = {
  baseUrl: string
  tokens: AccessTokenProvider
  timeoutMs?: number
  /** undici dispatcher; tests pass a MockAgent. */
  dispatcher?: Dispatcher
  logger?: LoggerLike
}

/**
 * HttpRequestExecutor
 *
 * Authenticated JSON GET/POST over undici. The body is returned as text for
 * every HTTP status so the error decoder can read the in-body envelope. An
 * error status with nothing to decode becomes a TransportError.
 */
export class HttpRequestExecutor implements RequestExecutor {
  private readonly baseUrl: string
  private readonly tokens: AccessTokenProvider
  private readonly timeoutMs: number
  private readonly dispatcher?: Dispatcher
  private readonly log: LoggerLike

  constructor(opts: HttpRequestExecutorOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '')
    this.tokens = opts.tokens
    this.timeoutMs = opts.timeoutMs ?? 30_000
    this.dispatcher = opts.dispatcher
    this.log = opts.logger ?? noopLogger
  }

  get(path: string): Promise<string> {
    return this.send('GET', path)
  }

  post(path: string, body: unknown): Promise<string> {
    return this.send('POST', path, JSON.stringify(body))
  }

  private async send(method: 'GET' | 'POST', path: string, body?: string): Promise<string> {
    const token = await this.tokens.getAccessToken()
    const url = `${this.baseUrl}${path}`
    const started = Date.now()

    const headers: Record<string, string> = {
      accept: 'application/json',
      authorization: `Bearer ${token}`,
    }
    if (body !== undefined) headers['content-type'] = 'application/json'

    let statusCode: number
    let text: string
    try {
      const res = await request(url, {
        method,
        headers,
        body,
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
        dispatcher: this.dispatcher,
      })
      statusCode = res.statusCode
      text = await res.body.text()
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err)
      this.log.warn(`kind=http-error method=${method} path=${path} err=${msg}`)
      throw new TransportError(`${method} ${path} failed: ${msg}`, { cause: err })
    }

    this.log.debug(
      `kind=http-response method=${method} path=${path} status=${statusCode} bytes=${text.length} ms=${Date.now() - started}`
    )

    if (statusCode >= 400 && text.trim() === '') {
      throw new TransportError(`${method} ${path} returned HTTP ${statusCode} with an empty body`, { statusCode })
    }
    return text
  }
}
