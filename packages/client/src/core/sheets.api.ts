// packages/client/src/core/sheets.api.ts
import type { RequestExecutor } from '../transport/request-executor.js'
import { decodeResponse } from './error-decoder.js'
import { toErrorShape } from './errors.js'
import type { JsonObject } from './json.js'
import { noopLogger, type LoggerLike } from './logger.js'

// -----------------------------
// Endpoint paths
// -----------------------------

export function spreadsheetsPath(): string {
  return '/spreadsheets'
}

export function spreadsheetPath(spreadsheetId: string, fields?: string): string {
  const base = `/spreadsheets/${encodeURIComponent(spreadsheetId)}`
  return fields ? `${base}?fields=${encodeURIComponent(fields)}` : base
}

export function batchUpdatePath(spreadsheetId: string): string {
  return `/spreadsheets/${encodeURIComponent(spreadsheetId)}:batchUpdate`
}

export function valuesBatchUpdatePath(spreadsheetId: string): string {
  return `/spreadsheets/${encodeURIComponent(spreadsheetId)}/values:batchUpdate`
}

/**
 * SheetsApi
 *
 * Every remote call goes through here: executor round trip, then the error
 * decoder. Errors are logged and rethrown untouched.
 */
export class SheetsApi {
  private readonly executor: RequestExecutor
  private readonly log: LoggerLike

  constructor(opts: { executor: RequestExecutor; logger?: LoggerLike }) {
    this.executor = opts.executor
    this.log = opts.logger ?? noopLogger
  }

  async get(path: string): Promise<JsonObject> {
    try {
      return decodeResponse(await this.executor.get(path))
    } catch (err) {
      this.log.warn(`kind=api-call-failed method=GET path=${path} err=${JSON.stringify(toErrorShape(err))}`)
      throw err
    }
  }

  async post(path: string, body: unknown): Promise<JsonObject> {
    try {
      return decodeResponse(await this.executor.post(path, body))
    } catch (err) {
      this.log.warn(`kind=api-call-failed method=POST path=${path} err=${JSON.stringify(toErrorShape(err))}`)
      throw err
    }
  }
}
