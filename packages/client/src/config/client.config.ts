// packages/client/src/config/client.config.ts
import fs from 'node:fs'
import path from 'node:path'
import { config as dotenvConfig } from 'dotenv'

import { DEFAULT_FETCH_FIELDS } from '../core/sync/synchronizer.js'
import { noopLogger, type LoggerLike } from '../core/logger.js'
import type { ValueInputOption } from '../core/values/values.batch.js'

export const SPREADSHEETS_SCOPE = 'https://www.googleapis.com/auth/spreadsheets'
export const SPREADSHEETS_READONLY_SCOPE = 'https://www.googleapis.com/auth/spreadsheets.readonly'
export const DRIVE_FILE_SCOPE = 'https://www.googleapis.com/auth/drive.file'

export const DEFAULT_BASE_URL = 'https://sheets.googleapis.com/v4'

export type SheetsClientConfig = {
  baseUrl: string
  scopes: string[]

  serviceAccountEmail: string | null
  privateKey: string | null
  keyFile: string | null
  accessToken: string | null

  timeoutMs: number
  fetchFields: string
  valueInputOption: ValueInputOption
}

function parseIntSafe(v: string | undefined, def: number): number {
  if (v === undefined) return def
  const n = Number.parseInt(v, 10)
  return Number.isFinite(n) ? n : def
}

function clampInt(n: number, min: number, max: number): number {
  if (!Number.isFinite(n)) return min
  if (n < min) return min
  if (n > max) return max
  return n
}

function parseList(v: string | undefined, def: string[]): string[] {
  if (v === undefined) return def
  const items = v
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
  return items.length > 0 ? items : def
}

function parseValueInputOption(v: string | undefined, def: ValueInputOption): ValueInputOption {
  const n = v?.trim().toUpperCase()
  if (n === 'RAW' || n === 'USER_ENTERED') return n
  return def
}

function trimmedOrNull(v: string | undefined): string | null {
  return (v ?? '').trim() || null
}

/**
 * Build SheetsClientConfig from environment.
 *
 * Does not throw: auth fields stay null when unset. Call
 * `validateClientConfig(cfg)` before building a token provider.
 */
export function buildClientConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SheetsClientConfig {
  const baseUrl = (env.SHEETS_API_BASE_URL ?? '').trim().replace(/\/+$/, '') || DEFAULT_BASE_URL
  const scopes = parseList(env.SHEETS_SCOPES, [SPREADSHEETS_SCOPE])

  const serviceAccountEmail = trimmedOrNull(env.GOOGLE_SERVICE_ACCOUNT_EMAIL)
  // env files usually carry the PEM with escaped newlines
  const privateKey = trimmedOrNull(env.GOOGLE_PRIVATE_KEY)?.replace(/\\n/g, '\n') ?? null
  const keyFile = trimmedOrNull(env.GOOGLE_APPLICATION_CREDENTIALS)
  const accessToken = trimmedOrNull(env.SHEETS_ACCESS_TOKEN)

  const timeoutMs = clampInt(parseIntSafe(env.SHEETS_TIMEOUT_MS, 30_000), 1_000, 600_000)
  const fetchFields = (env.SHEETS_FETCH_FIELDS ?? '').trim() || DEFAULT_FETCH_FIELDS
  const valueInputOption = parseValueInputOption(env.SHEETS_VALUE_INPUT_OPTION, 'USER_ENTERED')

  return {
    baseUrl,
    scopes,
    serviceAccountEmail,
    privateKey,
    keyFile,
    accessToken,
    timeoutMs,
    fetchFields,
    valueInputOption,
  }
}

export type ClientConfigValidation = { ok: true } | { ok: false; errors: string[] }

/**
 * Checks that some credential is configured and that service-account
 * settings are complete.
 */
export function validateClientConfig(cfg: SheetsClientConfig): ClientConfigValidation {
  const errors: string[] = []

  if (!/^https?:\/\//.test(cfg.baseUrl)) {
    errors.push(`SHEETS_API_BASE_URL must be an http(s) URL, got "${cfg.baseUrl}"`)
  }
  if (cfg.scopes.length === 0) {
    errors.push('SHEETS_SCOPES must name at least one scope')
  }

  if (!cfg.accessToken) {
    if (!cfg.keyFile && !cfg.serviceAccountEmail && !cfg.privateKey) {
      errors.push(
        'no credentials: set SHEETS_ACCESS_TOKEN, GOOGLE_APPLICATION_CREDENTIALS, or GOOGLE_SERVICE_ACCOUNT_EMAIL with GOOGLE_PRIVATE_KEY'
      )
    } else if (!cfg.keyFile) {
      if (!cfg.serviceAccountEmail) errors.push('GOOGLE_SERVICE_ACCOUNT_EMAIL is required with GOOGLE_PRIVATE_KEY')
      if (!cfg.privateKey) errors.push('GOOGLE_PRIVATE_KEY is required with GOOGLE_SERVICE_ACCOUNT_EMAIL')
    }
  }

  return errors.length === 0 ? { ok: true } : { ok: false, errors }
}

/**
 * Load environment files in precedence order:
 *   1) .env
 *   2) .env.{NODE_ENV}
 *   3) .env.local
 * Later files override earlier ones. Returns the files that were loaded.
 */
export function loadEnvFiles(
  cwd: string = process.cwd(),
  nodeEnv: string = String(process.env.NODE_ENV || 'development'),
  opts: { logger?: LoggerLike } = {}
): string[] {
  const log = opts.logger ?? noopLogger
  const files = [
    path.resolve(cwd, '.env'),
    path.resolve(cwd, `.env.${nodeEnv}`),
    path.resolve(cwd, '.env.local'),
  ]

  const loaded: string[] = []
  for (const file of files) {
    if (fs.existsSync(file)) {
      dotenvConfig({ path: file, override: true })
      loaded.push(file)
      log.debug(`kind=env-file-loaded file=${file}`)
    }
  }
  log.info(`kind=env-loaded nodeEnv=${nodeEnv} files=${loaded.length}`)
  return loaded
}
