// packages/client/src/client.ts
import type { Dispatcher } from 'undici'
import { LogChannel, type LoggerBundle } from '@sheetmirror/logging'

import { buildClientConfigFromEnv, validateClientConfig, type SheetsClientConfig } from './config/client.config.js'
import { MutationCoordinator } from './core/coordinator.js'
import { DecodeError, InvalidArgumentError } from './core/errors.js'
import { readString } from './core/json.js'
import { noopLogger, type LoggerLike } from './core/logger.js'
import type { Spreadsheet } from './core/model/spreadsheet.js'
import { SheetsApi, spreadsheetsPath } from './core/sheets.api.js'
import { Synchronizer } from './core/sync/synchronizer.js'
import { createTokenProvider, type AccessTokenProvider } from './transport/auth.js'
import { HttpRequestExecutor } from './transport/http.executor.js'
import type { RequestExecutor } from './transport/request-executor.js'

export type SheetsClientOptions = {
  /** Overrides on top of the environment-derived config. */
  config?: Partial<SheetsClientConfig>
  env?: NodeJS.ProcessEnv
  /** Replaces HTTP transport and auth entirely. */
  executor?: RequestExecutor
  /** Replaces the token provider derived from config. */
  tokens?: AccessTokenProvider
  dispatcher?: Dispatcher
  /** Channel loggers are taken from here; without it nothing is logged. */
  logger?: LoggerBundle
}

type Loggers = Record<'client' | 'config' | 'batch' | 'sync' | 'values' | 'transport', LoggerLike>

function channelLoggers(bundle: LoggerBundle | undefined): Loggers {
  if (!bundle) {
    return {
      client: noopLogger,
      config: noopLogger,
      batch: noopLogger,
      sync: noopLogger,
      values: noopLogger,
      transport: noopLogger,
    }
  }
  return {
    client: bundle.channel(LogChannel.client),
    config: bundle.channel(LogChannel.config),
    batch: bundle.channel(LogChannel.batch),
    sync: bundle.channel(LogChannel.sync),
    values: bundle.channel(LogChannel.values),
    transport: bundle.channel(LogChannel.transport),
  }
}

/**
 * SheetsClient
 *
 * Entry point: loads and mirrors spreadsheets, and exposes the coordinator
 * for every mutation on them.
 */
export class SheetsClient {
  readonly config: SheetsClientConfig
  readonly api: SheetsApi
  readonly synchronizer: Synchronizer
  readonly coordinator: MutationCoordinator

  private readonly log: LoggerLike

  constructor(config: SheetsClientConfig, executor: RequestExecutor, loggers: Loggers) {
    this.config = config
    this.log = loggers.client
    this.api = new SheetsApi({ executor, logger: loggers.transport })
    this.synchronizer = new Synchronizer({ api: this.api, fetchFields: config.fetchFields, logger: loggers.sync })
    this.coordinator = new MutationCoordinator({
      api: this.api,
      synchronizer: this.synchronizer,
      valueInputOption: config.valueInputOption,
      logger: loggers.batch,
      valuesLogger: loggers.values,
    })
  }

  fetchSpreadsheet(spreadsheetId: string): Promise<Spreadsheet> {
    return this.synchronizer.fetch(spreadsheetId)
  }

  /**
   * Create a spreadsheet remotely, then load it. Sheet titles are optional;
   * the server adds one default sheet when none are given.
   */
  async createSpreadsheet(title: string, sheetTitles: readonly string[] = []): Promise<Spreadsheet> {
    if (!title) {
      throw new InvalidArgumentError('spreadsheet title must not be empty')
    }

    const body: { properties: { title: string }; sheets?: { properties: { title: string } }[] } = {
      properties: { title },
    }
    if (sheetTitles.length > 0) {
      body.sheets = sheetTitles.map((t) => ({ properties: { title: t } }))
    }

    const res = await this.api.post(spreadsheetsPath(), body)
    const id = readString(res.spreadsheetId)
    if (!id) {
      throw new DecodeError('create response has no spreadsheetId', { body: JSON.stringify(res) })
    }
    this.log.info(`kind=spreadsheet-created id=${id} sheets=${sheetTitles.length}`)
    return this.synchronizer.fetch(id)
  }
}

/**
 * Build a client from environment config (plus overrides). Without an
 * injected executor the HTTP executor and a token provider are created from
 * the config, which is validated first and throws InvalidArgumentError when
 * incomplete.
 */
export function createSheetsClient(opts: SheetsClientOptions = {}): SheetsClient {
  const config: SheetsClientConfig = { ...buildClientConfigFromEnv(opts.env), ...opts.config }
  const loggers = channelLoggers(opts.logger)

  const executor =
    opts.executor ??
    new HttpRequestExecutor({
      baseUrl: config.baseUrl,
      tokens: opts.tokens ?? tokensFromConfig(config, loggers.config),
      timeoutMs: config.timeoutMs,
      dispatcher: opts.dispatcher,
      logger: loggers.transport,
    })

  loggers.client.debug(
    `kind=client-ready baseUrl=${config.baseUrl} valueInputOption=${config.valueInputOption} timeoutMs=${config.timeoutMs}`
  )
  return new SheetsClient(config, executor, loggers)
}

function tokensFromConfig(config: SheetsClientConfig, log: LoggerLike): AccessTokenProvider {
  const result = validateClientConfig(config)
  if (!result.ok) {
    log.warn(`kind=config-invalid errors=${JSON.stringify(result.errors)}`)
    throw new InvalidArgumentError(`invalid client config: ${result.errors.join('; ')}`)
  }
  const auth = config.accessToken ? 'static-token' : 'service-account'
  log.info(`kind=config-ok auth=${auth} scopes=${config.scopes.join(',')}`)
  return createTokenProvider(config)
}
