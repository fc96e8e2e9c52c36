// packages/client/src/core/sync/synchronizer.ts
import { InvalidArgumentError } from '../errors.js'
import { noopLogger, type LoggerLike } from '../logger.js'
import { Spreadsheet } from '../model/spreadsheet.js'
import { spreadsheetPath, type SheetsApi } from '../sheets.api.js'
import { parseSpreadsheet } from './spreadsheet.wire.js'
import type { SpreadsheetSnapshot } from '../model/properties.js'

export const DEFAULT_FETCH_FIELDS =
  'spreadsheetId,properties(title,locale,autoRecalc,timeZone),sheets(properties,data.rowData.values(userEnteredValue))'

/**
 * Synchronizer
 *
 * Single reconciliation point with the server: fetch the spreadsheet with a
 * field projection and overwrite the mirror wholesale. There is no
 * incremental merge.
 */
export class Synchronizer {
  private readonly api: SheetsApi
  private readonly fields: string
  private readonly log: LoggerLike

  constructor(opts: { api: SheetsApi; fetchFields?: string; logger?: LoggerLike }) {
    this.api = opts.api
    this.fields = opts.fetchFields ?? DEFAULT_FETCH_FIELDS
    this.log = opts.logger ?? noopLogger
  }

  async fetchSnapshot(spreadsheetId: string): Promise<SpreadsheetSnapshot> {
    if (!spreadsheetId) {
      throw new InvalidArgumentError('spreadsheetId must not be empty')
    }
    const body = await this.api.get(spreadsheetPath(spreadsheetId, this.fields))
    return parseSpreadsheet(body)
  }

  async fetch(spreadsheetId: string): Promise<Spreadsheet> {
    const snapshot = await this.fetchSnapshot(spreadsheetId)
    this.log.info(`kind=spreadsheet-fetched id=${snapshot.spreadsheetId} sheets=${snapshot.sheets.length}`)
    return new Spreadsheet(snapshot)
  }

  async resynchronize(spreadsheet: Spreadsheet | null | undefined): Promise<void> {
    if (!spreadsheet) {
      throw new InvalidArgumentError('spreadsheet must not be null')
    }
    const snapshot = await this.fetchSnapshot(spreadsheet.id)
    spreadsheet.applySnapshot(snapshot)
    this.log.debug(`kind=spreadsheet-resynced id=${spreadsheet.id} sheets=${snapshot.sheets.length}`)
  }
}
