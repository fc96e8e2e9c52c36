// packages/client/src/core/coordinator.ts
import { BatchBuilder } from './batch/batch.builder.js'
import type { BatchUpdateResponse } from './batch/batch.protocol.js'
import { InvalidArgumentError, toErrorShape } from './errors.js'
import { readArray, readNumber, readObject } from './json.js'
import { noopLogger, type LoggerLike } from './logger.js'
import type { Sheet } from './model/sheet.js'
import type { Spreadsheet } from './model/spreadsheet.js'
import type {
  Dimension,
  NewSheetProperties,
  SheetProperties,
  SpreadsheetProperties,
} from './model/properties.js'
import { valuesBatchUpdatePath, type SheetsApi } from './sheets.api.js'
import type { Synchronizer } from './sync/synchronizer.js'
import { buildValuesBatchBody, type ValueInputOption } from './values/values.batch.js'

export type MutationCoordinatorOptions = {
  api: SheetsApi
  synchronizer: Synchronizer
  valueInputOption?: ValueInputOption
  /** Structural mutations. */
  logger?: LoggerLike
  /** Cell flushes. Falls back to `logger`. */
  valuesLogger?: LoggerLike
}

/**
 * MutationCoordinator
 *
 * One call per high-level mutation. Each structural call is the same
 * straight line: open a batch, append, submit, then resynchronize the
 * spreadsheet from the server.
 *
 * Row/column insert and delete adjust the sheet's projected grid before the
 * remote call. Nothing is rolled back when the call fails: the sheet then
 * reports `hasDrift()` until `resynchronize()` or `sheet.reconcile()`.
 *
 * Callers serialize mutations against one spreadsheet; there is no locking.
 */
export class MutationCoordinator {
  private readonly api: SheetsApi
  private readonly sync: Synchronizer
  private readonly valueInputOption: ValueInputOption
  private readonly log: LoggerLike
  private readonly valuesLog: LoggerLike

  constructor(opts: MutationCoordinatorOptions) {
    this.api = opts.api
    this.sync = opts.synchronizer
    this.valueInputOption = opts.valueInputOption ?? 'USER_ENTERED'
    this.log = opts.logger ?? noopLogger
    this.valuesLog = opts.valuesLogger ?? this.log
  }

  /**
   * Batch bound to `spreadsheet` for callers composing several operations.
   * Submitting it does not resynchronize; see `commit`.
   */
  openBatch(spreadsheet: Spreadsheet | null | undefined): BatchBuilder {
    return BatchBuilder.open(spreadsheet, this.api, { logger: this.log })
  }

  /**
   * Submit a caller-built batch and resynchronize on success.
   */
  async commit(batch: BatchBuilder, op = 'batch'): Promise<BatchUpdateResponse> {
    const spreadsheet = batch.spreadsheet
    let res: BatchUpdateResponse
    try {
      res = await batch.submit()
    } catch (err) {
      this.log.warn(
        `kind=mutation-failed op=${op} spreadsheet=${spreadsheet.id} drift=${hasAnyDrift(spreadsheet)} err=${JSON.stringify(toErrorShape(err))}`
      )
      throw err
    }
    await this.sync.resynchronize(spreadsheet)
    this.log.info(`kind=mutation-ok op=${op} spreadsheet=${spreadsheet.id} count=${batch.size}`)
    return res
  }

  async resynchronize(spreadsheet: Spreadsheet | null | undefined): Promise<void> {
    await this.sync.resynchronize(spreadsheet)
  }

  // -----------------------------
  // Spreadsheet properties
  // -----------------------------

  async updateSpreadsheetProperties(spreadsheet: Spreadsheet, proposed: SpreadsheetProperties): Promise<void> {
    const batch = this.openBatch(spreadsheet).updateSpreadsheetProperties(proposed)
    await this.commit(batch, 'updateSpreadsheetProperties')
  }

  async renameSpreadsheet(spreadsheet: Spreadsheet, title: string): Promise<void> {
    await this.updateSpreadsheetProperties(spreadsheet, { ...spreadsheet.properties, title })
  }

  // -----------------------------
  // Sheet properties
  // -----------------------------

  async updateSheetProperties(sheet: Sheet, proposed: SheetProperties): Promise<void> {
    const batch = this.openBatch(sheet.spreadsheet).updateSheetProperties(sheet, proposed)
    await this.commit(batch, 'updateSheetProperties')
  }

  async renameSheet(sheet: Sheet, title: string): Promise<void> {
    if (!title) {
      throw new InvalidArgumentError('sheet title must not be empty')
    }
    await this.updateSheetProperties(sheet, { ...sheet.properties, title })
  }

  async resizeSheet(sheet: Sheet, rowCount: number, columnCount: number): Promise<void> {
    requireCount('rowCount', rowCount)
    requireCount('columnCount', columnCount)
    await this.updateSheetProperties(sheet, withGrid(sheet.properties, rowCount, columnCount))
  }

  async setSheetHidden(sheet: Sheet, hidden: boolean): Promise<void> {
    await this.updateSheetProperties(sheet, { ...sheet.properties, hidden })
  }

  async moveSheet(sheet: Sheet, index: number): Promise<void> {
    requireCount('index', index)
    await this.updateSheetProperties(sheet, { ...sheet.properties, index })
  }

  /**
   * Grow the grid to exactly `rowCount` x `columnCount`. Shrinking is
   * rejected; use `deleteRows`/`deleteColumns`.
   */
  async expandSheet(sheet: Sheet, rowCount: number, columnCount: number): Promise<void> {
    const grid = sheet.properties.gridProperties
    requireCount('rowCount', rowCount)
    requireCount('columnCount', columnCount)
    if (rowCount < grid.rowCount || columnCount < grid.columnCount) {
      throw new InvalidArgumentError(
        `expand to ${rowCount}x${columnCount} would shrink sheet=${sheet.id} (${grid.rowCount}x${grid.columnCount})`
      )
    }
    const batch = this.openBatch(sheet.spreadsheet).updateSheetProperties(
      sheet,
      withGrid(sheet.properties, rowCount, columnCount)
    )
    await this.commit(batch, 'expandSheet')
  }

  // -----------------------------
  // Sheets
  // -----------------------------

  /**
   * Returns the new sheet as mirrored after resynchronization, looked up by
   * the id the server replied with (or by title when the reply has none).
   */
  async addSheet(spreadsheet: Spreadsheet, properties: NewSheetProperties): Promise<Sheet | undefined> {
    const batch = this.openBatch(spreadsheet).addSheet(properties)
    const res = await this.commit(batch, 'addSheet')

    const reply = readObject(readObject(readArray(res.replies)[0])?.addSheet)
    const props = readObject(reply?.properties)
    if (props && 'sheetId' in props) {
      return spreadsheet.sheetById(readNumber(props.sheetId))
    }
    return spreadsheet.sheetByTitle(properties.title)
  }

  async deleteSheet(spreadsheet: Spreadsheet, sheetId: number): Promise<void> {
    const batch = this.openBatch(spreadsheet).deleteSheet(sheetId)
    await this.commit(batch, 'deleteSheet')
  }

  // -----------------------------
  // Rows / columns (0-based, half-open)
  // -----------------------------

  async insertRows(sheet: Sheet, start: number, end: number, inheritFromBefore = false): Promise<void> {
    await this.insertDimension(sheet, 'ROWS', start, end, inheritFromBefore)
  }

  async insertColumns(sheet: Sheet, start: number, end: number, inheritFromBefore = false): Promise<void> {
    await this.insertDimension(sheet, 'COLUMNS', start, end, inheritFromBefore)
  }

  async deleteRows(sheet: Sheet, start: number, end: number): Promise<void> {
    await this.deleteDimension(sheet, 'ROWS', start, end)
  }

  async deleteColumns(sheet: Sheet, start: number, end: number): Promise<void> {
    await this.deleteDimension(sheet, 'COLUMNS', start, end)
  }

  async appendCells(sheet: Sheet, rows: readonly (readonly string[])[]): Promise<void> {
    const batch = this.openBatch(sheet.spreadsheet).appendCells(sheet, rows)
    await this.commit(batch, 'appendCells')
  }

  // -----------------------------
  // Cell flush
  // -----------------------------

  /**
   * Flush pending cell writes. When a write lies outside the known grid the
   * sheet is expanded first, in its own batch. The values call never shares
   * a request with structural operations. Only the values captured when the
   * request was built are acknowledged.
   */
  async syncSheet(sheet: Sheet): Promise<void> {
    const grid = sheet.properties.gridProperties
    if (sheet.newMaxRow > grid.rowCount || sheet.newMaxColumn > grid.columnCount) {
      this.valuesLog.debug(
        `kind=values-expand sheet=${sheet.id} from=${grid.rowCount}x${grid.columnCount} to=${sheet.newMaxRow}x${sheet.newMaxColumn}`
      )
      await this.expandSheet(sheet, sheet.newMaxRow, sheet.newMaxColumn)
    }

    const writes = sheet.capturePending()
    if (writes.length === 0) {
      this.valuesLog.debug(`kind=values-flush-skipped sheet=${sheet.id} reason=no-pending-cells`)
      return
    }

    const body = buildValuesBatchBody(sheet, writes, this.valueInputOption)
    this.valuesLog.info(
      `kind=values-flush spreadsheet=${sheet.spreadsheet.id} sheet=${sheet.id} count=${writes.length}`
    )
    try {
      await this.api.post(valuesBatchUpdatePath(sheet.spreadsheet.id), body)
    } catch (err) {
      this.valuesLog.warn(
        `kind=values-flush-failed sheet=${sheet.id} pending=${writes.length} err=${JSON.stringify(toErrorShape(err))}`
      )
      throw err
    }
    // writes made while the request was in flight stay pending
    sheet.acknowledge(writes)
  }

  private async insertDimension(
    sheet: Sheet,
    dimension: Dimension,
    start: number,
    end: number,
    inheritFromBefore: boolean
  ): Promise<void> {
    const batch = this.openBatch(sheet.spreadsheet).insertDimension(sheet, dimension, start, end, inheritFromBefore)
    sheet.shiftDimension(dimension, end - start)
    await this.commit(batch, dimension === 'ROWS' ? 'insertRows' : 'insertColumns')
  }

  private async deleteDimension(sheet: Sheet, dimension: Dimension, start: number, end: number): Promise<void> {
    const batch = this.openBatch(sheet.spreadsheet).deleteDimension(sheet, dimension, start, end)
    sheet.shiftDimension(dimension, start - end)
    await this.commit(batch, dimension === 'ROWS' ? 'deleteRows' : 'deleteColumns')
  }
}

function withGrid(props: SheetProperties, rowCount: number, columnCount: number): SheetProperties {
  return { ...props, gridProperties: { ...props.gridProperties, rowCount, columnCount } }
}

function requireCount(name: string, v: number): void {
  if (!Number.isInteger(v) || v < 0) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer, got ${v}`)
  }
}

function hasAnyDrift(spreadsheet: Spreadsheet): boolean {
  return spreadsheet.sheets.some((s) => s.hasDrift())
}
