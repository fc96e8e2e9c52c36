// packages/client/src/core/batch/batch.builder.ts
import { EmptyBatchError, InvalidArgumentError } from '../errors.js'
import { readArray, readString } from '../json.js'
import { noopLogger, type LoggerLike } from '../logger.js'
import type { Sheet } from '../model/sheet.js'
import type { Spreadsheet } from '../model/spreadsheet.js'
import type {
  Dimension,
  NewSheetProperties,
  SheetProperties,
  SpreadsheetProperties,
} from '../model/properties.js'
import { batchUpdatePath, type SheetsApi } from '../sheets.api.js'
import { diffSheetProperties, diffSpreadsheetProperties } from './batch.diff.js'
import {
  serializeOperation,
  toExtendedValue,
  type BatchOperation,
  type BatchUpdateBody,
  type BatchUpdateResponse,
  type DimensionRange,
} from './batch.protocol.js'

/**
 * BatchBuilder
 *
 * Collects structural update requests for ONE spreadsheet and sends them as a
 * single atomic batchUpdate call. The remote side applies them in array order.
 *
 * Update-properties helpers diff at append time against the entity's
 * projected properties; a proposal identical to what is known appends nothing.
 * Helpers return `this` so calls can be chained.
 */
export class BatchBuilder {
  readonly spreadsheet: Spreadsheet

  private readonly api: SheetsApi
  private readonly log: LoggerLike
  private readonly ops: BatchOperation[] = []

  private constructor(spreadsheet: Spreadsheet, api: SheetsApi, logger: LoggerLike) {
    this.spreadsheet = spreadsheet
    this.api = api
    this.log = logger
  }

  static open(
    spreadsheet: Spreadsheet | null | undefined,
    api: SheetsApi,
    opts: { logger?: LoggerLike } = {}
  ): BatchBuilder {
    if (!spreadsheet) {
      throw new InvalidArgumentError('spreadsheet must not be null')
    }
    if (!spreadsheet.id) {
      throw new InvalidArgumentError('spreadsheet has no id (not fetched or created yet)')
    }
    return new BatchBuilder(spreadsheet, api, opts.logger ?? noopLogger)
  }

  get operations(): readonly BatchOperation[] {
    return this.ops
  }

  get size(): number {
    return this.ops.length
  }

  addOperation(op: BatchOperation): this {
    this.ops.push(op)
    return this
  }

  // -----------------------------
  // Typed helpers
  // -----------------------------

  updateSpreadsheetProperties(proposed: SpreadsheetProperties): this {
    const diff = diffSpreadsheetProperties(this.spreadsheet.properties, proposed)
    if (!diff) {
      this.log.debug(`kind=batch-op-skipped op=updateSpreadsheetProperties reason=no-changes`)
      return this
    }
    return this.addOperation({
      kind: 'updateSpreadsheetProperties',
      payload: { properties: diff.properties, fields: diff.fields.join(',') },
    })
  }

  updateSheetProperties(sheet: Sheet, proposed: SheetProperties): this {
    this.requireOwnSheet(sheet)
    const diff = diffSheetProperties(sheet.properties, proposed)
    if (!diff) {
      this.log.debug(`kind=batch-op-skipped op=updateSheetProperties sheetId=${sheet.id} reason=no-changes`)
      return this
    }
    return this.addOperation({
      kind: 'updateSheetProperties',
      payload: { properties: diff.properties, fields: diff.fields.join(',') },
    })
  }

  addSheet(properties: NewSheetProperties): this {
    if (!properties.title) {
      throw new InvalidArgumentError('new sheet needs a title')
    }
    return this.addOperation({ kind: 'addSheet', payload: { properties: structuredClone(properties) } })
  }

  deleteSheet(sheetId: number): this {
    if (!Number.isInteger(sheetId) || sheetId < 0) {
      throw new InvalidArgumentError(`invalid sheetId=${sheetId}`)
    }
    return this.addOperation({ kind: 'deleteSheet', payload: { sheetId } })
  }

  insertDimension(sheet: Sheet, dimension: Dimension, start: number, end: number, inheritFromBefore = false): this {
    this.requireOwnSheet(sheet)
    const range = dimensionRange(sheet, dimension, start, end)
    const count = gridCount(sheet, dimension)
    if (start > count) {
      throw new InvalidArgumentError(
        `insert at ${start} is past the end of sheet=${sheet.id} (${count} ${dimension.toLowerCase()})`
      )
    }
    if (inheritFromBefore && start === 0) {
      throw new InvalidArgumentError('inheritFromBefore needs a row/column before startIndex=0')
    }
    return this.addOperation({ kind: 'insertDimension', payload: { range, inheritFromBefore } })
  }

  deleteDimension(sheet: Sheet, dimension: Dimension, start: number, end: number): this {
    this.requireOwnSheet(sheet)
    const range = dimensionRange(sheet, dimension, start, end)
    const count = gridCount(sheet, dimension)
    if (end > count) {
      throw new InvalidArgumentError(
        `delete ${start}:${end} runs past the end of sheet=${sheet.id} (${count} ${dimension.toLowerCase()})`
      )
    }
    return this.addOperation({ kind: 'deleteDimension', payload: { range } })
  }

  /**
   * Append rows after the last row holding data. Values use user-entered
   * semantics: "=..." is a formula, numeric text a number, TRUE/FALSE a bool.
   */
  appendCells(sheet: Sheet, rows: readonly (readonly string[])[]): this {
    this.requireOwnSheet(sheet)
    if (rows.length === 0) {
      throw new InvalidArgumentError('appendCells needs at least one row')
    }
    return this.addOperation({
      kind: 'appendCells',
      payload: {
        sheetId: sheet.id,
        rows: rows.map((r) => ({ values: r.map((v) => ({ userEnteredValue: toExtendedValue(v) })) })),
        fields: 'userEnteredValue',
      },
    })
  }

  // -----------------------------
  // Submit
  // -----------------------------

  toRequestBody(): BatchUpdateBody {
    return { requests: this.ops.map(serializeOperation) }
  }

  /**
   * Send the batch. Empty batches are rejected before any network call.
   * Remote errors propagate as-is; the accumulated operations are kept so a
   * caller can inspect or rebuild them.
   */
  async submit(): Promise<BatchUpdateResponse> {
    if (this.ops.length === 0) {
      throw new EmptyBatchError(`batch for spreadsheet=${this.spreadsheet.id} has no operations`)
    }

    const kinds = this.ops.map((o) => o.kind).join(',')
    this.log.info(`kind=batch-submit spreadsheet=${this.spreadsheet.id} count=${this.ops.length} ops=${kinds}`)

    const res = await this.api.post(batchUpdatePath(this.spreadsheet.id), this.toRequestBody())

    this.log.debug(`kind=batch-submit-ok spreadsheet=${this.spreadsheet.id} count=${this.ops.length}`)
    return {
      spreadsheetId: readString(res.spreadsheetId, this.spreadsheet.id),
      replies: readArray(res.replies),
    }
  }

  private requireOwnSheet(sheet: Sheet): void {
    if (sheet.spreadsheet !== this.spreadsheet) {
      throw new InvalidArgumentError(
        `sheet=${sheet.id} belongs to spreadsheet=${sheet.spreadsheet.id}, batch is for ${this.spreadsheet.id}`
      )
    }
  }
}

function dimensionRange(sheet: Sheet, dimension: Dimension, start: number, end: number): DimensionRange {
  if (!Number.isInteger(start) || !Number.isInteger(end)) {
    throw new InvalidArgumentError(`range bounds must be integers start=${start} end=${end}`)
  }
  if (start < 0 || end <= start) {
    throw new InvalidArgumentError(`invalid half-open range start=${start} end=${end}`)
  }
  return { sheetId: sheet.id, dimension, startIndex: start, endIndex: end }
}

// Bounds come from the projected grid, so earlier optimistic shifts count.
function gridCount(sheet: Sheet, dimension: Dimension): number {
  const grid = sheet.properties.gridProperties
  return dimension === 'ROWS' ? grid.rowCount : grid.columnCount
}
