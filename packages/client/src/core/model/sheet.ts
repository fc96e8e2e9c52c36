// packages/client/src/core/model/sheet.ts
import jsonpatch from 'fast-json-patch'

import { InvalidArgumentError } from '../errors.js'
import { clone } from '../json.js'
import { Cell, cellKey } from './cell.js'
import type { Spreadsheet } from './spreadsheet.js'
import type { Dimension, SheetProperties, SheetSnapshot } from './properties.js'

/** A pending cell and the value it held when a flush captured it. */
export type PendingWrite = {
  readonly cell: Cell
  readonly value: string
}

/**
 * Sheet
 *
 * Mirrors one remote sheet and carries two views of its properties:
 * - confirmed: what the last synchronization returned
 * - projected (`properties`): confirmed plus optimistic local bookkeeping
 *
 * Diffs are computed against the projected view. A failed mutation can leave
 * projected != confirmed; `hasDrift()` reports that and `reconcile()` drops
 * the projection.
 *
 * Cell writes are buffered in the pending list until the coordinator flushes
 * them. `newMaxRow`/`newMaxColumn` track the largest position the sheet must
 * hold once those writes land; they never drop below the projected grid.
 */
export class Sheet {
  readonly spreadsheet: Spreadsheet
  properties: SheetProperties

  private confirmedProps: SheetProperties
  private maxRow = 0
  private maxColumn = 0
  private readonly cells = new Map<string, Cell>()
  private pending: Cell[] = []

  constructor(spreadsheet: Spreadsheet, snapshot: SheetSnapshot) {
    this.spreadsheet = spreadsheet
    this.confirmedProps = clone(snapshot.properties)
    this.properties = clone(snapshot.properties)
    this.loadCells(snapshot)
  }

  get id(): number {
    return this.properties.sheetId
  }

  get title(): string {
    return this.properties.title
  }

  get newMaxRow(): number {
    return this.maxRow
  }

  get newMaxColumn(): number {
    return this.maxColumn
  }

  get modifiedCells(): readonly Cell[] {
    return this.pending
  }

  /** Copy of the last server-confirmed properties. */
  get confirmed(): SheetProperties {
    return clone(this.confirmedProps)
  }

  cell(row: number, column: number): Cell | undefined {
    return this.cells.get(cellKey(row, column))
  }

  /**
   * Dense row-major copy of the known values, from A1 to the furthest
   * populated cell. Gaps are empty strings.
   */
  values(): string[][] {
    let rows = 0
    let columns = 0
    for (const c of this.cells.values()) {
      if (c.row > rows) rows = c.row
      if (c.column > columns) columns = c.column
    }

    const out: string[][] = []
    for (let r = 1; r <= rows; r++) {
      const line: string[] = []
      for (let col = 1; col <= columns; col++) {
        line.push(this.cells.get(cellKey(r, col))?.value ?? '')
      }
      out.push(line)
    }
    return out
  }

  /**
   * Set a cell value locally and queue it for the next flush.
   */
  update(row: number, column: number, value: string): Cell {
    if (!Number.isInteger(row) || row <= 0 || !Number.isInteger(column) || column <= 0) {
      throw new InvalidArgumentError(`cell position must be 1-indexed integers row=${row} column=${column}`)
    }

    const key = cellKey(row, column)
    let c = this.cells.get(key)
    if (!c) {
      c = new Cell(row, column, value)
      this.cells.set(key, c)
    } else {
      c.value = value
    }

    if (!this.pending.includes(c)) this.pending.push(c)
    if (row > this.maxRow) this.maxRow = row
    if (column > this.maxColumn) this.maxColumn = column
    return c
  }

  hasDrift(): boolean {
    return jsonpatch.compare(this.confirmedProps, this.properties).length > 0
  }

  /**
   * Replace the projected properties with the confirmed ones.
   * Pending cell writes stay queued.
   */
  reconcile(): void {
    this.properties = clone(this.confirmedProps)
    this.recomputeHighWater()
  }

  /**
   * Optimistic grid bookkeeping for inserted (delta > 0) or deleted
   * (delta < 0) rows/columns. Applied to the projection only.
   */
  shiftDimension(dimension: Dimension, delta: number): void {
    const grid = this.properties.gridProperties
    if (dimension === 'ROWS') {
      if (grid.rowCount + delta < 0) {
        throw new InvalidArgumentError(`cannot remove ${-delta} rows from a sheet with ${grid.rowCount}`)
      }
      grid.rowCount += delta
      this.maxRow += delta
    } else {
      if (grid.columnCount + delta < 0) {
        throw new InvalidArgumentError(`cannot remove ${-delta} columns from a sheet with ${grid.columnCount}`)
      }
      grid.columnCount += delta
      this.maxColumn += delta
    }
  }

  /**
   * Freeze the pending writes for a flush. Later `update` calls do not
   * change what was captured.
   */
  capturePending(): PendingWrite[] {
    return this.pending.map((cell) => ({ cell, value: cell.value }))
  }

  /**
   * Drop the writes a flush delivered. A cell rewritten since it was
   * captured stays pending with its newer value; high-water marks are
   * recomputed from what remains.
   */
  acknowledge(sent: readonly PendingWrite[]): void {
    const delivered = new Map(sent.map((w) => [w.cell, w.value] as const))
    this.pending = this.pending.filter((c) => delivered.get(c) !== c.value)
    this.recomputeHighWater()
  }

  /**
   * Drop every pending write and pull the high-water marks back to the known grid.
   */
  clearPending(): void {
    this.pending = []
    this.maxRow = this.properties.gridProperties.rowCount
    this.maxColumn = this.properties.gridProperties.columnCount
  }

  /**
   * Overwrite everything the server owns with a fresh snapshot.
   */
  applySnapshot(snapshot: SheetSnapshot): void {
    if (snapshot.properties.sheetId !== this.confirmedProps.sheetId) {
      throw new InvalidArgumentError(
        `snapshot sheetId=${snapshot.properties.sheetId} does not match sheetId=${this.confirmedProps.sheetId}`
      )
    }
    this.confirmedProps = clone(snapshot.properties)
    this.properties = clone(snapshot.properties)
    this.loadCells(snapshot)
  }

  private loadCells(snapshot: SheetSnapshot): void {
    this.cells.clear()
    for (const c of snapshot.cells) {
      this.cells.set(cellKey(c.row, c.column), new Cell(c.row, c.column, c.value))
    }
    // unflushed local writes win over what the server still has
    for (const c of this.pending) {
      this.cells.set(cellKey(c.row, c.column), c)
    }
    this.recomputeHighWater()
  }

  private recomputeHighWater(): void {
    let row = this.properties.gridProperties.rowCount
    let column = this.properties.gridProperties.columnCount
    for (const c of this.pending) {
      if (c.row > row) row = c.row
      if (c.column > column) column = c.column
    }
    this.maxRow = row
    this.maxColumn = column
  }
}
