// packages/client/src/core/model/cell.ts
import { cellPosition } from '../a1.js'

/**
 * A single cell, addressed by 1-indexed row and column.
 * Values are kept as the text a user would have typed.
 */
export class Cell {
  readonly row: number
  readonly column: number
  value: string

  constructor(row: number, column: number, value: string) {
    this.row = row
    this.column = column
    this.value = value
  }

  /** A1 notation, e.g. "C7". */
  pos(): string {
    return cellPosition(this.row, this.column)
  }
}

export function cellKey(row: number, column: number): string {
  return `${row}:${column}`
}
