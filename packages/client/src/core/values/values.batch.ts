// packages/client/src/core/values/values.batch.ts
import { qualifiedRange } from '../a1.js'
import type { PendingWrite, Sheet } from '../model/sheet.js'

export type ValueInputOption = 'RAW' | 'USER_ENTERED'

export type ValueRange = {
  range: string
  majorDimension: 'ROWS' | 'COLUMNS'
  values: string[][]
}

export type ValuesBatchUpdateBody = {
  valueInputOption: ValueInputOption
  data: ValueRange[]
}

/**
 * One single-cell range per pending cell, addressed by the sheet's title.
 * Cells are never merged into larger rectangles: each write stays
 * independent of its neighbours.
 */
export function buildValuesBatchBody(
  sheet: Sheet,
  writes: readonly PendingWrite[],
  valueInputOption: ValueInputOption
): ValuesBatchUpdateBody {
  return {
    valueInputOption,
    data: writes.map(({ cell, value }) => ({
      range: qualifiedRange(sheet.title, cell.pos()),
      majorDimension: 'COLUMNS',
      values: [[value]],
    })),
  }
}
