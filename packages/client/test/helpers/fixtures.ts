// packages/client/test/helpers/fixtures.ts
import type { JsonObject } from '../../src/core/json.js'
import type { SheetProperties, SpreadsheetSnapshot } from '../../src/core/model/properties.js'

export const SPREADSHEET_ID = 'sheet-123'

export function sheetProperties(overrides: Partial<SheetProperties> = {}): SheetProperties {
  return {
    sheetId: 7,
    title: 'Sheet1',
    index: 0,
    gridProperties: {
      rowCount: 100,
      columnCount: 26,
      frozenRowCount: 0,
      frozenColumnCount: 0,
      hideGridlines: false,
    },
    hidden: false,
    rightToLeft: false,
    ...overrides,
  }
}

export function spreadsheetSnapshot(sheets: SheetProperties[] = [sheetProperties()]): SpreadsheetSnapshot {
  return {
    spreadsheetId: SPREADSHEET_ID,
    properties: { title: 'Budget', locale: 'en_US', autoRecalc: 'ON_CHANGE', timeZone: 'Etc/GMT' },
    sheets: sheets.map((properties) => ({ properties, cells: [] })),
  }
}

export type SheetFixture = {
  sheetId: number
  title: string
  index?: number
  rowCount?: number
  columnCount?: number
  rows?: string[][]
}

/**
 * Spreadsheet resource as the fetch endpoint returns it. Zero-valued
 * sheetId/index are left out, the way the server serializes them.
 */
export function spreadsheetResource(sheets: SheetFixture[], title = 'Budget'): JsonObject {
  return {
    spreadsheetId: SPREADSHEET_ID,
    properties: { title, locale: 'en_US', autoRecalc: 'ON_CHANGE', timeZone: 'Etc/GMT' },
    sheets: sheets.map((s) => {
      const properties: JsonObject = {
        title: s.title,
        sheetType: 'GRID',
        gridProperties: { rowCount: s.rowCount ?? 100, columnCount: s.columnCount ?? 26 },
      }
      if (s.sheetId !== 0) properties.sheetId = s.sheetId
      if (s.index) properties.index = s.index

      const sheet: JsonObject = { properties }
      if (s.rows) {
        sheet.data = [
          {
            rowData: s.rows.map((r) => ({
              values: r.map((v) => ({ userEnteredValue: { stringValue: v } })),
            })),
          },
        ]
      }
      return sheet
    }),
  }
}

export const BATCH_OK = { spreadsheetId: SPREADSHEET_ID, replies: [{}] }
