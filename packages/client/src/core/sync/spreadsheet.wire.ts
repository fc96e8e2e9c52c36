// packages/client/src/core/sync/spreadsheet.wire.ts
import { DecodeError } from '../errors.js'
import {
  readArray,
  readBool,
  readNumber,
  readObject,
  readString,
  type JsonObject,
} from '../json.js'
import type {
  AutoRecalc,
  CellSnapshot,
  Color,
  SheetProperties,
  SheetSnapshot,
  SpreadsheetProperties,
  SpreadsheetSnapshot,
} from '../model/properties.js'

/*
 * Decoders for the spreadsheet resource returned by the fetch endpoint.
 *
 * The remote side serializes protobuf-style: zero values (sheetId 0,
 * index 0, false, empty strings) are omitted, so every reader falls back to
 * the zero value instead of failing.
 */

const AUTO_RECALC: readonly AutoRecalc[] = ['RECALCULATION_INTERVAL_UNSPECIFIED', 'ON_CHANGE', 'MINUTE', 'HOUR']

function readAutoRecalc(v: unknown): AutoRecalc {
  return AUTO_RECALC.find((x) => x === v) ?? 'RECALCULATION_INTERVAL_UNSPECIFIED'
}

export function parseSpreadsheetProperties(v: unknown): SpreadsheetProperties {
  const o = readObject(v) ?? {}
  return {
    title: readString(o.title),
    locale: readString(o.locale),
    autoRecalc: readAutoRecalc(o.autoRecalc),
    timeZone: readString(o.timeZone),
  }
}

function parseColor(v: unknown): Color | undefined {
  const o = readObject(v)
  if (!o) return undefined
  const c: Color = {}
  if (typeof o.red === 'number') c.red = o.red
  if (typeof o.green === 'number') c.green = o.green
  if (typeof o.blue === 'number') c.blue = o.blue
  if (typeof o.alpha === 'number') c.alpha = o.alpha
  return c
}

export function parseSheetProperties(v: unknown): SheetProperties {
  const o = readObject(v) ?? {}
  const g = readObject(o.gridProperties) ?? {}
  const props: SheetProperties = {
    sheetId: readNumber(o.sheetId),
    title: readString(o.title),
    index: readNumber(o.index),
    gridProperties: {
      rowCount: readNumber(g.rowCount),
      columnCount: readNumber(g.columnCount),
      frozenRowCount: readNumber(g.frozenRowCount),
      frozenColumnCount: readNumber(g.frozenColumnCount),
      hideGridlines: readBool(g.hideGridlines),
    },
    hidden: readBool(o.hidden),
    rightToLeft: readBool(o.rightToLeft),
  }
  const tabColor = parseColor(o.tabColor)
  if (tabColor) props.tabColor = tabColor
  return props
}

/**
 * ExtendedValue -> user-facing text. Undefined means the cell is empty.
 */
export function extendedValueToString(v: unknown): string | undefined {
  const o = readObject(v)
  if (!o) return undefined
  if (typeof o.stringValue === 'string') return o.stringValue
  if (typeof o.numberValue === 'number') return String(o.numberValue)
  if (typeof o.boolValue === 'boolean') return o.boolValue ? 'TRUE' : 'FALSE'
  if (typeof o.formulaValue === 'string') return o.formulaValue
  const err = readObject(o.errorValue)
  if (err) return readString(err.message, readString(err.type))
  return undefined
}

function parseCells(data: unknown): CellSnapshot[] {
  const cells: CellSnapshot[] = []
  for (const gridRaw of readArray(data)) {
    const grid = readObject(gridRaw)
    if (!grid) continue
    const startRow = readNumber(grid.startRow)
    const startColumn = readNumber(grid.startColumn)

    readArray(grid.rowData).forEach((rowRaw, r) => {
      const row = readObject(rowRaw)
      if (!row) return
      readArray(row.values).forEach((cellRaw, c) => {
        const cell = readObject(cellRaw)
        const value = extendedValueToString(cell?.userEnteredValue)
        if (value === undefined) return
        cells.push({ row: startRow + r + 1, column: startColumn + c + 1, value })
      })
    })
  }
  return cells
}

export function parseSheet(v: unknown): SheetSnapshot {
  const o = readObject(v) ?? {}
  return {
    properties: parseSheetProperties(o.properties),
    cells: parseCells(o.data),
  }
}

export function parseSpreadsheet(body: JsonObject): SpreadsheetSnapshot {
  const spreadsheetId = readString(body.spreadsheetId)
  if (!spreadsheetId) {
    throw new DecodeError('spreadsheet resource has no spreadsheetId', { body: JSON.stringify(body) })
  }
  return {
    spreadsheetId,
    properties: parseSpreadsheetProperties(body.properties),
    sheets: readArray(body.sheets).map(parseSheet),
  }
}
