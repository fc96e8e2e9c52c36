// packages/client/src/core/model/properties.ts

export type AutoRecalc = 'RECALCULATION_INTERVAL_UNSPECIFIED' | 'ON_CHANGE' | 'MINUTE' | 'HOUR'

export type Dimension = 'ROWS' | 'COLUMNS'

export interface SpreadsheetProperties {
  title: string
  locale: string
  autoRecalc: AutoRecalc
  timeZone: string
}

export interface GridProperties {
  rowCount: number
  columnCount: number
  frozenRowCount: number
  frozenColumnCount: number
  hideGridlines: boolean
}

/** RGBA, each channel in [0, 1]. Omitted channels are 0 on the wire. */
export interface Color {
  red?: number
  green?: number
  blue?: number
  alpha?: number
}

export interface SheetProperties {
  sheetId: number
  title: string
  index: number
  gridProperties: GridProperties
  hidden: boolean
  tabColor?: Color
  rightToLeft: boolean
}

/**
 * Properties for a sheet that does not exist yet. The server assigns
 * sheetId and the grid size when they are left out.
 */
export interface NewSheetProperties {
  title: string
  sheetId?: number
  index?: number
  gridProperties?: Partial<GridProperties>
  hidden?: boolean
  tabColor?: Color
  rightToLeft?: boolean
}

export type CellSnapshot = { row: number; column: number; value: string }

export type SheetSnapshot = {
  properties: SheetProperties
  cells: CellSnapshot[]
}

export type SpreadsheetSnapshot = {
  spreadsheetId: string
  properties: SpreadsheetProperties
  sheets: SheetSnapshot[]
}

export function defaultGridProperties(): GridProperties {
  return {
    rowCount: 0,
    columnCount: 0,
    frozenRowCount: 0,
    frozenColumnCount: 0,
    hideGridlines: false,
  }
}
