// packages/client/src/core/batch/batch.protocol.ts
import type {
  Color,
  Dimension,
  GridProperties,
  NewSheetProperties,
  SpreadsheetProperties,
} from '../model/properties.js'

/**
 * Wire payloads for the structural batch endpoint, keyed by request name.
 *
 * Each key is both the operation's `kind` and the property name it is
 * serialized under inside `requests[]`. Adding a request type means adding
 * an entry here and a case in `serializeOperation`.
 */
export interface OperationPayloads {
  updateSpreadsheetProperties: {
    properties: Partial<SpreadsheetProperties>
    fields: string
  }
  updateSheetProperties: {
    properties: SheetPropertiesPatch
    fields: string
  }
  addSheet: {
    properties: NewSheetProperties
  }
  deleteSheet: {
    sheetId: number
  }
  insertDimension: {
    range: DimensionRange
    inheritFromBefore: boolean
  }
  deleteDimension: {
    range: DimensionRange
  }
  appendCells: {
    sheetId: number
    rows: RowData[]
    fields: string
  }
}

export type OperationKind = keyof OperationPayloads

export type BatchOperation = {
  [K in OperationKind]: { kind: K; payload: OperationPayloads[K] }
}[OperationKind]

/** Sparse sheet properties: sheetId plus only the fields named in the mask. */
export type SheetPropertiesPatch = {
  sheetId: number
  title?: string
  index?: number
  gridProperties?: Partial<GridProperties>
  hidden?: boolean
  tabColor?: Color
  rightToLeft?: boolean
}

/** Zero-based, half-open [startIndex, endIndex). */
export type DimensionRange = {
  sheetId: number
  dimension: Dimension
  startIndex: number
  endIndex: number
}

export type ExtendedValue =
  | { stringValue: string }
  | { numberValue: number }
  | { boolValue: boolean }
  | { formulaValue: string }

export type CellData = { userEnteredValue: ExtendedValue }

export type RowData = { values: CellData[] }

export type WireRequest = { [K in OperationKind]?: OperationPayloads[K] }

export type BatchUpdateBody = {
  requests: WireRequest[]
}

export type BatchUpdateResponse = {
  spreadsheetId: string
  replies: unknown[]
}

export function serializeOperation(op: BatchOperation): WireRequest {
  switch (op.kind) {
    case 'updateSpreadsheetProperties':
      return { updateSpreadsheetProperties: op.payload }
    case 'updateSheetProperties':
      return { updateSheetProperties: op.payload }
    case 'addSheet':
      return { addSheet: op.payload }
    case 'deleteSheet':
      return { deleteSheet: op.payload }
    case 'insertDimension':
      return { insertDimension: op.payload }
    case 'deleteDimension':
      return { deleteDimension: op.payload }
    case 'appendCells':
      return { appendCells: op.payload }
    default:
      return assertNever(op)
  }
}

function assertNever(v: never): never {
  throw new Error(`unhandled batch operation: ${JSON.stringify(v)}`)
}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i

/**
 * Map a user-entered string onto the typed value the structural API takes,
 * mirroring how the values endpoint interprets USER_ENTERED input.
 */
export function toExtendedValue(value: string): ExtendedValue {
  if (value.startsWith('=')) return { formulaValue: value }

  const upper = value.toUpperCase()
  if (upper === 'TRUE' || upper === 'FALSE') return { boolValue: upper === 'TRUE' }

  // plain decimals only; 0x, 0b, 0o and Infinity stay text
  const trimmed = value.trim()
  if (DECIMAL.test(trimmed)) return { numberValue: Number(trimmed) }

  return { stringValue: value }
}
