// packages/client/src/core/batch/batch.diff.ts
import jsonpatch from 'fast-json-patch'

import type { GridProperties, SheetProperties, SpreadsheetProperties } from '../model/properties.js'
import type { SheetPropertiesPatch } from './batch.protocol.js'

/**
 * One updatable field: its dotted mask and how to copy its proposed value
 * into the outgoing sparse payload.
 */
export type FieldSpec<S, P> = readonly [mask: string, copy: (from: S, into: P) => void]

export type FieldDiff<P> = {
  properties: P
  fields: string[]
}

function gridOf(patch: SheetPropertiesPatch): Partial<GridProperties> {
  if (!patch.gridProperties) patch.gridProperties = {}
  return patch.gridProperties
}

export const SPREADSHEET_FIELDS: readonly FieldSpec<SpreadsheetProperties, Partial<SpreadsheetProperties>>[] = [
  ['title', (p, o) => { o.title = p.title }],
  ['locale', (p, o) => { o.locale = p.locale }],
  ['autoRecalc', (p, o) => { o.autoRecalc = p.autoRecalc }],
  ['timeZone', (p, o) => { o.timeZone = p.timeZone }],
]

// sheetId addresses the sheet and is never a mask
export const SHEET_FIELDS: readonly FieldSpec<SheetProperties, SheetPropertiesPatch>[] = [
  ['title', (p, o) => { o.title = p.title }],
  ['index', (p, o) => { o.index = p.index }],
  ['gridProperties.rowCount', (p, o) => { gridOf(o).rowCount = p.gridProperties.rowCount }],
  ['gridProperties.columnCount', (p, o) => { gridOf(o).columnCount = p.gridProperties.columnCount }],
  ['gridProperties.frozenRowCount', (p, o) => { gridOf(o).frozenRowCount = p.gridProperties.frozenRowCount }],
  ['gridProperties.frozenColumnCount', (p, o) => { gridOf(o).frozenColumnCount = p.gridProperties.frozenColumnCount }],
  ['gridProperties.hideGridlines', (p, o) => { gridOf(o).hideGridlines = p.gridProperties.hideGridlines }],
  ['hidden', (p, o) => { o.hidden = p.hidden }],
  // a masked field with no value clears it remotely
  ['tabColor', (p, o) => { if (p.tabColor) o.tabColor = { ...p.tabColor } }],
  ['rightToLeft', (p, o) => { o.rightToLeft = p.rightToLeft }],
]

function pointerToSegments(pointer: string): string[] {
  return pointer
    .split('/')
    .slice(1)
    .map((seg) => seg.replace(/~1/g, '/').replace(/~0/g, '~'))
}

/**
 * Dotted masks of every declared field whose value differs, in declaration
 * order. A nested change (`/tabColor/red`) is reported under the declared
 * mask that covers it (`tabColor`). Equal values are never reported, even
 * when the caller explicitly set them.
 */
export function changedFields(current: object, proposed: object, masks: readonly string[]): string[] {
  const touched = new Set<string>()
  for (const op of jsonpatch.compare(current, proposed)) {
    const segs = pointerToSegments(op.path)
    const mask = masks.find((m) => {
      const parts = m.split('.')
      return parts.length <= segs.length && parts.every((p, i) => p === segs[i])
    })
    if (mask) touched.add(mask)
  }
  return masks.filter((m) => touched.has(m))
}

/**
 * Generic field-mask diff. Returns null when nothing declared in `table`
 * changed, so callers can skip the request entirely.
 */
export function diffProperties<S extends object, P>(
  current: S,
  proposed: S,
  table: readonly FieldSpec<S, P>[],
  seed: P
): FieldDiff<P> | null {
  const fields = changedFields(current, proposed, table.map(([mask]) => mask))
  if (fields.length === 0) return null

  for (const [mask, copy] of table) {
    if (fields.includes(mask)) copy(proposed, seed)
  }
  return { properties: seed, fields }
}

export function diffSpreadsheetProperties(
  current: SpreadsheetProperties,
  proposed: SpreadsheetProperties
): FieldDiff<Partial<SpreadsheetProperties>> | null {
  return diffProperties(current, proposed, SPREADSHEET_FIELDS, {})
}

/**
 * The sheetId in the payload always comes from `current`.
 */
export function diffSheetProperties(
  current: SheetProperties,
  proposed: SheetProperties
): FieldDiff<SheetPropertiesPatch> | null {
  return diffProperties(current, proposed, SHEET_FIELDS, { sheetId: current.sheetId })
}
