// packages/client/src/core/model/spreadsheet.ts
import { InvalidArgumentError } from '../errors.js'
import { clone } from '../json.js'
import { Sheet } from './sheet.js'
import type { SpreadsheetProperties, SpreadsheetSnapshot } from './properties.js'

/**
 * In-memory mirror of a remote spreadsheet. Owns its sheets.
 */
export class Spreadsheet {
  readonly id: string
  properties: SpreadsheetProperties

  private sheetList: Sheet[] = []

  constructor(snapshot: SpreadsheetSnapshot) {
    this.id = snapshot.spreadsheetId
    this.properties = clone(snapshot.properties)
    this.sheetList = snapshot.sheets.map((s) => new Sheet(this, s))
  }

  get title(): string {
    return this.properties.title
  }

  get sheets(): readonly Sheet[] {
    return this.sheetList
  }

  sheetById(sheetId: number): Sheet | undefined {
    return this.sheetList.find((s) => s.id === sheetId)
  }

  sheetByIndex(index: number): Sheet | undefined {
    return this.sheetList.find((s) => s.properties.index === index)
  }

  sheetByTitle(title: string): Sheet | undefined {
    return this.sheetList.find((s) => s.title === title)
  }

  /**
   * Replace properties and the sheet collection with a fresh snapshot.
   *
   * Sheets still present remotely keep their object identity (so callers'
   * references stay usable) but all server-owned state is overwritten.
   * Sheets gone remotely are dropped; new ones are created.
   */
  applySnapshot(snapshot: SpreadsheetSnapshot): void {
    if (snapshot.spreadsheetId !== this.id) {
      throw new InvalidArgumentError(
        `snapshot spreadsheetId=${snapshot.spreadsheetId} does not match id=${this.id}`
      )
    }

    this.properties = clone(snapshot.properties)

    const previous = new Map(this.sheetList.map((s) => [s.id, s] as const))
    this.sheetList = snapshot.sheets.map((s) => {
      const existing = previous.get(s.properties.sheetId)
      if (!existing) return new Sheet(this, s)
      existing.applySnapshot(s)
      return existing
    })
  }
}
