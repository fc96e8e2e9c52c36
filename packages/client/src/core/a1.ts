// packages/client/src/core/a1.ts
import { InvalidArgumentError } from './errors.js'

// -----------------------------
// A1 helpers
// -----------------------------

export function letterToColumnNumber(letter: string): number {
  if (!/^[A-Z]+$/i.test(letter)) {
    throw new InvalidArgumentError(`Invalid column letter: ${letter}`)
  }
  let column = 0
  const letters = letter.toUpperCase()
  for (let i = 0; i < letters.length; i++) {
    column = column * 26 + (letters.charCodeAt(i) - 64)
  }
  return column
}

export function columnNumberToLetter(column: number): string {
  if (!Number.isInteger(column) || column <= 0) {
    throw new InvalidArgumentError(`Invalid column number: ${column}`)
  }
  let temp = column
  let out = ''
  while (temp > 0) {
    const rem = (temp - 1) % 26
    out = String.fromCharCode(65 + rem) + out
    temp = Math.floor((temp - 1) / 26)
  }
  return out
}

/** 1-indexed row/column -> "B3" */
export function cellPosition(row: number, column: number): string {
  if (!Number.isInteger(row) || row <= 0) {
    throw new InvalidArgumentError(`Invalid row number: ${row}`)
  }
  return `${columnNumberToLetter(column)}${row}`
}

/**
 * Sheet-qualified address. Titles with anything beyond [A-Za-z0-9_] are
 * quoted, with embedded single quotes doubled.
 */
export function qualifiedRange(sheetTitle: string, a1: string): string {
  if (/^[A-Za-z0-9_]+$/.test(sheetTitle)) return `${sheetTitle}!${a1}`
  return `'${sheetTitle.replace(/'/g, "''")}'!${a1}`
}
