import { beforeEach, describe, it, expect } from 'vitest'

import { BatchBuilder } from '../src/core/batch/batch.builder.js'
import { toExtendedValue } from '../src/core/batch/batch.protocol.js'
import { EmptyBatchError, InvalidArgumentError, RemoteApiError } from '../src/core/errors.js'
import { Spreadsheet } from '../src/core/model/spreadsheet.js'
import { SheetsApi } from '../src/core/sheets.api.js'
import { FakeExecutor } from './helpers/fake-executor.js'
import { BATCH_OK, sheetProperties, spreadsheetSnapshot, SPREADSHEET_ID } from './helpers/fixtures.js'

describe('BatchBuilder', () => {
  let executor: FakeExecutor
  let api: SheetsApi
  let spreadsheet: Spreadsheet

  beforeEach(() => {
    executor = new FakeExecutor()
    api = new SheetsApi({ executor })
    spreadsheet = new Spreadsheet(
      spreadsheetSnapshot([sheetProperties(), sheetProperties({ sheetId: 42, title: 'Archive', index: 1 })])
    )
  })

  function sheet1() {
    const s = spreadsheet.sheetById(7)
    if (!s) throw new Error('fixture sheet missing')
    return s
  }

  it('refuses to open without a fetched spreadsheet', () => {
    expect(() => BatchBuilder.open(null, api)).toThrow(InvalidArgumentError)
    expect(() => BatchBuilder.open(undefined, api)).toThrow(InvalidArgumentError)

    const unsaved = new Spreadsheet({ ...spreadsheetSnapshot(), spreadsheetId: '' })
    expect(() => BatchBuilder.open(unsaved, api)).toThrow(InvalidArgumentError)
  })

  it('rejects an empty submit without calling the server', async () => {
    const batch = BatchBuilder.open(spreadsheet, api)
    await expect(batch.submit()).rejects.toBeInstanceOf(EmptyBatchError)
    expect(executor.calls).toHaveLength(0)
  })

  it('skips property updates that change nothing', () => {
    const batch = BatchBuilder.open(spreadsheet, api)
      .updateSheetProperties(sheet1(), sheetProperties())
      .updateSpreadsheetProperties({ ...spreadsheet.properties })
    expect(batch.size).toBe(0)
  })

  it('serializes heterogeneous operations in order', () => {
    const s = sheet1()
    const batch = BatchBuilder.open(spreadsheet, api)
      .updateSheetProperties(s, { ...s.properties, title: 'Data' })
      .deleteDimension(s, 'ROWS', 2, 5)
      .insertDimension(s, 'COLUMNS', 3, 4, true)
      .appendCells(s, [['a', '1', '=A1', 'true']])
      .addSheet({ title: 'Extra' })
      .deleteSheet(42)

    expect(batch.operations.map((o) => o.kind)).toEqual([
      'updateSheetProperties',
      'deleteDimension',
      'insertDimension',
      'appendCells',
      'addSheet',
      'deleteSheet',
    ])
    expect(batch.toRequestBody()).toEqual({
      requests: [
        { updateSheetProperties: { properties: { sheetId: 7, title: 'Data' }, fields: 'title' } },
        { deleteDimension: { range: { sheetId: 7, dimension: 'ROWS', startIndex: 2, endIndex: 5 } } },
        {
          insertDimension: {
            range: { sheetId: 7, dimension: 'COLUMNS', startIndex: 3, endIndex: 4 },
            inheritFromBefore: true,
          },
        },
        {
          appendCells: {
            sheetId: 7,
            rows: [
              {
                values: [
                  { userEnteredValue: { stringValue: 'a' } },
                  { userEnteredValue: { numberValue: 1 } },
                  { userEnteredValue: { formulaValue: '=A1' } },
                  { userEnteredValue: { boolValue: true } },
                ],
              },
            ],
            fields: 'userEnteredValue',
          },
        },
        { addSheet: { properties: { title: 'Extra' } } },
        { deleteSheet: { sheetId: 42 } },
      ],
    })
  })

  it('validates dimension ranges', () => {
    const s = sheet1()
    const batch = BatchBuilder.open(spreadsheet, api)
    expect(() => batch.deleteDimension(s, 'ROWS', 5, 5)).toThrow(InvalidArgumentError)
    expect(() => batch.deleteDimension(s, 'ROWS', -1, 2)).toThrow(InvalidArgumentError)
    expect(() => batch.deleteDimension(s, 'ROWS', 0, 1.5)).toThrow(InvalidArgumentError)
    expect(() => batch.insertDimension(s, 'ROWS', 0, 2, true)).toThrow(InvalidArgumentError)
    expect(batch.size).toBe(0)
  })

  it('rejects dimension ranges outside the grid', () => {
    const s = sheet1()
    const batch = BatchBuilder.open(spreadsheet, api)
    expect(() => batch.deleteDimension(s, 'ROWS', 90, 110)).toThrow(/runs past the end of sheet=7 \(100 rows\)/)
    expect(() => batch.deleteDimension(s, 'COLUMNS', 0, 27)).toThrow(InvalidArgumentError)
    expect(() => batch.insertDimension(s, 'COLUMNS', 27, 28)).toThrow(/insert at 27 is past the end/)
    expect(batch.size).toBe(0)

    batch.deleteDimension(s, 'ROWS', 90, 100).insertDimension(s, 'COLUMNS', 26, 30)
    expect(batch.size).toBe(2)
  })

  it('validates other operation input', () => {
    const batch = BatchBuilder.open(spreadsheet, api)
    expect(() => batch.addSheet({ title: '' })).toThrow(InvalidArgumentError)
    expect(() => batch.deleteSheet(-1)).toThrow(InvalidArgumentError)
    expect(() => batch.appendCells(sheet1(), [])).toThrow(InvalidArgumentError)
  })

  it('rejects sheets of another spreadsheet', () => {
    const other = new Spreadsheet({ ...spreadsheetSnapshot(), spreadsheetId: 'other-456' })
    const foreign = other.sheetById(7)
    if (!foreign) throw new Error('fixture sheet missing')

    const batch = BatchBuilder.open(spreadsheet, api)
    expect(() => batch.deleteDimension(foreign, 'ROWS', 0, 1)).toThrow(InvalidArgumentError)
  })

  it('posts the batch and returns the replies', async () => {
    executor.reply(BATCH_OK)
    const s = sheet1()
    const res = await BatchBuilder.open(spreadsheet, api).deleteSheet(s.id).submit()

    expect(res).toEqual({ spreadsheetId: SPREADSHEET_ID, replies: [{}] })
    expect(executor.calls).toEqual([
      {
        method: 'POST',
        path: '/spreadsheets/sheet-123:batchUpdate',
        body: { requests: [{ deleteSheet: { sheetId: 7 } }] },
      },
    ])
  })

  it('propagates remote errors and keeps the operations', async () => {
    executor.reply({ error: { code: 400, status: 'INVALID_ARGUMENT', message: 'No grid with id: 7' } })
    const batch = BatchBuilder.open(spreadsheet, api).deleteSheet(7)

    await expect(batch.submit()).rejects.toBeInstanceOf(RemoteApiError)
    expect(batch.size).toBe(1)
  })
})

describe('toExtendedValue', () => {
  it('reads plain decimals as numbers', () => {
    expect(toExtendedValue('42')).toEqual({ numberValue: 42 })
    expect(toExtendedValue(' -2.5 ')).toEqual({ numberValue: -2.5 })
    expect(toExtendedValue('.5')).toEqual({ numberValue: 0.5 })
    expect(toExtendedValue('1e3')).toEqual({ numberValue: 1000 })
  })

  it('keeps radix literals and other number-like text as strings', () => {
    expect(toExtendedValue('0x1A')).toEqual({ stringValue: '0x1A' })
    expect(toExtendedValue('0b11')).toEqual({ stringValue: '0b11' })
    expect(toExtendedValue('0o17')).toEqual({ stringValue: '0o17' })
    expect(toExtendedValue('Infinity')).toEqual({ stringValue: 'Infinity' })
    expect(toExtendedValue('1_000')).toEqual({ stringValue: '1_000' })
    expect(toExtendedValue('')).toEqual({ stringValue: '' })
  })

  it('recognizes formulas and booleans', () => {
    expect(toExtendedValue('=SUM(A1:A3)')).toEqual({ formulaValue: '=SUM(A1:A3)' })
    expect(toExtendedValue('true')).toEqual({ boolValue: true })
  })
})
