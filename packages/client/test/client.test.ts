import { afterEach, describe, it, expect } from 'vitest'
import { MockAgent } from 'undici'
import { createLogger, LogChannel, makeLogBuffer } from '@sheetmirror/logging'

import { createSheetsClient } from '../src/client.js'
import { DecodeError, InvalidArgumentError } from '../src/core/errors.js'
import { DEFAULT_FETCH_FIELDS } from '../src/core/sync/synchronizer.js'
import { FakeExecutor } from './helpers/fake-executor.js'
import { spreadsheetResource, SPREADSHEET_ID } from './helpers/fixtures.js'

describe('createSheetsClient', () => {
  let agent: MockAgent | undefined

  afterEach(async () => {
    await agent?.close()
    agent = undefined
  })

  it('creates a spreadsheet and loads it', async () => {
    const executor = new FakeExecutor()
      .reply({ spreadsheetId: SPREADSHEET_ID })
      .reply(
        spreadsheetResource([
          { sheetId: 0, title: 'Runs' },
          { sheetId: 1, title: 'Metrics', index: 1 },
        ])
      )
    const client = createSheetsClient({ executor, env: {} })

    const spreadsheet = await client.createSpreadsheet('Budget', ['Runs', 'Metrics'])

    expect(executor.calls[0]).toEqual({
      method: 'POST',
      path: '/spreadsheets',
      body: {
        properties: { title: 'Budget' },
        sheets: [{ properties: { title: 'Runs' } }, { properties: { title: 'Metrics' } }],
      },
    })
    expect(executor.calls[1]?.method).toBe('GET')
    expect(spreadsheet.sheets.map((s) => s.title)).toEqual(['Runs', 'Metrics'])
  })

  it('leaves sheets out of the create body when none are named', async () => {
    const executor = new FakeExecutor()
      .reply({ spreadsheetId: SPREADSHEET_ID })
      .reply(spreadsheetResource([{ sheetId: 0, title: 'Sheet1' }]))
    const client = createSheetsClient({ executor, env: {} })

    await client.createSpreadsheet('Budget')

    expect(executor.calls[0]?.body).toEqual({ properties: { title: 'Budget' } })
  })

  it('rejects a create response without an id', async () => {
    const executor = new FakeExecutor().reply({})
    const client = createSheetsClient({ executor, env: {} })

    await expect(client.createSpreadsheet('Budget')).rejects.toBeInstanceOf(DecodeError)
    await expect(client.createSpreadsheet('')).rejects.toBeInstanceOf(InvalidArgumentError)
  })

  it('applies config overrides to the coordinator', async () => {
    const executor = new FakeExecutor()
      .reply(spreadsheetResource([{ sheetId: 7, title: 'Sheet1' }]))
      .reply({ spreadsheetId: SPREADSHEET_ID })
    const client = createSheetsClient({ executor, env: {}, config: { valueInputOption: 'RAW' } })

    const spreadsheet = await client.fetchSpreadsheet(SPREADSHEET_ID)
    const sheet = spreadsheet.sheetById(7)
    if (!sheet) throw new Error('fixture sheet missing')
    sheet.update(1, 1, 'x')
    await client.coordinator.syncSheet(sheet)

    expect(executor.calls[1]?.body).toEqual({
      valueInputOption: 'RAW',
      data: [{ range: 'Sheet1!A1', majorDimension: 'COLUMNS', values: [['x']] }],
    })
  })

  it('needs credentials when no executor is injected', () => {
    expect(() => createSheetsClient({ env: {} })).toThrow(InvalidArgumentError)
  })

  it('reports invalid config on the config channel', () => {
    const buffer = makeLogBuffer(10)

    expect(() =>
      createSheetsClient({ env: { GOOGLE_PRIVATE_KEY: 'test-key' }, logger: createLogger('sheetmirror-test', buffer) })
    ).toThrow(/GOOGLE_SERVICE_ACCOUNT_EMAIL is required/)

    const records = buffer.getLatest(10).filter((r) => r.channel === LogChannel.config)
    expect(records.map((r) => [r.level, r.message])).toEqual([
      ['warn', 'kind=config-invalid errors=["GOOGLE_SERVICE_ACCOUNT_EMAIL is required with GOOGLE_PRIVATE_KEY"]'],
    ])
  })

  it('reports accepted config on the config channel', () => {
    const buffer = makeLogBuffer(10)

    createSheetsClient({
      env: { SHEETS_ACCESS_TOKEN: 'test-token', SHEETS_SCOPES: 'scope-a,scope-b' },
      logger: createLogger('sheetmirror-test', buffer),
    })

    const records = buffer.getLatest(10).filter((r) => r.channel === LogChannel.config)
    expect(records.map((r) => [r.level, r.message])).toEqual([
      ['info', 'kind=config-ok auth=static-token scopes=scope-a,scope-b'],
    ])
  })

  it('runs over HTTP with a static token and logs to the buffer', async () => {
    agent = new MockAgent()
    agent.disableNetConnect()
    agent
      .get('https://sheets.test')
      .intercept({
        path: (p) => decodeURIComponent(p) === `/v4/spreadsheets/sheet-123?fields=${DEFAULT_FETCH_FIELDS}`,
        method: 'GET',
        headers: { authorization: 'Bearer test-token' },
      })
      .reply(200, JSON.stringify(spreadsheetResource([{ sheetId: 7, title: 'Sheet1', rows: [['hello']] }])))

    const buffer = makeLogBuffer(50)
    const client = createSheetsClient({
      env: { SHEETS_API_BASE_URL: 'https://sheets.test/v4', SHEETS_ACCESS_TOKEN: 'test-token' },
      dispatcher: agent,
      logger: createLogger('sheetmirror-test', buffer),
    })

    const spreadsheet = await client.fetchSpreadsheet(SPREADSHEET_ID)

    expect(spreadsheet.sheetById(7)?.cell(1, 1)?.value).toBe('hello')
    const synced = buffer.getLatest(50).filter((r) => r.channel === LogChannel.sync)
    expect(synced.map((r) => r.message)).toEqual([`kind=spreadsheet-fetched id=${SPREADSHEET_ID} sheets=1`])
  })
})
