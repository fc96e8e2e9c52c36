// packages/client/src/index.ts
export * from './core/errors.js'
export * from './core/a1.js'
export type { LoggerLike } from './core/logger.js'
export { noopLogger } from './core/logger.js'
export * from './core/model/properties.js'
export { Cell } from './core/model/cell.js'
export { Sheet, type PendingWrite } from './core/model/sheet.js'
export { Spreadsheet } from './core/model/spreadsheet.js'
export * from './core/batch/batch.protocol.js'
export { diffSheetProperties, diffSpreadsheetProperties } from './core/batch/batch.diff.js'
export type { FieldDiff } from './core/batch/batch.diff.js'
export { BatchBuilder } from './core/batch/batch.builder.js'
export * from './core/values/values.batch.js'
export { parseSpreadsheet, extendedValueToString } from './core/sync/spreadsheet.wire.js'
export { Synchronizer, DEFAULT_FETCH_FIELDS } from './core/sync/synchronizer.js'
export { MutationCoordinator } from './core/coordinator.js'
export type { MutationCoordinatorOptions } from './core/coordinator.js'
export {
  SheetsApi,
  spreadsheetsPath,
  spreadsheetPath,
  batchUpdatePath,
  valuesBatchUpdatePath,
} from './core/sheets.api.js'
export type { RequestExecutor } from './transport/request-executor.js'
export * from './transport/auth.js'
export { HttpRequestExecutor } from './transport/http.executor.js'
export type { HttpRequestExecutorOptions } from './transport/http.executor.js'
export * from './config/client.config.js'
export { SheetsClient, createSheetsClient } from './client.js'
export type { SheetsClientOptions } from './client.js'
