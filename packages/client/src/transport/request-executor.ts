// packages/client/src/transport/request-executor.ts

/**
 * Authenticated access to the remote API. Paths are relative to the
 * configured base URL (e.g. `/spreadsheets/abc`). Implementations return the
 * raw response body for any HTTP status; the error envelope inside the body
 * is what decides success. Network and token failures reject with
 * TransportError.
 */
export interface RequestExecutor {
  get(path: string): Promise<string>
  post(path: string, body: unknown): Promise<string>
}
