// packages/client/src/core/json.ts

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue }

export type JsonObject = { [key: string]: unknown }

export function isPlainObject(v: unknown): v is JsonObject {
  if (v == null || typeof v !== 'object') return false
  const proto = Object.getPrototypeOf(v)
  return proto === Object.prototype || proto === null
}

export function clone<T>(v: T): T {
  return structuredClone(v)
}

// -----------------------------
// Narrow readers for wire payloads
// -----------------------------

export function readObject(v: unknown): JsonObject | undefined {
  return isPlainObject(v) ? v : undefined
}

export function readArray(v: unknown): unknown[] {
  return Array.isArray(v) ? v : []
}

export function readString(v: unknown, def = ''): string {
  return typeof v === 'string' ? v : def
}

export function readNumber(v: unknown, def = 0): number {
  return typeof v === 'number' && Number.isFinite(v) ? v : def
}

export function readBool(v: unknown, def = false): boolean {
  return typeof v === 'boolean' ? v : def
}
