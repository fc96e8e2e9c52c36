import { describe, it, expect } from 'vitest'

import { decodeResponse } from '../src/core/error-decoder.js'
import { DecodeError, RemoteApiError, TransportError, toErrorShape } from '../src/core/errors.js'

function decodeFailure(body: string): unknown {
  try {
    decodeResponse(body)
  } catch (err) {
    return err
  }
  throw new Error('expected decodeResponse to throw')
}

describe('decodeResponse', () => {
  it('turns the error envelope into a RemoteApiError', () => {
    const err = decodeFailure('{"error":{"code":400,"status":"INVALID_ARGUMENT","message":"bad range"}}')
    expect(err).toBeInstanceOf(RemoteApiError)
    expect(err).toMatchObject({ code: 400, status: 'INVALID_ARGUMENT', message: 'bad range', kind: 'RemoteApiError' })
  })

  it('returns the payload when there is no error key', () => {
    expect(decodeResponse('{"spreadsheetId":"abc","replies":[]}')).toEqual({ spreadsheetId: 'abc', replies: [] })
  })

  it('fills missing envelope fields with zero values', () => {
    const err = decodeFailure('{"error":{}}')
    expect(err).toBeInstanceOf(RemoteApiError)
    expect(err).toMatchObject({ code: 0, status: 'UNKNOWN', message: '' })
  })

  it('reports malformed JSON as a DecodeError with a body preview', () => {
    const err = decodeFailure('not json')
    expect(err).toBeInstanceOf(DecodeError)
    expect(err).toMatchObject({ message: 'response body is not valid JSON', bodyPreview: 'not json' })
  })

  it('rejects bodies that are not objects', () => {
    const err = decodeFailure('[1,2]')
    expect(err).toBeInstanceOf(DecodeError)
    expect(err).toMatchObject({ message: 'response body is not a JSON object' })
  })

  it('rejects a non-object error value', () => {
    const err = decodeFailure('{"error":"boom"}')
    expect(err).toBeInstanceOf(DecodeError)
    expect(err).toMatchObject({ message: 'error envelope is not an object' })
  })

  it('truncates the preview to 200 characters', () => {
    const body = `{${'x'.repeat(300)}`
    const err = decodeFailure(body)
    expect(err).toMatchObject({ bodyPreview: body.slice(0, 200) })
  })
})

describe('toErrorShape', () => {
  it('flattens remote errors', () => {
    expect(toErrorShape(new RemoteApiError(404, 'NOT_FOUND', 'missing'))).toEqual({
      message: 'missing',
      kind: 'RemoteApiError',
      code: 404,
      status: 'NOT_FOUND',
    })
  })

  it('carries the HTTP status of transport errors', () => {
    expect(toErrorShape(new TransportError('down', { statusCode: 503 }))).toEqual({
      message: 'down',
      kind: 'TransportError',
      code: 503,
    })
  })

  it('handles plain errors and non-errors', () => {
    expect(toErrorShape(new Error('plain'))).toEqual({ message: 'plain' })
    expect(toErrorShape('x')).toEqual({ message: 'x' })
  })
})
