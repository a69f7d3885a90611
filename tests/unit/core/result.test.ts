import { describe, it, expect } from 'vitest'
import { IOFailureError, MalformedStateError } from '../../../src/core/errors.js'
import { ok, err, type Result } from '../../../src/core/result.js'
import type { StoreError } from '../../../src/state/store.js'

function describeSave(result: Result<string, StoreError>): string {
    if (result.ok) return `saved ${result.value}`
    if (result.error instanceof IOFailureError) return `${result.error.operation} failed on ${result.error.path}`
    return result.error.code
}

describe('Result', () => {
    it('ok carries the saved path', () => {
        expect(describeSave(ok('/project/project.json'))).toBe('saved /project/project.json')
    })

    it('err carries a store error that narrows by class', () => {
        const result = err(new IOFailureError('/project/api-state.json', 'write'))
        expect(result).toEqual({ ok: false, error: expect.any(IOFailureError) })
        expect(describeSave(result)).toBe('write failed on /project/api-state.json')
    })

    it('exposes the error code for the remaining store errors', () => {
        const result: Result<string, StoreError> = err(new MalformedStateError('/project/project.json', 'is broken'))
        expect(describeSave(result)).toBe('malformed_state')
    })
})
