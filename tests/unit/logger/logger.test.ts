import { describe, it, expect } from 'vitest'
import { createLogger } from '../../../src/logger/index.js'

describe('createLogger', () => {
    it('uses the configured level', () => {
        expect(createLogger({ logLevel: 'warn' }).level).toBe('warn')
        expect(createLogger({ logLevel: 'silent' }).level).toBe('silent')
    })

    it('suppresses debug output by default', () => {
        expect(createLogger({ logLevel: 'warn' }).isLevelEnabled('debug')).toBe(false)
    })
})
