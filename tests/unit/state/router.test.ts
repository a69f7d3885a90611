import { describe, it, expect } from 'vitest'
import { pino } from 'pino'
import { MockFileSystem } from '../../../src/core/fs.js'
import { UnknownKindError } from '../../../src/core/errors.js'
import { StateStore } from '../../../src/state/store.js'
import { EntryRouter } from '../../../src/state/router.js'
import { STATE_FIELDS, type EntryKind, type StateDocument, type StateField } from '../../../src/state/types.js'

const logger = pino({ level: 'silent' })
const config = { stateDir: '/project', defaultFile: 'project.json', subsystemSuffix: '-state.json' }
const mainPath = '/project/project.json'
const today = new Date(2026, 0, 9, 10, 0)

function setup(initial?: Record<string, unknown>) {
    const fs = new MockFileSystem()
    if (initial) fs.setFile(mainPath, JSON.stringify(initial))
    const store = new StateStore(config, fs, logger)
    const router = new EntryRouter({ store, logger, now: () => today })
    return { fs, store, router }
}

async function loadOrThrow(store: StateStore, subsystem?: string): Promise<StateDocument> {
    const result = await store.load(subsystem)
    if (!result.ok) throw result.error
    return result.value
}

describe('EntryRouter.record', () => {
    const cases: Array<[EntryKind, StateField]> = [
        ['decided', 'decided'],
        ['built', 'built'],
        ['question', 'open_questions'],
        ['file', 'important_files'],
        ['context', 'context'],
    ]

    it.each(cases)('%s appends one dated entry to %s', async (kind, field) => {
        const { store, router } = setup()
        const result = await router.record(kind, 'some text')

        expect(result).toEqual({
            ok: true,
            value: { kind, field, subsystem: undefined, text: 'some text', entry: '2026-01-09 - some text' },
        })

        const document = await loadOrThrow(store)
        expect(document[field]).toEqual(['2026-01-09 - some text'])
        for (const other of STATE_FIELDS.filter((f) => f !== field)) {
            expect(document[other]).toHaveLength(0)
        }
    })

    it('appends after existing entries without reordering', async () => {
        const { store, router } = setup({ built: ['2026-01-07 - b', '2026-01-08 - a'] })
        await router.record('built', 'c')
        const document = await loadOrThrow(store)
        expect(document.built).toEqual(['2026-01-07 - b', '2026-01-08 - a', '2026-01-09 - c'])
    })

    it('keeps duplicate entries', async () => {
        const { store, router } = setup()
        await router.record('context', 'same')
        await router.record('context', 'same')
        const document = await loadOrThrow(store)
        expect(document.context).toEqual(['2026-01-09 - same', '2026-01-09 - same'])
    })

    it('writes to the subsystem file', async () => {
        const { fs, store, router } = setup()
        const result = await router.record('decided', 'Split billing out', 'billing')
        expect(result.ok && result.value.subsystem).toBe('billing')
        expect(fs.getFiles().has(mainPath)).toBe(false)

        const document = await loadOrThrow(store, 'billing')
        expect(document.decided).toEqual(['2026-01-09 - Split billing out'])
        expect(document.subsystem_name).toBe('billing')
    })

    it('rejects an unknown kind without touching any file', async () => {
        const { fs, router } = setup()
        const result = await router.record('decision', 'x')
        expect(result.ok).toBe(false)
        if (result.ok) return
        expect(result.error).toBeInstanceOf(UnknownKindError)
        expect(result.error.message).toBe(
            "Unknown command 'decision'. Valid commands: built, context, decided, file, question"
        )
        expect(fs.getFiles().size).toBe(0)
    })

    it('passes through a malformed state file', async () => {
        const { fs, router } = setup()
        fs.setFile(mainPath, 'garbage')
        const result = await router.record('decided', 'x')
        expect(result.ok).toBe(false)
        if (!result.ok) expect(result.error.code).toBe('malformed_state')
        expect(fs.getFiles().get(mainPath)).toBe('garbage')
    })
})

describe('EntryRouter.resolve', () => {
    it('reports not_found with the open questions and changes nothing', async () => {
        const { fs, router } = setup({ open_questions: ['2026-01-08 - caching strategy?'] })
        const before = fs.getFiles().get(mainPath)

        const result = await router.resolve('database', 'Postgres')

        expect(result).toEqual({
            ok: true,
            value: {
                status: 'not_found',
                subsystem: undefined,
                query: 'database',
                openQuestions: ['2026-01-08 - caching strategy?'],
            },
        })
        expect(fs.getFiles().get(mainPath)).toBe(before)
    })

    it('reports not_found with no open questions at all', async () => {
        const { fs, router } = setup()
        const result = await router.resolve('anything', 'x')
        expect(result.ok && result.value.status === 'not_found' && result.value.openQuestions).toEqual([])
        expect(fs.getFiles().size).toBe(0)
    })

    it('moves the single match to resolved', async () => {
        const { store, router } = setup({
            decided: ['2026-01-07 - Use JSON'],
            open_questions: ['2026-01-08 - auth flow?', '2026-01-08 - caching strategy?', '2026-01-08 - logging?'],
        })

        const result = await router.resolve('CACHING', 'Cache by URL')

        expect(result).toEqual({
            ok: true,
            value: {
                status: 'resolved',
                subsystem: undefined,
                question: 'caching strategy?',
                decision: 'Cache by URL',
                entry: '2026-01-09 - caching strategy? → Decided: Cache by URL',
            },
        })

        const document = await loadOrThrow(store)
        expect(document.open_questions).toEqual(['2026-01-08 - auth flow?', '2026-01-08 - logging?'])
        expect(document.resolved).toEqual(['2026-01-09 - caching strategy? → Decided: Cache by URL'])
        expect(document.decided).toEqual(['2026-01-07 - Use JSON'])
        expect(document.built).toEqual([])
    })

    it('keeps everything after the first separator as the question', async () => {
        const { router } = setup({ open_questions: ['2026-01-08 - retry policy - fixed or exponential?'] })
        const result = await router.resolve('retry', 'Exponential')
        expect(result.ok && result.value.status === 'resolved' && result.value.entry).toBe(
            '2026-01-09 - retry policy - fixed or exponential? → Decided: Exponential'
        )
    })

    it('searches the whole entry, date included', async () => {
        const { store, router } = setup({ open_questions: ['2026-01-08 - naming?'] })
        await router.record('question', 'naming?')

        const result = await router.resolve('2026-01-08', 'kebab-case')
        expect(result.ok && result.value.status).toBe('resolved')

        const document = await loadOrThrow(store)
        expect(document.open_questions).toEqual(['2026-01-09 - naming?'])
        expect(document.resolved).toEqual(['2026-01-09 - naming? → Decided: kebab-case'])
    })

    it('reports ambiguous matches in order and changes nothing', async () => {
        const { fs, router } = setup({
            open_questions: ['2026-01-08 - cache size?', '2026-01-08 - auth?', '2026-01-09 - Cache eviction?'],
        })
        const before = fs.getFiles().get(mainPath)

        const result = await router.resolve('cache', 'LRU')

        expect(result).toEqual({
            ok: true,
            value: {
                status: 'ambiguous',
                subsystem: undefined,
                query: 'cache',
                matches: ['2026-01-08 - cache size?', '2026-01-09 - Cache eviction?'],
            },
        })
        expect(fs.getFiles().get(mainPath)).toBe(before)
    })

    it('works on a subsystem document', async () => {
        const { store, router } = setup()
        await router.record('question', 'Plural forms?', 'glossary')
        const result = await router.resolve('plural', 'Use CLDR rules', 'glossary')
        expect(result.ok && result.value.subsystem).toBe('glossary')

        const document = await loadOrThrow(store, 'glossary')
        expect(document.open_questions).toEqual([])
        expect(document.resolved).toEqual(['2026-01-09 - Plural forms? → Decided: Use CLDR rules'])
    })

    it('passes through a failed save', async () => {
        const { fs, router } = setup({ open_questions: ['2026-01-08 - q?'] })
        fs.denyWrites(mainPath)
        const result = await router.resolve('q', 'yes')
        expect(result.ok).toBe(false)
        if (!result.ok) expect(result.error.code).toBe('io_failure')
    })
})

describe('EntryRouter.show', () => {
    it('returns the loaded document', async () => {
        const { router } = setup({ context: ['2026-01-08 - Solo project'] })
        const result = await router.show()
        expect(result.ok && result.value.context).toEqual(['2026-01-08 - Solo project'])
    })
})
