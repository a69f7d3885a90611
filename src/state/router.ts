import { UnknownKindError } from '../core/errors.js'
import { ok, err, type Result } from '../core/result.js'
import type { Logger } from '../logger/index.js'
import { composeEntry, composeResolution, findMatches, stripDatePrefix } from './entries.js'
import type { StateStore, StoreError } from './store.js'
import {
    ENTRY_KINDS,
    isEntryKind,
    KIND_TO_FIELD,
    type RecordConfirmation,
    type ResolveOutcome,
    type StateDocument,
} from './types.js'

export interface EntryRouterDeps {
    store: StateStore
    logger: Logger
    now?: () => Date
}

export class EntryRouter {
    private store: StateStore
    private logger: Logger
    private now: () => Date

    constructor(deps: EntryRouterDeps) {
        this.store = deps.store
        this.logger = deps.logger
        this.now = deps.now ?? (() => new Date())
    }

    /** Appends a dated entry to the field `kind` maps to. */
    async record(
        kind: string,
        text: string,
        subsystem?: string
    ): Promise<Result<RecordConfirmation, StoreError | UnknownKindError>> {
        if (!isEntryKind(kind)) {
            return err(new UnknownKindError(kind, [...ENTRY_KINDS].sort()))
        }

        const loaded = await this.store.load(subsystem)
        if (!loaded.ok) return loaded
        const document = loaded.value

        const field = KIND_TO_FIELD[kind]
        const entry = composeEntry(this.now(), text)
        document[field].push(entry)

        const saved = await this.store.save(document, subsystem)
        if (!saved.ok) return saved

        this.logger.debug({ field, subsystem, path: saved.value }, 'Entry recorded')
        return ok({ kind, field, subsystem, text, entry })
    }

    /**
     * Moves the single open question containing `partialText` (case-insensitive)
     * to `resolved`. Zero or several matches leave the document untouched.
     */
    async resolve(
        partialText: string,
        decisionText: string,
        subsystem?: string
    ): Promise<Result<ResolveOutcome, StoreError>> {
        const loaded = await this.store.load(subsystem)
        if (!loaded.ok) return loaded
        const document = loaded.value

        const matches = findMatches(document.open_questions, partialText)

        if (matches.length === 0) {
            this.logger.debug({ query: partialText, subsystem }, 'No matching open question')
            const outcome: ResolveOutcome = {
                status: 'not_found',
                subsystem,
                query: partialText,
                openQuestions: [...document.open_questions],
            }
            return ok(outcome)
        }

        if (matches.length > 1) {
            this.logger.debug({ query: partialText, subsystem, count: matches.length }, 'Ambiguous question match')
            const outcome: ResolveOutcome = { status: 'ambiguous', subsystem, query: partialText, matches }
            return ok(outcome)
        }

        const [match] = matches
        const question = stripDatePrefix(match)
        const entry = composeResolution(this.now(), question, decisionText)

        document.open_questions.splice(document.open_questions.indexOf(match), 1)
        document.resolved.push(entry)

        const saved = await this.store.save(document, subsystem)
        if (!saved.ok) return saved

        this.logger.debug({ subsystem, path: saved.value }, 'Question resolved')
        const outcome: ResolveOutcome = { status: 'resolved', subsystem, question, decision: decisionText, entry }
        return ok(outcome)
    }

    async show(subsystem?: string): Promise<Result<StateDocument, StoreError>> {
        return this.store.load(subsystem)
    }
}
