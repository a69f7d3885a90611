import { z } from 'zod'
import { ok, err, type Result } from '../core/result.js'
import { STATE_FIELDS, type StateDocument } from './types.js'

const EntryListSchema = z.array(z.string()).default([])

const StateDocumentSchema = z
    .object({
        decided: EntryListSchema,
        built: EntryListSchema,
        open_questions: EntryListSchema,
        resolved: EntryListSchema,
        important_files: EntryListSchema,
        context: EntryListSchema,
        subsystem_name: z.string().optional(),
    })
    .passthrough()

// Key names written by the first release of the tool.
const LEGACY_KEYS = new Map<string, string>([
    ['what_we_decided', 'decided'],
    ['what_we_built', 'built'],
    ['what_we_need_to_decide', 'open_questions'],
    ['what_we_resolved', 'resolved'],
    ['subsystem', 'subsystem_name'],
])

export interface NormalizedDocument {
    document: StateDocument
    /** Legacy keys that were renamed. */
    migrated: string[]
}

export interface DocumentProblem {
    message: string
    cause?: unknown
}

export function createEmptyDocument(subsystem?: string): StateDocument {
    const document: StateDocument = {
        decided: [],
        built: [],
        open_questions: [],
        resolved: [],
        important_files: [],
        context: [],
    }
    if (subsystem) document.subsystem_name = subsystem
    return document
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function migrateLegacyKeys(raw: Record<string, unknown>): { data: Record<string, unknown>; migrated: string[] } {
    const data: Record<string, unknown> = {}
    const migrated: string[] = []
    for (const [key, value] of Object.entries(raw)) {
        const current = LEGACY_KEYS.get(key)
        if (current !== undefined && !Object.hasOwn(raw, current)) {
            data[current] = value
            migrated.push(key)
        } else {
            data[key] = value
        }
    }
    return { data, migrated }
}

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ')
}

/**
 * Brings a parsed state file up to the current schema: legacy keys are renamed,
 * missing list fields become empty, the subsystem label is filled in.
 * Existing entries and unknown keys are left untouched.
 */
export function normalizeDocument(raw: unknown, subsystem?: string): Result<NormalizedDocument, DocumentProblem> {
    if (!isPlainObject(raw)) {
        return err({ message: 'must contain a JSON object' })
    }

    const { data, migrated } = migrateLegacyKeys(raw)
    const parsed = StateDocumentSchema.safeParse(data)
    if (!parsed.success) {
        return err({ message: formatIssues(parsed.error), cause: parsed.error })
    }

    const document: StateDocument = parsed.data
    if (subsystem && document.subsystem_name === undefined) {
        document.subsystem_name = subsystem
    }
    return ok({ document, migrated })
}

/** Canonical on-disk form: list fields first, then the label, then anything else. */
export function serializeDocument(document: StateDocument): string {
    const ordered: Record<string, unknown> = {}
    for (const field of STATE_FIELDS) {
        ordered[field] = document[field]
    }
    if (document.subsystem_name !== undefined) {
        ordered.subsystem_name = document.subsystem_name
    }
    for (const [key, value] of Object.entries(document)) {
        if (!Object.hasOwn(ordered, key) && key !== 'subsystem_name') {
            ordered[key] = value
        }
    }
    return `${JSON.stringify(ordered, null, 2)}\n`
}
