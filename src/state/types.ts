export const ENTRY_KINDS = ['decided', 'built', 'question', 'file', 'context'] as const

export type EntryKind = (typeof ENTRY_KINDS)[number]

/** List fields of a state document, in serialization order. */
export const STATE_FIELDS = ['decided', 'built', 'open_questions', 'resolved', 'important_files', 'context'] as const

export type StateField = (typeof STATE_FIELDS)[number]

export const KIND_TO_FIELD: Record<EntryKind, StateField> = {
    decided: 'decided',
    built: 'built',
    question: 'open_questions',
    file: 'important_files',
    context: 'context',
}

/**
 * One project's (or one subsystem's) log. Keys outside the schema are kept
 * as-is so that a load/save cycle never drops data.
 */
export type StateDocument = Record<StateField, string[]> & {
    subsystem_name?: string
    [key: string]: unknown
}

export interface RecordConfirmation {
    kind: EntryKind
    field: StateField
    subsystem?: string
    text: string
    entry: string
}

export type ResolveOutcome =
    | { status: 'resolved'; subsystem?: string; question: string; decision: string; entry: string }
    | { status: 'not_found'; subsystem?: string; query: string; openQuestions: string[] }
    | { status: 'ambiguous'; subsystem?: string; query: string; matches: string[] }

export function isEntryKind(value: string): value is EntryKind {
    return (ENTRY_KINDS as readonly string[]).includes(value)
}

export function isStateField(value: string): value is StateField {
    return (STATE_FIELDS as readonly string[]).includes(value)
}
