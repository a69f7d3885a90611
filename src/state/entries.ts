import { format } from 'date-fns'

export const DATE_SEPARATOR = ' - '
export const RESOLUTION_MARKER = ' → Decided: '

export function formatEntryDate(date: Date): string {
    return format(date, 'yyyy-MM-dd')
}

export function composeEntry(date: Date, text: string): string {
    return `${formatEntryDate(date)}${DATE_SEPARATOR}${text}`
}

export function composeResolution(date: Date, question: string, decision: string): string {
    return composeEntry(date, `${question}${RESOLUTION_MARKER}${decision}`)
}

/** Text after the first `" - "`, or the whole entry when it has none. */
export function stripDatePrefix(entry: string): string {
    const index = entry.indexOf(DATE_SEPARATOR)
    if (index === -1) return entry
    return entry.slice(index + DATE_SEPARATOR.length)
}

export function findMatches(entries: readonly string[], query: string): string[] {
    const needle = query.toLowerCase()
    return entries.filter((entry) => entry.toLowerCase().includes(needle))
}
