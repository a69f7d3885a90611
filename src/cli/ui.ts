import pc from 'picocolors'
import { causeMessage, type StatelogError } from '../core/errors.js'
import type { RecordConfirmation, ResolveOutcome, StateDocument, StateField } from '../state/types.js'

export const colors = {
    success: (text: string) => pc.green(text),
    error: (text: string) => pc.red(text),
    warn: (text: string) => pc.yellow(text),
    dim: (text: string) => pc.dim(text),
    bold: (text: string) => pc.bold(text),
    subsystem: (name: string) => pc.cyan(`[${name}]`),
}

function subsystemLabel(subsystem?: string): string {
    return subsystem ? ` ${colors.subsystem(subsystem)}` : ''
}

export function formatError(message: string): string {
    return `${colors.error('Error:')} ${message}`
}

export function formatStatelogError(error: StatelogError): string {
    const lines = [formatError(error.message)]
    const cause = causeMessage(error)
    if (cause) lines.push(colors.dim(`Details: ${cause}`))
    return lines.join('\n')
}

export function formatRecorded(confirmation: RecordConfirmation): string {
    return `${colors.success('✓')} Added to ${confirmation.field}${subsystemLabel(confirmation.subsystem)}: ${confirmation.text}`
}

export function formatResolveOutcome(outcome: ResolveOutcome): string {
    switch (outcome.status) {
        case 'resolved':
            return [
                `${colors.success('✓')} Resolved${subsystemLabel(outcome.subsystem)}: ${outcome.question}`,
                `  Decision: ${outcome.decision}`,
            ].join('\n')
        case 'not_found': {
            const lines = [
                `${colors.error('✗')} No question found matching${subsystemLabel(outcome.subsystem)}: '${outcome.query}'`,
            ]
            if (outcome.openQuestions.length > 0) {
                lines.push('', 'Open questions:')
                for (const question of outcome.openQuestions) lines.push(`  • ${question}`)
            }
            return lines.join('\n')
        }
        case 'ambiguous': {
            const lines = [`${colors.warn('⚠')} Multiple matches found (${outcome.matches.length}):`]
            outcome.matches.forEach((match, i) => lines.push(`  ${i + 1}. ${match}`))
            lines.push('', 'Please be more specific')
            return lines.join('\n')
        }
    }
}

export function formatField(field: StateField, entries: readonly string[]): string {
    const lines = [`${colors.bold(field)} ${colors.dim(`(${entries.length})`)}`]
    if (entries.length === 0) {
        lines.push(colors.dim('  (none)'))
    }
    for (const entry of entries) lines.push(`  • ${entry}`)
    return lines.join('\n')
}

export function formatDocument(document: StateDocument, fields: readonly StateField[]): string {
    const sections = fields.map((field) => formatField(field, document[field]))
    if (document.subsystem_name) {
        sections.unshift(`${colors.bold('Subsystem:')} ${document.subsystem_name}`)
    }
    return sections.join('\n\n')
}
