import type { Container } from '../../core/container.js'
import { EXIT_FAILURE, EXIT_OK, EXIT_UNRESOLVED, type CliIO, writeLine } from '../io.js'
import { formatResolveOutcome, formatStatelogError } from '../ui.js'

export async function resolveCommand(
    container: Container,
    io: CliIO,
    partial: string,
    decision: string,
    subsystem?: string
): Promise<number> {
    const result = await container.router.resolve(partial, decision, subsystem)
    if (!result.ok) {
        writeLine(io.stderr, formatStatelogError(result.error))
        return EXIT_FAILURE
    }
    writeLine(io.stdout, formatResolveOutcome(result.value))
    return result.value.status === 'resolved' ? EXIT_OK : EXIT_UNRESOLVED
}
