import type { Container } from '../../core/container.js'
import { EXIT_FAILURE, EXIT_OK, type CliIO, writeLine } from '../io.js'
import { formatRecorded, formatStatelogError } from '../ui.js'

export async function recordCommand(
    container: Container,
    io: CliIO,
    kind: string,
    text: string,
    subsystem?: string
): Promise<number> {
    const result = await container.router.record(kind, text, subsystem)
    if (!result.ok) {
        writeLine(io.stderr, formatStatelogError(result.error))
        return EXIT_FAILURE
    }
    writeLine(io.stdout, formatRecorded(result.value))
    return EXIT_OK
}
