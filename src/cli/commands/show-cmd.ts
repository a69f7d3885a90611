import type { Container } from '../../core/container.js'
import { STATE_FIELDS, type StateField } from '../../state/types.js'
import { EXIT_FAILURE, EXIT_OK, type CliIO, writeLine } from '../io.js'
import { formatDocument, formatStatelogError } from '../ui.js'

export async function showCommand(
    container: Container,
    io: CliIO,
    field?: StateField,
    subsystem?: string
): Promise<number> {
    const result = await container.router.show(subsystem)
    if (!result.ok) {
        writeLine(io.stderr, formatStatelogError(result.error))
        return EXIT_FAILURE
    }
    writeLine(io.stdout, formatDocument(result.value, field ? [field] : STATE_FIELDS))
    return EXIT_OK
}
