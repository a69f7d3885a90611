export type ErrorCode = 'malformed_state' | 'io_failure' | 'unknown_kind' | 'invalid_subsystem' | 'invalid_config'

export class StatelogError extends Error {
    readonly code: ErrorCode

    constructor(message: string, code: ErrorCode, options?: ErrorOptions) {
        super(message, options)
        this.name = 'StatelogError'
        this.code = code
    }
}

export class MalformedStateError extends StatelogError {
    readonly path: string

    constructor(path: string, problem: string, options?: ErrorOptions) {
        super(`State file ${path} ${problem}`, 'malformed_state', options)
        this.name = 'MalformedStateError'
        this.path = path
    }
}

export type IOOperation = 'read' | 'write'

export class IOFailureError extends StatelogError {
    readonly path: string
    readonly operation: IOOperation

    constructor(path: string, operation: IOOperation, options?: ErrorOptions) {
        super(`Could not ${operation} ${operation === 'read' ? 'from' : 'to'} ${path}`, 'io_failure', options)
        this.name = 'IOFailureError'
        this.path = path
        this.operation = operation
    }
}

export class UnknownKindError extends StatelogError {
    readonly kind: string
    readonly validKinds: readonly string[]

    constructor(kind: string, validKinds: readonly string[]) {
        super(`Unknown command '${kind}'. Valid commands: ${validKinds.join(', ')}`, 'unknown_kind')
        this.name = 'UnknownKindError'
        this.kind = kind
        this.validKinds = validKinds
    }
}

export class InvalidSubsystemError extends StatelogError {
    readonly subsystem: string

    constructor(subsystem: string) {
        super(
            `Invalid subsystem name '${subsystem}': use letters, digits, '.', '_' or '-', starting with a letter or digit`,
            'invalid_subsystem'
        )
        this.name = 'InvalidSubsystemError'
        this.subsystem = subsystem
    }
}

export class InvalidConfigError extends StatelogError {
    readonly path: string

    constructor(path: string, options?: ErrorOptions) {
        super(`Config file ${path} is invalid`, 'invalid_config', options)
        this.name = 'InvalidConfigError'
        this.path = path
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

/** Message of the error's cause, when it has one. */
export function causeMessage(error: Error): string | null {
    if (error.cause === undefined) return null
    return errorMessage(error.cause)
}
