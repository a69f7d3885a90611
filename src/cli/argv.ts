const OPTIONS_WITH_VALUE = new Set(['-s', '--subsystem', '-d', '--dir'])

export interface SuffixedName {
    name: string
    subsystem?: string
}

/**
 * Splits `decided:tracking` into the name and its subsystem. An empty suffix
 * (`decided:`) means no subsystem.
 */
export function splitSubsystemSuffix(token: string): SuffixedName {
    const index = token.indexOf(':')
    if (index === -1) return { name: token }
    const subsystem = token.slice(index + 1)
    return subsystem ? { name: token.slice(0, index), subsystem } : { name: token.slice(0, index) }
}

export interface NormalizedArgs {
    args: string[]
    /** Subsystem given as a suffix on the command; wins over `--subsystem`. */
    subsystem?: string
}

/** Strips a `:<subsystem>` suffix from the command word so commander can match it. */
export function normalizeArgs(args: readonly string[]): NormalizedArgs {
    for (let i = 0; i < args.length; i++) {
        const token = args[i]
        if (token === '--') break
        if (token.startsWith('-')) {
            if (OPTIONS_WITH_VALUE.has(token)) i++
            continue
        }

        const { name, subsystem } = splitSubsystemSuffix(token)
        const normalized = [...args]
        normalized[i] = name
        return { args: normalized, subsystem }
    }
    return { args: [...args] }
}
