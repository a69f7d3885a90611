export const EXIT_OK = 0
export const EXIT_FAILURE = 1
/** `resolve` changed nothing: no match, or more than one. */
export const EXIT_UNRESOLVED = 2

export interface CliIO {
    stdout(text: string): void
    stderr(text: string): void
}

export const processIO: CliIO = {
    stdout: (text) => {
        process.stdout.write(text)
    },
    stderr: (text) => {
        process.stderr.write(text)
    },
}

export function writeLine(write: (text: string) => void, text: string): void {
    write(`${text}\n`)
}
