import { Argument, Command, CommanderError } from 'commander'
import { loadConfig } from '../config/loader.js'
import { createContainer, type Container } from '../core/container.js'
import { StatelogError } from '../core/errors.js'
import { NodeFileSystem, type FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'
import { ENTRY_KINDS, type EntryKind, isStateField, STATE_FIELDS } from '../state/types.js'
import { normalizeArgs, splitSubsystemSuffix } from './argv.js'
import { recordCommand } from './commands/record-cmd.js'
import { resolveCommand } from './commands/resolve-cmd.js'
import { showCommand } from './commands/show-cmd.js'
import { type CliIO, EXIT_FAILURE, EXIT_OK, processIO, writeLine } from './io.js'
import { formatError, formatStatelogError } from './ui.js'

export const VERSION = '0.1.0'

const KIND_DESCRIPTIONS: Record<EntryKind, string> = {
    decided: 'Record a decision made (with its reasoning)',
    built: 'Record completed work (name files or features so it stays searchable)',
    question: 'Record an open question that still needs a decision',
    file: 'Record an important entry-point file and its purpose',
    context: 'Record background information or a constraint',
}

const EXAMPLES = `
Subsystems:
  statelog decided:tracking "..."            suffix form
  statelog --subsystem tracking decided "..."
  Each subsystem lives in its own <name>-state.json next to project.json.

Examples:
  statelog decided "Use SQLite for the cache - no server to run"
  statelog built "exporter.ts (writes the weekly report)"
  statelog question "Should we cache rendered pages?"
  statelog file "src/server.ts - main entry point"
  statelog context "Deploys go through the staging branch"
  statelog resolve "cache" "Cache by URL, invalidate on deploy"
  statelog show open_questions`

type GlobalOptions = {
    subsystem?: string
    dir?: string
    debug?: boolean
}

export interface CliOptions {
    cwd?: string
    env?: NodeJS.ProcessEnv
    io?: CliIO
    fs?: FileSystem
    logger?: Logger
    now?: () => Date
}

interface ProgramContext {
    io: CliIO
    fs: FileSystem
    cwd: string
    env: NodeJS.ProcessEnv
    logger?: Logger
    now?: () => Date
    /** Subsystem taken from a `command:<subsystem>` suffix. */
    suffixSubsystem?: string
    setExitCode(code: number): void
}

type CommandRunner = (container: Container, subsystem: string | undefined) => Promise<number>

async function runWithContainer(ctx: ProgramContext, command: Command, run: CommandRunner): Promise<void> {
    const options = command.optsWithGlobals<GlobalOptions>()

    let container: Container
    try {
        const config = await loadConfig({
            fs: ctx.fs,
            projectDir: ctx.cwd,
            env: ctx.env,
            cliFlags: {
                stateDir: options.dir,
                logLevel: options.debug ? 'debug' : undefined,
            },
        })
        container = createContainer(config, { fs: ctx.fs, logger: ctx.logger, now: ctx.now })
    } catch (error) {
        if (!(error instanceof StatelogError)) throw error
        writeLine(ctx.io.stderr, formatStatelogError(error))
        ctx.setExitCode(EXIT_FAILURE)
        return
    }

    ctx.setExitCode(await run(container, ctx.suffixSubsystem ?? options.subsystem))
}

function createProgram(ctx: ProgramContext): Command {
    const program = new Command()

    program
        .name('statelog')
        .description('Dated log of project decisions, work, open questions and context')
        .usage('[options] <command> [args...]')
        .version(VERSION)
        .exitOverride()
        .configureOutput({
            writeOut: (text) => ctx.io.stdout(text),
            writeErr: (text) => ctx.io.stderr(text),
        })
        .showHelpAfterError()
        .option('-s, --subsystem <name>', 'Subsystem whose state file to use')
        .option('-d, --dir <path>', 'Directory holding the state files')
        .option('--debug', 'Enable debug logging')
        .addHelpText('after', EXAMPLES)

    for (const kind of ENTRY_KINDS) {
        program
            .command(`${kind} <text>`)
            .description(KIND_DESCRIPTIONS[kind])
            .action((text: string, _options: unknown, command: Command) =>
                runWithContainer(ctx, command, (container, subsystem) =>
                    recordCommand(container, ctx.io, kind, text, subsystem)
                )
            )
    }

    program
        .command('record <kind> <text>')
        .description(`Record an entry of the given kind (${ENTRY_KINDS.join(', ')})`)
        .action((kindToken: string, text: string, _options: unknown, command: Command) => {
            const { name: kind, subsystem: kindSubsystem } = splitSubsystemSuffix(kindToken)
            return runWithContainer(ctx, command, (container, subsystem) =>
                recordCommand(container, ctx.io, kind, text, kindSubsystem ?? subsystem)
            )
        })

    program
        .command('resolve <partial> <decision>')
        .description('Move the one open question containing <partial> to resolved')
        .action((partial: string, decision: string, _options: unknown, command: Command) =>
            runWithContainer(ctx, command, (container, subsystem) =>
                resolveCommand(container, ctx.io, partial, decision, subsystem)
            )
        )

    program
        .command('show')
        .description('Print the state document, or a single field of it')
        .addArgument(new Argument('[field]', 'field to print').choices(STATE_FIELDS))
        .action((field: string | undefined, _options: unknown, command: Command) =>
            runWithContainer(ctx, command, (container, subsystem) =>
                showCommand(container, ctx.io, field !== undefined && isStateField(field) ? field : undefined, subsystem)
            )
        )

    // Anything else is an entry kind the router does not know; it reports the valid ones.
    program
        .argument('[command]')
        .argument('[args...]')
        .action((name: string | undefined, args: string[], _options: unknown, command: Command) => {
            if (name === undefined || args.length === 0) {
                if (name !== undefined) writeLine(ctx.io.stderr, formatError(`Missing text for '${name}'`))
                ctx.io.stderr(program.helpInformation())
                ctx.setExitCode(EXIT_FAILURE)
                return
            }
            return runWithContainer(ctx, command, (container, subsystem) =>
                recordCommand(container, ctx.io, name, args[0], subsystem)
            )
        })

    return program
}

/**
 * Runs one invocation and resolves to its exit code. Nothing here calls
 * `process.exit`; the entry point sets the code.
 */
export async function runCli(args: readonly string[], options: CliOptions = {}): Promise<number> {
    const normalized = normalizeArgs(args)
    const io = options.io ?? processIO
    let exitCode = EXIT_OK

    const program = createProgram({
        io,
        fs: options.fs ?? new NodeFileSystem(),
        cwd: options.cwd ?? process.cwd(),
        env: options.env ?? process.env,
        logger: options.logger,
        now: options.now,
        suffixSubsystem: normalized.subsystem,
        setExitCode: (code) => {
            exitCode = code
        },
    })

    if (args.length === 0) {
        io.stderr(program.helpInformation())
        return EXIT_FAILURE
    }

    try {
        await program.parseAsync(normalized.args, { from: 'user' })
    } catch (error) {
        if (error instanceof CommanderError) return error.exitCode
        throw error
    }
    return exitCode
}
