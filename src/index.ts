#!/usr/bin/env node
import { runCli } from './cli/program.js'
import { formatError } from './cli/ui.js'
import { errorMessage } from './core/errors.js'

runCli(process.argv.slice(2))
    .then((code) => {
        process.exitCode = code
    })
    .catch((error: unknown) => {
        console.error(formatError(errorMessage(error)))
        process.exitCode = 1
    })
