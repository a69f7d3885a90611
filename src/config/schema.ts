import { z } from 'zod'

export const LogLevelSchema = z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])

export type LogLevel = z.infer<typeof LogLevelSchema>

const FileNameSchema = z
    .string()
    .min(1)
    .refine((name) => !/[\\/]/.test(name), { message: 'Must be a file name, not a path' })

export const ConfigSchema = z
    .object({
        stateDir: z.string().min(1).optional(),
        defaultFile: FileNameSchema.optional(),
        subsystemSuffix: FileNameSchema.optional(),
        logLevel: LogLevelSchema.optional(),
    })
    .strict()

export type Config = z.infer<typeof ConfigSchema>

export interface ResolvedConfig {
    projectDir: string
    /** Absolute directory holding every state file. */
    stateDir: string
    defaultFile: string
    subsystemSuffix: string
    logLevel: LogLevel
}
