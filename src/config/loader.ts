import path from 'node:path'
import { InvalidConfigError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { DEFAULT_CONFIG, ENV_LOG_LEVEL, ENV_STATE_DIR, LOCAL_CONFIG_FILE } from './defaults.js'
import { type Config, ConfigSchema, LogLevelSchema, type ResolvedConfig } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: Partial<Config>
    projectDir?: string
    env?: NodeJS.ProcessEnv
}

async function loadJsonConfig(fs: FileSystem, filePath: string): Promise<Config> {
    if (!(await fs.exists(filePath))) return {}

    let raw: unknown
    try {
        raw = await fs.readJSON<unknown>(filePath)
    } catch (error) {
        throw new InvalidConfigError(filePath, { cause: error })
    }

    const parsed = ConfigSchema.safeParse(raw)
    if (!parsed.success) {
        throw new InvalidConfigError(filePath, { cause: parsed.error })
    }
    return parsed.data
}

function configFromEnv(env: NodeJS.ProcessEnv): Config {
    const envConfig: Config = {}
    const stateDir = env[ENV_STATE_DIR]
    if (stateDir) envConfig.stateDir = stateDir
    const level = LogLevelSchema.safeParse(env[ENV_LOG_LEVEL])
    if (level.success) envConfig.logLevel = level.data
    return envConfig
}

function mergeConfigs(...configs: Config[]): Config {
    const merged: Config = {}
    for (const cfg of configs) {
        if (cfg.stateDir !== undefined) merged.stateDir = cfg.stateDir
        if (cfg.defaultFile !== undefined) merged.defaultFile = cfg.defaultFile
        if (cfg.subsystemSuffix !== undefined) merged.subsystemSuffix = cfg.subsystemSuffix
        if (cfg.logLevel !== undefined) merged.logLevel = cfg.logLevel
    }
    return merged
}

/**
 * Resolves settings for one invocation.
 *
 * Priority: CLI flags > env vars > local config file > defaults. A relative
 * `stateDir` is taken relative to `projectDir`.
 *
 * @throws {InvalidConfigError} when the local config file exists but cannot be parsed
 */
export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, cliFlags = {}, projectDir = process.cwd(), env = process.env } = options

    const localConfig = await loadJsonConfig(fs, path.join(projectDir, LOCAL_CONFIG_FILE))
    const merged = mergeConfigs(localConfig, configFromEnv(env), cliFlags)

    return {
        projectDir,
        defaultFile: merged.defaultFile ?? DEFAULT_CONFIG.defaultFile,
        subsystemSuffix: merged.subsystemSuffix ?? DEFAULT_CONFIG.subsystemSuffix,
        logLevel: merged.logLevel ?? DEFAULT_CONFIG.logLevel,
        stateDir: path.resolve(projectDir, merged.stateDir ?? '.'),
    }
}
