import type { ResolvedConfig } from './schema.js'

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'projectDir' | 'stateDir'> = {
    defaultFile: 'project.json',
    subsystemSuffix: '-state.json',
    logLevel: 'warn',
}

export const LOCAL_CONFIG_FILE = '.statelog.json'

export const ENV_STATE_DIR = 'STATELOG_DIR'
export const ENV_LOG_LEVEL = 'STATELOG_LOG_LEVEL'
