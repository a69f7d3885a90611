import type { ResolvedConfig } from '../config/schema.js'
import type { Logger } from '../logger/index.js'
import { createLogger } from '../logger/index.js'
import { EntryRouter } from '../state/router.js'
import { StateStore } from '../state/store.js'
import { NodeFileSystem, type FileSystem } from './fs.js'

/** What the command handlers are given. */
export interface Container {
    router: EntryRouter
}

export interface ContainerOverrides {
    fs?: FileSystem
    logger?: Logger
    now?: () => Date
}

export function createContainer(config: ResolvedConfig, overrides: ContainerOverrides = {}): Container {
    const logger = overrides.logger ?? createLogger(config)
    const fs = overrides.fs ?? new NodeFileSystem()
    const store = new StateStore(config, fs, logger)
    const router = new EntryRouter({ store, logger, now: overrides.now })

    return { router }
}
