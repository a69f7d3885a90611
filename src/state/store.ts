import path from 'node:path'
import type { ResolvedConfig } from '../config/schema.js'
import { InvalidSubsystemError, IOFailureError, MalformedStateError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { ok, err, type Result } from '../core/result.js'
import type { Logger } from '../logger/index.js'
import { createEmptyDocument, normalizeDocument, serializeDocument } from './document.js'
import type { StateDocument } from './types.js'

const SUBSYSTEM_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/

export type StoreError = MalformedStateError | IOFailureError | InvalidSubsystemError

export type StoreConfig = Pick<ResolvedConfig, 'stateDir' | 'defaultFile' | 'subsystemSuffix'>

/**
 * Reads and writes state documents, one flat file per subsystem.
 *
 * Every mutation is a full load → change → save cycle with no lock held in
 * between; two processes writing the same file concurrently lose one update.
 */
export class StateStore {
    constructor(
        private config: StoreConfig,
        private fs: FileSystem,
        private logger: Logger
    ) {}

    pathFor(subsystem?: string): Result<string, InvalidSubsystemError> {
        if (subsystem === undefined) {
            return ok(path.join(this.config.stateDir, this.config.defaultFile))
        }
        if (!SUBSYSTEM_PATTERN.test(subsystem)) {
            return err(new InvalidSubsystemError(subsystem))
        }
        return ok(path.join(this.config.stateDir, `${subsystem}${this.config.subsystemSuffix}`))
    }

    async load(subsystem?: string): Promise<Result<StateDocument, StoreError>> {
        const resolved = this.pathFor(subsystem)
        if (!resolved.ok) return resolved
        const statePath = resolved.value

        if (!(await this.fs.exists(statePath))) {
            this.logger.debug({ path: statePath }, 'No state file yet, starting empty')
            return ok(createEmptyDocument(subsystem))
        }

        let text: string
        try {
            text = await this.fs.readText(statePath)
        } catch (error) {
            return err(new IOFailureError(statePath, 'read', { cause: error }))
        }

        let raw: unknown
        try {
            raw = JSON.parse(text)
        } catch (error) {
            return err(new MalformedStateError(statePath, 'contains invalid JSON', { cause: error }))
        }

        const normalized = normalizeDocument(raw, subsystem)
        if (!normalized.ok) {
            const problem = normalized.error
            return err(
                new MalformedStateError(statePath, `is not a valid state document (${problem.message})`, {
                    cause: problem.cause,
                })
            )
        }

        if (normalized.value.migrated.length > 0) {
            this.logger.info({ path: statePath, keys: normalized.value.migrated }, 'Migrated legacy keys')
        }
        this.logger.debug({ path: statePath }, 'State loaded')
        return ok(normalized.value.document)
    }

    /** Overwrites the backing file with the whole document. Resolves to the path written. */
    async save(document: StateDocument, subsystem?: string): Promise<Result<string, StoreError>> {
        const resolved = this.pathFor(subsystem)
        if (!resolved.ok) return resolved
        const statePath = resolved.value

        try {
            await this.fs.mkdir(path.dirname(statePath))
            await this.fs.writeText(statePath, serializeDocument(document))
        } catch (error) {
            return err(new IOFailureError(statePath, 'write', { cause: error }))
        }

        this.logger.debug({ path: statePath }, 'State saved')
        return ok(statePath)
    }
}
