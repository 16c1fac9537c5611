import { Inject, Injectable } from '@nestjs/common'
import { mkdir, readdir, readFile, rm, writeFile } from 'fs/promises'
import path from 'path'
import type { z } from 'zod'
import { LoggerService } from './logger.service'

export const DATA_DIR = Symbol('DATA_DIR')

export type RecordCollection = 'candidates' | 'jobs'

const COLLECTION_DIRS: Record<RecordCollection, string> = {
  candidates: path.join('processed', 'parsed'),
  jobs: path.join('processed', 'jobs_parsed'),
}

const RECORD_ID_PATTERN = /^[a-z0-9_]+$/

export class InvalidRecordError extends Error {
  constructor(collection: RecordCollection, id: string) {
    super(`Stored ${collection} record "${id}" does not match its schema`)
    this.name = 'InvalidRecordError'
  }
}

// fs errors are not always `instanceof Error` (Jest runs tests in a separate realm)
function isMissingFileError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'
}

/**
 * JsonStoreService
 *
 * Purpose: Persist canonical records as pretty-printed JSON, one file per record id:
 * - candidates → <DATA_DIR>/processed/parsed/<id>.json
 * - jobs       → <DATA_DIR>/processed/jobs_parsed/<id>.json
 *
 * Records are validated against their schema on the way out. Ids outside
 * [a-z0-9_] never reach the filesystem.
 */
@Injectable()
export class JsonStoreService {
  constructor(
    @Inject(DATA_DIR) private readonly dataDir: string,
    private readonly logger: LoggerService,
  ) {}

  directoryOf(collection: RecordCollection): string {
    return path.resolve(this.dataDir, COLLECTION_DIRS[collection])
  }

  async save(collection: RecordCollection, id: string, record: unknown): Promise<void> {
    const filePath = this.pathOf(collection, id)
    if (!filePath) {
      throw new Error(`Invalid record id "${id}"`)
    }

    await mkdir(this.directoryOf(collection), { recursive: true })
    await writeFile(filePath, `${JSON.stringify(record, null, 2)}\n`, 'utf-8')
  }

  async read<T>(collection: RecordCollection, id: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    const filePath = this.pathOf(collection, id)
    if (!filePath) return null

    let content: string
    try {
      content = await readFile(filePath, 'utf-8')
    } catch (error) {
      if (isMissingFileError(error)) return null
      throw error
    }

    const parsed = schema.safeParse(JSON.parse(content))
    if (!parsed.success) {
      throw new InvalidRecordError(collection, id)
    }
    return parsed.data
  }

  /**
   * Every valid record of the collection, ordered by id. Unreadable records are skipped with a warning.
   */
  async list<T>(collection: RecordCollection, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T[]> {
    let fileNames: string[]
    try {
      fileNames = await readdir(this.directoryOf(collection))
    } catch (error) {
      if (isMissingFileError(error)) return []
      throw error
    }

    const records: T[] = []
    for (const fileName of fileNames.filter((name) => name.endsWith('.json')).sort()) {
      const id = fileName.slice(0, -'.json'.length)
      try {
        const record = await this.read(collection, id, schema)
        if (record !== null) records.push(record)
      } catch (error) {
        this.logger.logWarning('Skipping unreadable record', {
          service: 'JsonStoreService',
          collection,
          id,
          reason: error instanceof Error ? error.message : String(error),
        })
      }
    }
    return records
  }

  async delete(collection: RecordCollection, id: string): Promise<boolean> {
    const filePath = this.pathOf(collection, id)
    if (!filePath) return false

    try {
      await rm(filePath)
      return true
    } catch (error) {
      if (isMissingFileError(error)) return false
      throw error
    }
  }

  private pathOf(collection: RecordCollection, id: string): string | null {
    if (!RECORD_ID_PATTERN.test(id)) return null
    return path.join(this.directoryOf(collection), `${id}.json`)
  }
}
