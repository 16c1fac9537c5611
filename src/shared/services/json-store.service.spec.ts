import { mkdtemp, readFile, rm, writeFile } from 'fs/promises'
import os from 'os'
import path from 'path'
import { z } from 'zod'
import { InvalidRecordError, JsonStoreService } from './json-store.service'
import { LoggerService } from './logger.service'

const RecordSchema = z.object({ id: z.string(), score: z.number() })

describe('JsonStoreService', () => {
  let dataDir: string
  let store: JsonStoreService

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(os.tmpdir(), 'json-store-'))
    store = new JsonStoreService(dataDir, new LoggerService())
  })

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true })
  })

  it('writes candidates under processed/parsed as pretty JSON', async () => {
    await store.save('candidates', 'cv_alice', { id: 'cv_alice', score: 1 })

    const content = await readFile(path.join(dataDir, 'processed', 'parsed', 'cv_alice.json'), 'utf-8')
    expect(content).toBe('{\n  "id": "cv_alice",\n  "score": 1\n}\n')
  })

  it('writes jobs under processed/jobs_parsed', async () => {
    await store.save('jobs', 'data_scientist', { id: 'data_scientist', score: 2 })

    expect(store.directoryOf('jobs')).toBe(path.join(dataDir, 'processed', 'jobs_parsed'))
    await expect(store.read('jobs', 'data_scientist', RecordSchema)).resolves.toEqual({
      id: 'data_scientist',
      score: 2,
    })
  })

  it('refuses ids outside [a-z0-9_]', async () => {
    await expect(store.save('candidates', '../escape', { id: 'x', score: 0 })).rejects.toThrow(
      'Invalid record id "../escape"',
    )
    await expect(store.read('candidates', '../escape', RecordSchema)).resolves.toBeNull()
  })

  it('returns null for a missing record', async () => {
    await expect(store.read('candidates', 'nobody', RecordSchema)).resolves.toBeNull()
  })

  it('throws on a stored record that does not match the schema', async () => {
    await store.save('candidates', 'broken', { id: 'broken', score: 'high' })

    await expect(store.read('candidates', 'broken', RecordSchema)).rejects.toBeInstanceOf(InvalidRecordError)
  })

  it('lists valid records ordered by id and skips the rest', async () => {
    await store.save('candidates', 'cv_bob', { id: 'cv_bob', score: 2 })
    await store.save('candidates', 'cv_alice', { id: 'cv_alice', score: 1 })
    await store.save('candidates', 'broken', { id: 'broken', score: 'high' })
    await writeFile(path.join(store.directoryOf('candidates'), 'notes.txt'), 'ignored', 'utf-8')

    await expect(store.list('candidates', RecordSchema)).resolves.toEqual([
      { id: 'cv_alice', score: 1 },
      { id: 'cv_bob', score: 2 },
    ])
  })

  it('lists nothing when the collection directory does not exist', async () => {
    await expect(store.list('jobs', RecordSchema)).resolves.toEqual([])
  })

  it('deletes a record once', async () => {
    await store.save('jobs', 'data_scientist', { id: 'data_scientist', score: 2 })

    await expect(store.delete('jobs', 'data_scientist')).resolves.toBe(true)
    await expect(store.delete('jobs', 'data_scientist')).resolves.toBe(false)
  })
})
