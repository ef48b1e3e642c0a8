import { createHash } from 'node:crypto'
import { mkdir, open, readFile, readdir, rename, rm, stat } from 'node:fs/promises'
import { join } from 'node:path'
import { z } from 'zod'
import { CacheIOError, errorMessage } from './errors.js'
import type { RegistrySource } from './pattern-registry.js'
import type { CacheEntry, CacheRecord, CodeRequest, PutOutcome } from './types.js'

const FORMAT_VERSION = 1
const FINGERPRINT_PATTERN = /^[a-f0-9]{64}$/

const violationSchema = z.object({
  rule_id: z.string(),
  start: z.number(),
  end: z.number(),
  line: z.number(),
  column: z.number(),
  weight: z.number(),
  severity: z.enum(['low', 'medium', 'high', 'critical']),
  snippet: z.string(),
})

const cacheRecordSchema = z.object({
  format_version: z.literal(FORMAT_VERSION),
  entry: z.object({
    fingerprint: z.string().regex(FINGERPRINT_PATTERN),
    registry_version: z.number().int(),
    mode: z.enum(['generate', 'refactor']),
    model: z.string(),
    code: z.string(),
    result: z.object({
      score: z.number(),
      // Only accepted verdicts are ever cached
      verdict: z.enum(['accept', 'accept_with_warnings']),
      violations: z.array(violationSchema),
      syntax_valid: z.boolean(),
      reasons: z.array(z.string()),
      complexity: z.object({
        lines: z.number(),
        max_depth: z.number(),
        branches: z.number(),
      }),
    }),
    created_at: z.string(),
    pinned: z.boolean(),
  }),
})

interface ResponseCacheOptions {
  dir: string
  registry: RegistrySource
  ttlHours?: number // 0 or absent: entries never expire
  now?: () => Date
  warn?: (message: string) => void
}

export interface CacheStatus {
  entries: number
  stale: number
  pinned: number
  sizeBytes: number
}

/**
 * ResponseCache persists accepted results, one JSON record per fingerprint.
 *
 * Reads never throw: a missing, corrupt, unreadable, stale or expired record is
 * a miss. Pinned records never expire. Writes are durable before `put` resolves and are serialized per
 * fingerprint. Records from older registry versions stay on disk.
 */
export class ResponseCache {
  private readonly dir: string
  private readonly registry: RegistrySource
  private readonly ttlMs: number
  private readonly now: () => Date
  private readonly warn: (message: string) => void
  private readonly writeChains = new Map<string, Promise<unknown>>()

  constructor(options: ResponseCacheOptions) {
    this.dir = options.dir
    this.registry = options.registry
    this.ttlMs = (options.ttlHours ?? 0) * 60 * 60 * 1000
    this.now = options.now ?? (() => new Date())
    this.warn = options.warn ?? console.warn
  }

  /**
   * Fingerprint over registry version, mode and the lower-cased trimmed prompt.
   */
  static fingerprint(request: Pick<CodeRequest, 'prompt' | 'mode'>, registryVersion: number): string {
    const normalized = request.prompt.trim().toLowerCase()
    return createHash('sha256')
      .update(`${registryVersion}\u0000${request.mode}\u0000${normalized}`, 'utf-8')
      .digest('hex')
  }

  async get(fingerprint: string): Promise<CacheEntry | null> {
    const record = await this.readRecord(fingerprint)
    if (!record) {
      return null
    }

    const { entry } = record
    if (entry.registry_version !== this.registry.current().version) {
      return null
    }

    // Pinned entries never expire
    if (this.ttlMs > 0 && !entry.pinned) {
      const age = this.now().getTime() - Date.parse(entry.created_at)
      if (Number.isNaN(age) || age > this.ttlMs) {
        return null
      }
    }

    return entry
  }

  /**
   * Store an entry. Resolves only after the record is flushed to disk.
   * A pinned record already on disk is left as it is.
   */
  put(fingerprint: string, entry: CacheEntry): Promise<PutOutcome> {
    return this.serialize(fingerprint, async () => {
      const existing = await this.readRecord(fingerprint)
      if (existing?.entry.pinned) {
        return 'pinned'
      }
      await this.writeRecord(fingerprint, { format_version: FORMAT_VERSION, entry })
      return 'written'
    })
  }

  /**
   * Mark an entry so that later `put` calls do not overwrite it.
   * Returns false when there is no record for the fingerprint.
   */
  pin(fingerprint: string): Promise<boolean> {
    return this.serialize(fingerprint, async () => {
      const existing = await this.readRecord(fingerprint)
      if (!existing) {
        return false
      }
      await this.writeRecord(fingerprint, {
        format_version: FORMAT_VERSION,
        entry: { ...existing.entry, pinned: true },
      })
      return true
    })
  }

  /**
   * Wait for every write issued so far.
   */
  async flush(): Promise<void> {
    await Promise.allSettled([...this.writeChains.values()])
  }

  async status(): Promise<CacheStatus> {
    const current = this.registry.current().version
    const status: CacheStatus = { entries: 0, stale: 0, pinned: 0, sizeBytes: 0 }

    for (const fingerprint of await this.listFingerprints()) {
      const record = await this.readRecord(fingerprint)
      if (!record) continue

      status.entries++
      if (record.entry.registry_version !== current) status.stale++
      if (record.entry.pinned) status.pinned++
      try {
        status.sizeBytes += (await stat(this.recordPath(fingerprint))).size
      } catch {
        // Removed between listing and stat
      }
    }

    return status
  }

  /**
   * Delete the cache directory.
   */
  async clear(): Promise<void> {
    await this.flush()
    await rm(this.dir, { recursive: true, force: true })
  }

  private serialize<T>(fingerprint: string, task: () => Promise<T>): Promise<T> {
    if (!FINGERPRINT_PATTERN.test(fingerprint)) {
      return Promise.reject(new CacheIOError(`Invalid fingerprint "${fingerprint}"`))
    }

    const previous = this.writeChains.get(fingerprint) ?? Promise.resolve()
    const run = previous.then(task, task)
    const settled = run.then(
      () => undefined,
      () => undefined,
    )
    this.writeChains.set(fingerprint, settled)
    void settled.then(() => {
      if (this.writeChains.get(fingerprint) === settled) {
        this.writeChains.delete(fingerprint)
      }
    })
    return run
  }

  private async readRecord(fingerprint: string): Promise<CacheRecord | null> {
    if (!FINGERPRINT_PATTERN.test(fingerprint)) {
      return null
    }

    let content: string
    try {
      content = await readFile(this.recordPath(fingerprint), 'utf-8')
    } catch (error) {
      // A missing record is an ordinary miss
      if (error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT') {
        return null
      }
      this.warn(`Warning: Failed to read cache record ${fingerprint}: ${errorMessage(error)}`)
      return null
    }

    let data: unknown
    try {
      data = JSON.parse(content)
    } catch {
      this.warn(`Warning: Cache record ${fingerprint} is invalid JSON. Ignoring it.`)
      return null
    }

    const parsed = cacheRecordSchema.safeParse(data)
    if (!parsed.success) {
      this.warn(`Warning: Cache record ${fingerprint} has an unknown layout. Ignoring it.`)
      return null
    }
    if (parsed.data.entry.fingerprint !== fingerprint) {
      this.warn(`Warning: Cache record ${fingerprint} belongs to another fingerprint. Ignoring it.`)
      return null
    }

    return parsed.data
  }

  private async writeRecord(fingerprint: string, record: CacheRecord): Promise<void> {
    const target = this.recordPath(fingerprint)
    const temp = `${target}.${process.pid}.${Date.now()}.tmp`

    try {
      await mkdir(this.dir, { recursive: true })
      const handle = await open(temp, 'w')
      try {
        await handle.writeFile(JSON.stringify(record, null, 2), 'utf-8')
        await handle.sync()
      } finally {
        await handle.close()
      }
      await rename(temp, target)
      // Persist the rename itself
      const dirHandle = await open(this.dir, 'r')
      try {
        await dirHandle.sync()
      } finally {
        await dirHandle.close()
      }
    } catch (error) {
      await rm(temp, { force: true }).catch(() => undefined)
      throw new CacheIOError(`Failed to write cache record ${fingerprint}: ${errorMessage(error)}`, {
        cause: error,
      })
    }
  }

  private async listFingerprints(): Promise<string[]> {
    let names: string[]
    try {
      names = await readdir(this.dir)
    } catch {
      // Directory doesn't exist yet
      return []
    }
    return names
      .filter((name) => name.endsWith('.json'))
      .map((name) => name.slice(0, -'.json'.length))
      .filter((name) => FINGERPRINT_PATTERN.test(name))
  }

  private recordPath(fingerprint: string): string {
    return join(this.dir, `${fingerprint}.json`)
  }
}
