import fs from 'fs'
import os from 'os'
import path from 'path'
import { loadConfig } from '@/lib/config'
import type { RequestContext } from '@/lib/context'
import { FileStorage } from '@/lib/storage'
import { FileStore } from '@/lib/store'

export function readFixture(name: string): Buffer {
  return fs.readFileSync(path.join(__dirname, '..', 'fixtures', name))
}

export function makeTempDir(prefix = 'csv-chat-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix))
}

/** A request context backed by an in-memory database and a temporary uploads directory */
export function makeContext(userId = 'user-1', env: Record<string, string | undefined> = {}): RequestContext {
  const dir = makeTempDir()
  const config = loadConfig(
    { ANTHROPIC_API_KEY: 'test-key', DATABASE_PATH: ':memory:', UPLOADS_DIR: dir, ...env },
    dir
  )
  return {
    config,
    store: new FileStore(config.databasePath),
    storage: new FileStorage(config.uploadsDir),
    userId,
  }
}
