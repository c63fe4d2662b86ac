import { mkdir, readFile, unlink, writeFile } from 'fs/promises'
import path from 'path'
import { v4 as uuid } from 'uuid'

const KEY_PATTERN = /^[0-9a-f-]{36}\.[A-Za-z0-9]+$/

export function isValidKey(key: string): boolean {
  return KEY_PATTERN.test(key)
}

export function extensionOf(filename: string): string {
  const ext = path.extname(filename).slice(1)
  return /^[A-Za-z0-9]+$/.test(ext) ? ext.toLowerCase() : 'bin'
}

/** Uploaded files on local disk, addressed by generated `<uuid>.<ext>` keys */
export class FileStorage {
  constructor(private readonly dir: string) {}

  resolve(key: string): string {
    if (!isValidKey(key)) {
      throw new Error(`Invalid storage key: ${key}`)
    }
    return path.join(this.dir, key)
  }

  async save(content: Uint8Array, originalFilename: string): Promise<string> {
    await mkdir(this.dir, { recursive: true })
    const key = `${uuid()}.${extensionOf(originalFilename)}`
    await writeFile(this.resolve(key), content)
    return key
  }

  async read(key: string): Promise<Buffer | null> {
    try {
      return await readFile(this.resolve(key))
    } catch (err) {
      if (isNotFound(err)) return null
      throw err
    }
  }

  async remove(key: string): Promise<boolean> {
    try {
      await unlink(this.resolve(key))
      return true
    } catch (err) {
      if (isNotFound(err)) return false
      throw err
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}
