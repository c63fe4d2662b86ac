import { describe, it, expect, beforeEach } from 'vitest'
import fs from 'fs'
import path from 'path'
import { extensionOf, FileStorage, isValidKey } from '@/lib/storage'
import { makeTempDir } from '../helpers/fixtures'

let dir: string
let storage: FileStorage

beforeEach(() => {
  dir = makeTempDir()
  storage = new FileStorage(path.join(dir, 'uploads'))
})

describe('extensionOf', () => {
  it('should lowercase the extension', () => {
    expect(extensionOf('Sales.CSV')).toBe('csv')
  })

  it('should fall back to bin', () => {
    expect(extensionOf('README')).toBe('bin')
    expect(extensionOf('weird.c$v')).toBe('bin')
  })
})

describe('isValidKey', () => {
  it('should accept generated keys only', () => {
    expect(isValidKey('0b7e9f3a-2c41-4d3e-9a57-1f2e3d4c5b6a.csv')).toBe(true)
    expect(isValidKey('../etc/passwd')).toBe(false)
    expect(isValidKey('0b7e9f3a-2c41-4d3e-9a57-1f2e3d4c5b6a.csv/../x')).toBe(false)
  })
})

describe('FileStorage', () => {
  it('should save and read content under a generated key', async () => {
    const content = new TextEncoder().encode('a,b\n1,2\n')
    const key = await storage.save(content, 'data.csv')

    expect(isValidKey(key)).toBe(true)
    expect(key.endsWith('.csv')).toBe(true)
    expect(fs.existsSync(path.join(dir, 'uploads', key))).toBe(true)

    const read = await storage.read(key)
    expect(read?.toString('utf-8')).toBe('a,b\n1,2\n')
  })

  it('should return null for a missing key', async () => {
    expect(await storage.read('0b7e9f3a-2c41-4d3e-9a57-1f2e3d4c5b6a.csv')).toBeNull()
  })

  it('should remove content once', async () => {
    const key = await storage.save(new Uint8Array([1, 2, 3]), 'x.csv')
    expect(await storage.remove(key)).toBe(true)
    expect(await storage.remove(key)).toBe(false)
    expect(await storage.read(key)).toBeNull()
  })

  it('should refuse keys that could escape the directory', () => {
    expect(() => storage.resolve('../secrets.csv')).toThrow('Invalid storage key: ../secrets.csv')
  })
})
