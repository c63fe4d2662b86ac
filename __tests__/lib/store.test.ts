import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { v4 as uuid } from 'uuid'
import { analyze } from '@/lib/analyzer'
import { tableFromColumns } from '@/lib/csv'
import { FileStore, type NewFile } from '@/lib/store'
import type { AnalysisResult } from '@/lib/types'

let store: FileStore

function analysisOf(data: Record<string, Array<string | number | null>>): AnalysisResult {
  const outcome = analyze(tableFromColumns(data), { filename: 'data.csv' })
  if (!outcome.ok) throw outcome.error
  return outcome.result
}

function newFile(overrides: Partial<NewFile> = {}): NewFile {
  const analysis = analysisOf({ x: [1, 2, 3], c: ['a', 'b', 'a'] })
  return {
    userId: 'user-1',
    filename: 'data.csv',
    storageKey: `${uuid()}.csv`,
    fileType: 'csv',
    size: 42,
    totalRows: analysis.totalRows,
    totalColumns: analysis.totalColumns,
    numericColumns: analysis.numericColumns,
    categoricalColumns: analysis.categoricalColumns,
    analysis,
    ...overrides,
  }
}

beforeEach(() => {
  store = new FileStore(':memory:')
})

afterEach(() => {
  store.close()
})

describe('FileStore', () => {
  it('should save and retrieve a file with its analysis', () => {
    const input = newFile()
    const saved = store.saveFile(input)

    expect(saved.id).toBeDefined()
    expect(saved.uploadedAt).toBeDefined()

    const loaded = store.getFile(saved.id)
    expect(loaded).toEqual(saved)
    expect(loaded?.numericColumns).toEqual(['x'])
    expect(loaded?.analysis?.totalRows).toBe(3)
  })

  it('should return null for an unknown id', () => {
    expect(store.getFile('missing')).toBeNull()
  })

  it('should store a file without analysis', () => {
    const saved = store.saveFile(newFile({ analysis: null }))
    expect(store.getFile(saved.id)?.analysis).toBeNull()
  })

  it('should list only the owner files, newest first', () => {
    const first = store.saveFile(newFile({ filename: 'first.csv' }))
    const second = store.saveFile(newFile({ filename: 'second.csv' }))
    store.saveFile(newFile({ userId: 'user-2', filename: 'other.csv' }))

    const list = store.listFiles('user-1')
    expect(list.map(f => f.id)).toEqual([second.id, first.id])
    expect(store.listFiles('nobody')).toEqual([])
  })

  it('should replace the analysis and derived columns', () => {
    const saved = store.saveFile(newFile())
    const analysis = analysisOf({ a: [1, 2], b: [3, 4], c: ['x', 'y'] })

    const updated = store.updateAnalysis(saved.id, analysis)
    expect(updated?.analysis).toEqual(analysis)
    expect(updated?.totalColumns).toBe(3)
    expect(updated?.totalRows).toBe(2)
    expect(updated?.numericColumns).toEqual(['a', 'b'])
  })

  it('should delete a file once', () => {
    const saved = store.saveFile(newFile())
    expect(store.deleteFile(saved.id)).toBe(true)
    expect(store.deleteFile(saved.id)).toBe(false)
    expect(store.getFile(saved.id)).toBeNull()
  })
})
