import Database from 'better-sqlite3'
import fs from 'fs'
import path from 'path'
import { v4 as uuid } from 'uuid'
import type { AnalysisResult, StoredFile } from './types'

interface FileRow {
  id: string
  user_id: string
  filename: string
  storage_key: string
  file_type: string
  size: number
  total_rows: number
  total_columns: number
  numeric_columns: string
  categorical_columns: string
  analysis_json: string | null
  uploaded_at: string
}

export type NewFile = Omit<StoredFile, 'id' | 'uploadedAt'>

export class FileStore {
  private db: Database.Database

  constructor(dbPath: string = 'data/files.db') {
    const dir = path.dirname(dbPath)
    if (dbPath !== ':memory:' && !fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true })
    }
    this.db = new Database(dbPath)
    this.db.pragma('journal_mode = WAL')
    this.migrate()
  }

  private migrate() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS files (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        filename TEXT NOT NULL,
        storage_key TEXT NOT NULL UNIQUE,
        file_type TEXT NOT NULL,
        size INTEGER NOT NULL DEFAULT 0,
        total_rows INTEGER NOT NULL DEFAULT 0,
        total_columns INTEGER NOT NULL DEFAULT 0,
        numeric_columns TEXT NOT NULL DEFAULT '[]',
        categorical_columns TEXT NOT NULL DEFAULT '[]',
        analysis_json TEXT DEFAULT NULL,
        uploaded_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_files_user ON files(user_id);
    `)
  }

  saveFile(file: NewFile): StoredFile {
    const id = uuid()
    const uploadedAt = new Date().toISOString()
    this.db.prepare(
      `INSERT INTO files (id, user_id, filename, storage_key, file_type, size, total_rows, total_columns,
         numeric_columns, categorical_columns, analysis_json, uploaded_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    ).run(
      id, file.userId, file.filename, file.storageKey, file.fileType, file.size,
      file.totalRows, file.totalColumns,
      JSON.stringify(file.numericColumns),
      JSON.stringify(file.categoricalColumns),
      file.analysis ? JSON.stringify(file.analysis) : null,
      uploadedAt
    )
    return { ...file, id, uploadedAt }
  }

  getFile(id: string): StoredFile | null {
    const row = this.db.prepare<[string], FileRow>('SELECT * FROM files WHERE id = ?').get(id)
    return row ? parseFileRow(row) : null
  }

  listFiles(userId: string): StoredFile[] {
    const rows = this.db.prepare<[string], FileRow>(
      'SELECT * FROM files WHERE user_id = ? ORDER BY uploaded_at DESC, rowid DESC'
    ).all(userId)
    return rows.map(parseFileRow)
  }

  /** Replace the stored analysis and the column facts derived from it */
  updateAnalysis(id: string, analysis: AnalysisResult): StoredFile | null {
    this.db.prepare(
      `UPDATE files SET analysis_json = ?, total_rows = ?, total_columns = ?,
         numeric_columns = ?, categorical_columns = ? WHERE id = ?`
    ).run(
      JSON.stringify(analysis),
      analysis.totalRows,
      analysis.totalColumns,
      JSON.stringify(analysis.numericColumns),
      JSON.stringify(analysis.categoricalColumns),
      id
    )
    return this.getFile(id)
  }

  deleteFile(id: string): boolean {
    const info = this.db.prepare('DELETE FROM files WHERE id = ?').run(id)
    return info.changes > 0
  }

  close(): void {
    this.db.close()
  }
}

function parseFileRow(row: FileRow): StoredFile {
  return {
    id: row.id,
    userId: row.user_id,
    filename: row.filename,
    storageKey: row.storage_key,
    fileType: row.file_type,
    size: Number(row.size) || 0,
    totalRows: Number(row.total_rows) || 0,
    totalColumns: Number(row.total_columns) || 0,
    numericColumns: JSON.parse(row.numeric_columns),
    categoricalColumns: JSON.parse(row.categorical_columns),
    analysis: row.analysis_json ? JSON.parse(row.analysis_json) : null,
    uploadedAt: row.uploaded_at,
  }
}
