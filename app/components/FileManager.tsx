"use client"

import { useRef } from "react"
import type { StoredFile } from "@/lib/types"

interface FileManagerProps {
  files: StoredFile[]
  selectedFileId: string | null
  uploading: boolean
  error: string | null
  onUpload: (file: File) => void
  onSelect: (file: StoredFile) => void
  onDelete: (file: StoredFile) => void
}

function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}

export default function FileManager({
  files,
  selectedFileId,
  uploading,
  error,
  onUpload,
  onSelect,
  onDelete,
}: FileManagerProps) {
  const inputRef = useRef<HTMLInputElement>(null)

  const handleChange = (e: React.ChangeEvent<HTMLInputElement>) => {
    const file = e.target.files?.[0]
    if (file) onUpload(file)
    e.target.value = ""
  }

  return (
    <aside
      className="flex w-[300px] flex-col border-r"
      style={{ background: "var(--bg-secondary)", borderColor: "var(--border-color)" }}
    >
      <div className="border-b px-5 py-4" style={{ borderColor: "var(--border-color)" }}>
        <h1 className="text-sm font-semibold tracking-tight">CSV Chat Analyst</h1>
        <p className="text-xs" style={{ color: "var(--text-tertiary)" }}>
          Upload a CSV file to analyze it
        </p>
      </div>

      <div className="p-4">
        <input ref={inputRef} type="file" accept=".csv,text/csv" className="hidden" onChange={handleChange} />
        <button
          onClick={() => inputRef.current?.click()}
          disabled={uploading}
          className="w-full rounded-lg border border-dashed px-4 py-3 text-sm hover:bg-white/5 disabled:opacity-50"
          style={{ borderColor: "var(--border-color)", color: "var(--text-secondary)" }}
        >
          {uploading ? "Analyzing..." : "Upload CSV"}
        </button>
        {error && (
          <p className="mt-2 text-xs" style={{ color: "var(--danger)" }}>
            {error}
          </p>
        )}
      </div>

      <div className="flex-1 overflow-y-auto px-2 pb-4">
        {files.length === 0 && (
          <p className="px-3 text-xs" style={{ color: "var(--text-tertiary)" }}>
            No files yet
          </p>
        )}
        {files.map(file => {
          const selected = file.id === selectedFileId
          return (
            <div
              key={file.id}
              className="group mb-1 flex items-center justify-between rounded-lg px-3 py-2"
              style={{ background: selected ? "var(--bg-tertiary)" : "transparent" }}
            >
              <button onClick={() => onSelect(file)} className="min-w-0 flex-1 text-left">
                <p className="truncate text-sm">{file.filename}</p>
                <p className="text-xs" style={{ color: "var(--text-tertiary)" }}>
                  {file.totalRows} rows · {file.totalColumns} columns · {formatSize(file.size)}
                </p>
              </button>
              <div className="ml-2 flex gap-1 opacity-0 group-hover:opacity-100">
                <a
                  href={`/api/files/${file.id}/download`}
                  className="rounded px-1.5 py-0.5 text-xs hover:bg-white/10"
                  style={{ color: "var(--text-secondary)" }}
                >
                  Download
                </a>
                <button
                  onClick={() => onDelete(file)}
                  className="rounded px-1.5 py-0.5 text-xs hover:bg-white/10"
                  style={{ color: "var(--danger)" }}
                  aria-label={`Delete ${file.filename}`}
                >
                  Delete
                </button>
              </div>
            </div>
          )
        })}
      </div>
    </aside>
  )
}
