"use client"

import { useState, useCallback, useEffect } from 'react'
import type { ApiResponse, StoredFile, UploadResult } from '@/lib/types'
import { buildAnalysisMarkdown } from '@/lib/report'
import { generateSuggestedQuestions } from '@/lib/suggestions'
import FileManager from './components/FileManager'
import ChatPanel, { type ConversationMessage } from './components/ChatPanel'

function greetingFor(file: StoredFile): ConversationMessage {
  return {
    role: 'assistant',
    content: file.analysis
      ? buildAnalysisMarkdown(file.analysis)
      : `Selected **${file.filename}**. Ask a question to analyze it.`,
    suggestedQuestions: generateSuggestedQuestions(file.analysis),
  }
}

export default function Home() {
  const [files, setFiles] = useState<StoredFile[]>([])
  const [selectedFileId, setSelectedFileId] = useState<string | null>(null)
  const [messages, setMessages] = useState<ConversationMessage[]>([])
  const [uploading, setUploading] = useState(false)
  const [uploadError, setUploadError] = useState<string | null>(null)

  const selectedFile = files.find(f => f.id === selectedFileId) ?? null

  // 파일 목록 로드
  useEffect(() => {
    async function loadFiles() {
      try {
        const res = await fetch('/api/files')
        const json: ApiResponse<StoredFile[]> = await res.json()
        if (json.data) setFiles(json.data)
      } catch (error) {
        console.error('[FILES]', error)
      }
    }
    void loadFiles()
  }, [])

  const handleUpload = useCallback(async (file: File) => {
    setUploading(true)
    setUploadError(null)
    try {
      const formData = new FormData()
      formData.append('file', file)
      const res = await fetch('/api/upload', { method: 'POST', body: formData })
      const json: ApiResponse<UploadResult> = await res.json()
      if (!json.data) {
        setUploadError(json.error ?? 'Upload failed')
        return
      }

      const uploaded = json.data
      setFiles(prev => [uploaded.file, ...prev])
      setSelectedFileId(uploaded.file.id)
      setMessages([{
        role: 'assistant',
        content: uploaded.summary,
        suggestedQuestions: uploaded.suggestedQuestions,
      }])
    } catch (error) {
      console.error('[UPLOAD]', error)
      setUploadError('Upload failed')
    } finally {
      setUploading(false)
    }
  }, [])

  const handleSelect = useCallback((file: StoredFile) => {
    if (file.id === selectedFileId) return
    setSelectedFileId(file.id)
    setMessages([greetingFor(file)])
  }, [selectedFileId])

  const handleDelete = useCallback(async (file: StoredFile) => {
    if (!window.confirm(`Delete ${file.filename}?`)) return
    try {
      const res = await fetch(`/api/files/${file.id}`, { method: 'DELETE' })
      const json: ApiResponse<{ id: string }> = await res.json()
      if (!json.data) {
        setUploadError(json.error ?? 'Delete failed')
        return
      }
      setFiles(prev => prev.filter(f => f.id !== file.id))
      if (file.id === selectedFileId) {
        setSelectedFileId(null)
        setMessages([])
      }
    } catch (error) {
      console.error('[FILES]', error)
      setUploadError('Delete failed')
    }
  }, [selectedFileId])

  return (
    <main className="flex h-screen overflow-hidden">
      <FileManager
        files={files}
        selectedFileId={selectedFileId}
        uploading={uploading}
        error={uploadError}
        onUpload={file => void handleUpload(file)}
        onSelect={handleSelect}
        onDelete={file => void handleDelete(file)}
      />
      <ChatPanel
        fileId={selectedFileId}
        filename={selectedFile?.filename ?? null}
        messages={messages}
        onMessagesChange={setMessages}
      />
    </main>
  )
}
