"use client"

import ReactMarkdown from 'react-markdown'
import remarkGfm from 'remark-gfm'

interface MarkdownRendererProps {
  content: string
}

// remark-gfm for the tables the assistant is told to answer with
export default function MarkdownRenderer({ content }: MarkdownRendererProps) {
  return (
    <div className="markdown-content overflow-x-auto">
      <ReactMarkdown remarkPlugins={[remarkGfm]}>{content}</ReactMarkdown>
    </div>
  )
}
