"use client"

import { useState, useRef, useEffect, useCallback } from "react"
import type { ApiResponse, ChatResponse, PlotPayload } from "@/lib/types"
import MarkdownRenderer from "./MarkdownRenderer"
import PlotCard from "./PlotCard"
import SuggestionChips from "./SuggestionChips"

export interface ConversationMessage {
  role: "user" | "assistant"
  content: string
  plot?: PlotPayload
  suggestedQuestions?: string[]
}

interface ChatPanelProps {
  fileId: string | null
  filename: string | null
  messages: ConversationMessage[]
  onMessagesChange: (messages: ConversationMessage[]) => void
}

export default function ChatPanel({ fileId, filename, messages, onMessagesChange }: ChatPanelProps) {
  const [input, setInput] = useState("")
  const [isLoading, setIsLoading] = useState(false)
  const messagesEndRef = useRef<HTMLDivElement>(null)

  useEffect(() => {
    messagesEndRef.current?.scrollIntoView({ behavior: "smooth" })
  }, [messages])

  const send = useCallback(async (text: string) => {
    const trimmed = text.trim()
    if (!trimmed || isLoading) return

    const updated: ConversationMessage[] = [...messages, { role: "user", content: trimmed }]
    onMessagesChange(updated)
    setInput("")
    setIsLoading(true)

    try {
      const res = await fetch("/api/chat", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          fileId,
          messages: updated.map(m => ({ role: m.role, content: m.content })),
        }),
      })

      const json: ApiResponse<ChatResponse> = await res.json()
      if (!json.data) throw new Error(json.error ?? "Failed to get a response")

      onMessagesChange([
        ...updated,
        {
          role: "assistant",
          content: json.data.reply,
          plot: json.data.plot,
          suggestedQuestions: json.data.suggestedQuestions,
        },
      ])
    } catch (error) {
      const message = error instanceof Error ? error.message : "Failed to get a response"
      onMessagesChange([...updated, { role: "assistant", content: `Sorry, something went wrong: ${message}` }])
    } finally {
      setIsLoading(false)
    }
  }, [fileId, isLoading, messages, onMessagesChange])

  const handleKeyDown = (e: React.KeyboardEvent) => {
    if (e.key === "Enter" && !e.shiftKey) {
      e.preventDefault()
      void send(input)
    }
  }

  return (
    <section className="flex min-w-0 flex-1 flex-col">
      <div className="border-b px-5 py-4" style={{ borderColor: "var(--border-color)" }}>
        <h2 className="text-sm font-semibold tracking-tight">Data Analysis Agent</h2>
        <p className="text-xs" style={{ color: "var(--text-tertiary)" }}>
          {filename ? `Analyzing ${filename}` : "No file selected"}
        </p>
      </div>

      <div className="flex-1 space-y-4 overflow-y-auto px-5 py-4">
        {messages.length === 0 && (
          <div className="flex h-full items-center justify-center">
            <div className="text-center">
              <p className="text-sm" style={{ color: "var(--text-tertiary)" }}>
                Ask anything about your data
              </p>
              <p className="mt-1 text-xs" style={{ color: "var(--text-tertiary)" }}>
                e.g. &quot;Can you create a histogram of price?&quot;
              </p>
            </div>
          </div>
        )}

        {messages.map((msg, i) => (
          <div key={i} className={`flex ${msg.role === "user" ? "justify-end" : "justify-start"}`}>
            <div
              className="max-w-[85%] rounded-xl px-4 py-3 text-sm leading-relaxed"
              style={{
                background: msg.role === "user" ? "var(--bg-tertiary)" : "transparent",
                border: msg.role === "assistant" ? "1px solid var(--border-color)" : "none",
              }}
            >
              {msg.role === "user"
                ? <p className="whitespace-pre-wrap">{msg.content}</p>
                : <MarkdownRenderer content={msg.content} />}

              {msg.plot && <PlotCard plot={msg.plot} />}

              {i === messages.length - 1 && msg.suggestedQuestions && (
                <SuggestionChips
                  questions={msg.suggestedQuestions}
                  disabled={isLoading}
                  onSelect={q => void send(q)}
                />
              )}
            </div>
          </div>
        ))}

        {isLoading && (
          <div className="flex justify-start">
            <div className="flex items-center gap-2 px-4 py-3">
              <div className="flex gap-1">
                <span className="h-1.5 w-1.5 animate-pulse rounded-full" style={{ background: "var(--text-tertiary)" }} />
                <span className="h-1.5 w-1.5 animate-pulse rounded-full" style={{ background: "var(--text-tertiary)", animationDelay: "0.2s" }} />
                <span className="h-1.5 w-1.5 animate-pulse rounded-full" style={{ background: "var(--text-tertiary)", animationDelay: "0.4s" }} />
              </div>
              <span className="text-xs" style={{ color: "var(--text-tertiary)" }}>Analyzing...</span>
            </div>
          </div>
        )}

        <div ref={messagesEndRef} />
      </div>

      <div className="border-t p-4" style={{ borderColor: "var(--border-color)" }}>
        <div
          className="flex items-end gap-2 rounded-xl border px-4 py-3"
          style={{ background: "var(--bg-input)", borderColor: "var(--border-color)" }}
        >
          <textarea
            value={input}
            onChange={(e) => setInput(e.target.value)}
            onKeyDown={handleKeyDown}
            placeholder={fileId ? "Ask about your data..." : "Ask a question, or upload a CSV first..."}
            rows={1}
            className="flex-1 resize-none bg-transparent text-sm outline-none"
            style={{ color: "var(--text-primary)", maxHeight: "120px" }}
          />
          <button
            onClick={() => void send(input)}
            disabled={!input.trim() || isLoading}
            className="shrink-0 rounded-lg p-2 disabled:opacity-20"
            style={{ background: input.trim() ? "var(--accent)" : "transparent" }}
            aria-label="Send"
          >
            <svg
              width="14" height="14" fill="none"
              stroke={input.trim() ? "#050505" : "var(--text-tertiary)"}
              strokeWidth="2" viewBox="0 0 24 24"
            >
              <path d="M5 12h14M12 5l7 7-7 7" />
            </svg>
          </button>
        </div>
      </div>
    </section>
  )
}
