"use client"

interface SuggestionChipsProps {
  questions: string[]
  disabled?: boolean
  onSelect: (question: string) => void
}

export default function SuggestionChips({ questions, disabled, onSelect }: SuggestionChipsProps) {
  if (questions.length === 0) return null

  return (
    <div className="mt-3">
      <p className="mb-1.5 text-xs" style={{ color: 'var(--text-tertiary)' }}>
        Suggested questions
      </p>
      <div className="flex flex-wrap gap-1.5">
        {questions.map(q => (
          <button
            key={q}
            disabled={disabled}
            onClick={() => onSelect(q)}
            className="rounded-lg border px-3 py-1.5 text-left text-xs hover:bg-white/5 disabled:opacity-50"
            style={{
              borderColor: 'var(--border-color)',
              color: 'var(--text-secondary)',
            }}
          >
            {q}
          </button>
        ))}
      </div>
    </div>
  )
}
