import { useEffect, useRef, useState, type KeyboardEvent } from 'react'
import { Loader2, Send } from 'lucide-react'
import { useCompletion, useWebConfig } from '@/hooks/useChat'
import { modelPathForBucket } from '@/lib/api'

type Role = 'User' | 'AI'

interface ChatMessage {
  id: number
  role: Role
  text: string
  error?: boolean
}

export const DEFAULT_MAX_TOKENS = 256
export const DEFAULT_TEMPERATURE = 0.7

export function ChatPage() {
  const config = useWebConfig()
  const completion = useCompletion()
  const [model, setModel] = useState('')
  const [prompt, setPrompt] = useState('')
  const [maxTokens, setMaxTokens] = useState(DEFAULT_MAX_TOKENS)
  const [temperature, setTemperature] = useState(DEFAULT_TEMPERATURE)
  const [messages, setMessages] = useState<ChatMessage[]>([])
  const nextId = useRef(0)
  const outputRef = useRef<HTMLDivElement>(null)

  // Prefill the model path once the server tells us the weights bucket
  const bucketName = config.data?.bucketName ?? ''
  useEffect(() => {
    if (bucketName) {
      setModel((current) => current || modelPathForBucket(bucketName))
    }
  }, [bucketName])

  useEffect(() => {
    const output = outputRef.current
    if (output) {
      output.scrollTop = output.scrollHeight
    }
  }, [messages])

  const updateMessage = (id: number, update: Partial<ChatMessage>) => {
    setMessages((current) => current.map((message) => (message.id === id ? { ...message, ...update } : message)))
  }

  const generate = async () => {
    const text = prompt.trim()
    if (!text || completion.isPending) {
      return
    }

    setPrompt('')
    const userId = nextId.current++
    const aiId = nextId.current++
    setMessages((current) => [
      ...current,
      { id: userId, role: 'User', text },
      { id: aiId, role: 'AI', text: '' },
    ])

    try {
      const reply = await completion.mutateAsync({ model, prompt: text, maxTokens, temperature })
      updateMessage(aiId, { text: reply })
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      updateMessage(aiId, { text: `Error: ${message}`, error: true })
    }
  }

  const handleKeyDown = (event: KeyboardEvent<HTMLTextAreaElement>) => {
    if (event.key === 'Enter' && !event.shiftKey) {
      event.preventDefault()
      void generate()
    }
  }

  return (
    <div className="mx-auto flex max-w-3xl flex-col gap-4 p-6">
      <h1 className="text-2xl font-bold">Gemma Chat</h1>

      <div className="grid gap-3 sm:grid-cols-3">
        <div className="flex flex-col gap-1 sm:col-span-3">
          <span className="text-sm text-muted-foreground">Model</span>
          <input
            aria-label="Model"
            className="rounded-md border px-3 py-2"
            value={model}
            onChange={(event) => setModel(event.target.value)}
          />
        </div>
        <div className="flex flex-col gap-1">
          <span className="text-sm text-muted-foreground">
            Max tokens: <span data-testid="max-tokens-value">{maxTokens}</span>
          </span>
          <input
            aria-label="Max tokens"
            type="range"
            min={16}
            max={1024}
            step={16}
            value={maxTokens}
            onChange={(event) => setMaxTokens(Number(event.target.value))}
          />
        </div>
        <div className="flex flex-col gap-1">
          <span className="text-sm text-muted-foreground">
            Temperature: <span data-testid="temperature-value">{temperature}</span>
          </span>
          <input
            aria-label="Temperature"
            type="range"
            min={0}
            max={1.5}
            step={0.1}
            value={temperature}
            onChange={(event) => setTemperature(Number(event.target.value))}
          />
        </div>
      </div>

      <div ref={outputRef} className="min-h-64 overflow-y-auto rounded-md border p-4" data-testid="output">
        {messages.length === 0 ? (
          <p className="text-muted-foreground">Responses will appear here.</p>
        ) : (
          messages.map((message) => (
            <div key={message.id} className={`message ${message.role.toLowerCase()} mb-5`}>
              <div className={message.role === 'User' ? 'font-bold text-blue-400' : 'font-bold text-green-600'}>
                {message.role}
              </div>
              <div className={message.error ? 'text-red-400' : undefined} data-testid={`message-${message.id}`}>
                {message.text}
              </div>
            </div>
          ))
        )}
      </div>

      <div className="flex gap-2">
        <textarea
          aria-label="Prompt"
          className="flex-1 rounded-md border px-3 py-2"
          placeholder="Ask something..."
          value={prompt}
          onChange={(event) => setPrompt(event.target.value)}
          onKeyDown={handleKeyDown}
        />
        <button
          type="button"
          className="inline-flex items-center gap-2 rounded-md bg-primary px-4 py-2 text-primary-foreground disabled:opacity-50"
          disabled={completion.isPending}
          onClick={() => void generate()}
        >
          {completion.isPending ? (
            <>
              <Loader2 className="h-4 w-4 animate-spin" /> Generating...
            </>
          ) : (
            <>
              <span>Generate</span>
              <Send className="h-4 w-4" />
            </>
          )}
        </button>
      </div>
    </div>
  )
}
