import { describe, it, expect } from 'vitest'
import { renderHook, waitFor } from '@testing-library/react'
import { useCompletion, useWebConfig } from './useChat'
import { createWrapper } from '@/test/test-utils'
import { MOCK_REPLY } from '@/test/mocks/handlers'

describe('useWebConfig', () => {
  it('fetches the web config', async () => {
    const { result } = renderHook(() => useWebConfig(), {
      wrapper: createWrapper(),
    })

    await waitFor(() => expect(result.current.isSuccess).toBe(true))

    expect(result.current.data).toEqual({ bucketName: 'test-bucket' })
  })
})

describe('useCompletion', () => {
  it('returns the completion text', async () => {
    const { result } = renderHook(() => useCompletion(), {
      wrapper: createWrapper(),
    })

    result.current.mutate({ model: 'gs://test-bucket/gemma-3-12b-it', prompt: 'Hi', maxTokens: 16, temperature: 0 })

    await waitFor(() => expect(result.current.isSuccess).toBe(true))
    expect(result.current.data).toBe(MOCK_REPLY)
  })
})
