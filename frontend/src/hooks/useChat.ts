import { useMutation, useQuery } from '@tanstack/react-query'
import { completionsApi, configApi, type CompletionOptions, type WebConfig } from '@/lib/api'

export function useWebConfig() {
  return useQuery<WebConfig>({
    queryKey: ['config'],
    queryFn: () => configApi.get(),
    staleTime: Infinity,
  })
}

export function useCompletion() {
  return useMutation({
    mutationFn: (options: CompletionOptions) => completionsApi.complete(options),
  })
}
