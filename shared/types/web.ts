export interface WebConfig {
  bucketName: string;
}

export interface HealthCheckResponse {
  status: string;
  timestamp: string;
}

export interface CompletionRequest {
  model: string;
  prompt: string;
  max_tokens: number;
  temperature: number;
  stream: false;
}

export interface CompletionChoice {
  index: number;
  text: string;
  finish_reason?: string | null;
}

export interface CompletionResponse {
  id: string;
  model: string;
  choices: CompletionChoice[];
}

export interface ErrorResponse {
  error: {
    message: string;
    statusCode: number;
  };
}
