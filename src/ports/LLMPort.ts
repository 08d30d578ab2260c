export interface LLMRequest {
  prompt: string;
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface LLMResponse {
  text: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

export interface LLMPort {
  generateText(request: LLMRequest, signal?: AbortSignal): Promise<LLMResponse>;
}
