import OpenAI from 'openai';
import { AppConfig } from '../config/app.config';
import { AssessorFailureReason } from '../types/result.types';
import { AssessorUnavailableError } from '../errors/route-risk.errors';
import { isNetworkError } from './retry.util';

/** The slice of the OpenAI client the model-backed services call. Grok is reached through the same SDK. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal; timeout?: number; maxRetries?: number }
      ): Promise<OpenAI.Chat.ChatCompletion>;
    };
  };
}

export function createChatCompletionsClient(config: AppConfig): ChatCompletionsClient {
  return new OpenAI({
    apiKey: config.llm.apiKey,
    baseURL: config.llm.baseUrl,
    maxRetries: 0
  });
}

/**
 * Pulls the outermost JSON object out of a reply that may wrap it in prose or code fences.
 */
export function extractJsonObject(outputText: string): unknown {
  const start = outputText.indexOf('{');
  const end = outputText.lastIndexOf('}');
  if (start < 0 || end <= start) {
    throw new Error('No JSON found in response');
  }
  return JSON.parse(outputText.slice(start, end + 1));
}

export function chatFailureReason(error: unknown, signal?: AbortSignal): AssessorFailureReason {
  if (signal?.aborted) {
    const reason: unknown = signal.reason;
    return reason instanceof Error && reason.name === 'TimeoutError' ? 'timeout' : 'cancelled';
  }
  if (error instanceof AssessorUnavailableError) {
    return 'invalid_response';
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return 'timeout';
  }
  if (error instanceof OpenAI.APIUserAbortError) {
    return 'cancelled';
  }
  return 'api_error';
}

export function isRetryableChatError(error: Error): boolean {
  if (error instanceof AssessorUnavailableError) {
    return false;
  }

  if (isNetworkError(error) || error instanceof OpenAI.APIConnectionError) {
    return true;
  }

  // Retry on rate limits and server errors
  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    return status === 429 || (status !== undefined && status >= 500);
  }

  return false;
}
