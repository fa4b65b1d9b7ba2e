import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CompletionProviderError, describeError } from '../common/errors';
import type {
  ChatTurn,
  CompletionGateway,
  CompletionOptions,
  ModelTier,
} from './completion-gateway';

type OllamaChatMessage = {
  role: 'system' | 'user' | 'assistant';
  content: string;
};

type OllamaChatResponse = {
  model: string;
  message?: { role: string; content?: unknown };
  done: boolean;
};

@Injectable()
export class OllamaService implements CompletionGateway {
  private readonly logger = new Logger(OllamaService.name);
  private readonly baseUrl: string;
  private readonly llmModel: string;
  private readonly smallModel: string;
  private readonly timeoutMs: number;

  constructor(private readonly config: ConfigService) {
    this.baseUrl =
      this.config.get<string>('OLLAMA_BASE_URL') ?? 'http://127.0.0.1:11434';
    this.llmModel =
      this.config.get<string>('OLLAMA_LLM_MODEL') ?? 'mistral:latest';
    this.smallModel =
      this.config.get<string>('OLLAMA_SMALL_MODEL') ?? 'qwen3:4b';
    this.timeoutMs = Number(this.config.get('OLLAMA_TIMEOUT_MS') ?? 30_000);
  }

  private resolveModel(model: ModelTier): string {
    switch (model) {
      case 'small':
        return this.smallModel;
      case 'medium':
        return this.llmModel;
    }
  }

  async complete(
    prompt: string,
    history: readonly ChatTurn[] = [],
    options: CompletionOptions = {},
  ): Promise<string> {
    const tier = options.model ?? 'medium';
    const modelName = this.resolveModel(tier);
    const url = `${this.baseUrl}/api/chat`;
    const messages: OllamaChatMessage[] = [
      ...(options.system ? [{ role: 'system' as const, content: options.system }] : []),
      ...history.map((turn) => ({ role: turn.role, content: turn.content })),
      { role: 'user', content: prompt },
    ];
    this.logger.debug(
      `Calling Ollama chat (${tier}=${modelName}, ${messages.length} messages): ${url}`,
    );

    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: modelName, messages, stream: false }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      this.logger.error(`Ollama chat (${tier}) unreachable`, error);
      throw new CompletionProviderError(
        `LLM service unreachable: ${describeError(error)}`,
        error,
      );
    }

    if (!res.ok) {
      throw new CompletionProviderError(
        `Ollama chat failed: ${res.status} ${await res.text()}`,
      );
    }

    let json: OllamaChatResponse;
    try {
      json = (await res.json()) as OllamaChatResponse;
    } catch (error) {
      throw new CompletionProviderError('Ollama chat returned invalid JSON', error);
    }

    const content = json.message?.content;
    if (typeof content !== 'string') {
      throw new CompletionProviderError('Ollama chat response has no message');
    }
    return content;
  }
}
