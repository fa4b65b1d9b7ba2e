import type { MessageRole } from '../store/store.types';

export const COMPLETION_GATEWAY = Symbol('COMPLETION_GATEWAY');

export type ModelTier = 'small' | 'medium';

export interface ChatTurn {
  role: MessageRole;
  content: string;
}

export interface CompletionOptions {
  system?: string;
  model?: ModelTier;
}

/**
 * Black-box text completion. Implementations fail with
 * CompletionProviderError on quota, timeout or malformed responses.
 */
export interface CompletionGateway {
  complete(
    prompt: string,
    history?: readonly ChatTurn[],
    options?: CompletionOptions,
  ): Promise<string>;
}
