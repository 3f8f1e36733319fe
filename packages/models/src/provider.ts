import type {
  ChatOptions,
  ModelRequest,
  ModelResponse,
  ModelProviderName,
} from '@tollgate/shared';
import { estimateTokens } from '@tollgate/shared';

/** Completion budget assumed when a request does not set maxTokens. */
export const DEFAULT_COMPLETION_TOKENS = 1024;

export abstract class ModelProvider {
  abstract readonly name: ModelProviderName;

  /**
   * Performs one network call. Implementations must honour `options.signal`
   * and throw a classified `ProviderFailure` on error.
   */
  abstract chat(request: ModelRequest, options?: ChatOptions): Promise<ModelResponse>;

  /**
   * Pre-call token estimate used for admission. Prompt characters / 4 plus the
   * requested completion budget.
   */
  estimateTokens(request: ModelRequest): number {
    const promptChars = (request.system ?? '') + request.messages.map(m => m.content).join('');
    return estimateTokens(promptChars) + (request.maxTokens ?? DEFAULT_COMPLETION_TOKENS);
  }
}
