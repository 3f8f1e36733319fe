export { ModelProvider, DEFAULT_COMPLETION_TOKENS } from './provider.js';
export { ModelProviderRegistry } from './registry.js';
export { classifyProviderError, failureForStatus } from './failure.js';
export { OllamaProvider } from './providers/ollama.js';
export { AnthropicProvider } from './providers/anthropic.js';
export { OpenAIProvider } from './providers/openai.js';
export { GoogleProvider } from './providers/google.js';
