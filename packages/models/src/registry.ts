import type { ModelProviderName } from '@tollgate/shared';
import type { ModelProvider } from './provider.js';

export class ModelProviderRegistry {
  private providers = new Map<ModelProviderName, ModelProvider>();

  register(provider: ModelProvider): void {
    this.providers.set(provider.name, provider);
  }

  get(name: ModelProviderName): ModelProvider | undefined {
    return this.providers.get(name);
  }

  listAll(): ModelProvider[] {
    return Array.from(this.providers.values());
  }

  has(name: ModelProviderName): boolean {
    return this.providers.has(name);
  }
}
