import { z } from 'zod';

export const modelProviderNameSchema = z.enum(['ollama', 'anthropic', 'openai', 'google']);
