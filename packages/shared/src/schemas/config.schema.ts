import { z } from 'zod';
import { modelProviderNameSchema } from './model.schema.js';
import {
  DEFAULT_BACKOFF,
  DEFAULT_LIMITS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_TYPED_MAX_ATTEMPTS,
} from '../constants.js';

const cloudProviderConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  enabled: z.boolean().default(true),
});

export const providersConfigSchema = z.object({
  ollama: z.object({
    baseUrl: z.string().url().default('http://localhost:11434'),
    enabled: z.boolean().default(true),
  }).optional(),
  anthropic: cloudProviderConfigSchema.optional(),
  openai: cloudProviderConfigSchema.optional(),
  google: cloudProviderConfigSchema.optional(),
});

export const endpointLimitsSchema = z.object({
  requestsPerPeriod: z.number().int().positive().optional(),
  tokensPerPeriod: z.number().int().positive().optional(),
  periodMs: z.number().int().positive(),
  maxConcurrent: z.number().int().positive().optional(),
});

export const backoffConfigSchema = z.object({
  baseMs: z.number().nonnegative().default(DEFAULT_BACKOFF.baseMs),
  multiplier: z.number().min(1).default(DEFAULT_BACKOFF.multiplier),
  maxMs: z.number().nonnegative().default(DEFAULT_BACKOFF.maxMs),
  jitter: z.boolean().default(DEFAULT_BACKOFF.jitter),
});

export const endpointConfigSchema = z.object({
  provider: modelProviderNameSchema,
  model: z.string().min(1),
  system: z.string().optional(),
  maxTokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
  limits: endpointLimitsSchema.default(DEFAULT_LIMITS),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  maxAttempts: z.number().int().min(1).default(DEFAULT_MAX_ATTEMPTS),
  admissionDeadlineMs: z.number().int().positive().optional(),
  backoff: backoffConfigSchema.default({}),
});

export const budgetConfigSchema = z.object({
  capUsd: z.number().nonnegative().optional(),
});

export const typedConfigSchema = z.object({
  maxAttempts: z.number().int().min(1).default(DEFAULT_TYPED_MAX_ATTEMPTS),
});

export const loggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export const tollgateConfigSchema = z.object({
  providers: providersConfigSchema.default({}),
  endpoints: z.record(z.string(), endpointConfigSchema).default({}),
  budget: budgetConfigSchema.default({}),
  typed: typedConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
});
