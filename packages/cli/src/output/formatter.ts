import type { EndpointConfig, ErrorPayload, ScopeSnapshot, TypedAttempt } from '@tollgate/shared';
import type { EndpointSummary } from '@tollgate/core';

export function formatCost(usd: number): string {
  return `$${usd.toFixed(4)}`;
}

export function formatTokens(count: number): string {
  if (count < 1000) return String(count);
  if (count < 1_000_000) return `${(count / 1000).toFixed(1)}k`;
  return `${(count / 1_000_000).toFixed(2)}M`;
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}

export function formatUsage(summaries: EndpointSummary[], scope: ScopeSnapshot): string {
  const lines: string[] = [];
  lines.push('--- Usage ---');
  for (const s of summaries) {
    lines.push(
      `${s.endpoint}: ${plural(s.calls, 'call')} (${s.successes} ok, ${s.failures} failed), ` +
        `${formatTokens(s.totalTokens)} tokens, ${formatCost(s.totalCostUsd)}`,
    );
  }
  const cap = scope.capUsd === undefined ? ' (no cap)' : ` / ${formatCost(scope.capUsd)} cap`;
  lines.push(`Scope total: ${formatCost(scope.totalUsd)}${cap}`);
  return lines.join('\n');
}

export function formatAttempts(attempts: TypedAttempt[]): string {
  const lines = [`Typed attempts: ${attempts.length}`];
  for (const a of attempts) {
    lines.push(`  [${a.index}] ${a.outcome}${a.issues.length > 0 ? `: ${a.issues.join('; ')}` : ''}`);
  }
  return lines.join('\n');
}

function formatLimits(config: EndpointConfig): string {
  const { limits } = config;
  const parts: string[] = [];
  if (limits.requestsPerPeriod !== undefined) parts.push(`${limits.requestsPerPeriod} req`);
  if (limits.tokensPerPeriod !== undefined) parts.push(`${formatTokens(limits.tokensPerPeriod)} tokens`);
  const window = parts.length > 0 ? `${parts.join(', ')} per ${limits.periodMs}ms` : 'unlimited';
  return limits.maxConcurrent !== undefined ? `${window}, ${limits.maxConcurrent} concurrent` : window;
}

export function formatEndpoints(endpoints: Record<string, EndpointConfig>): string {
  const entries = Object.entries(endpoints);
  if (entries.length === 0) return 'No endpoints configured.';
  const width = Math.max(...entries.map(([name]) => name.length));
  return entries
    .map(([name, config]) =>
      `${name.padEnd(width)}  ${config.provider}/${config.model}  ${formatLimits(config)}  ` +
        `timeout ${config.timeoutMs}ms, ${plural(config.maxAttempts, 'attempt')}`,
    )
    .join('\n');
}

export function formatError(payload: ErrorPayload): string {
  return `[${payload.code}] ${payload.message}`;
}
