import { InvalidArgumentError } from 'commander';

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

export function parseUsd(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative amount in USD.');
  }
  return n;
}

/** Options every calling command accepts. */
export interface CallCommandOptions {
  config?: string;
  cap?: number;
  attempts?: number;
  json?: boolean;
}
