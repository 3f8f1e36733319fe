import {
  TypeValidationExhaustedError,
  stripCodeFence,
  type CallResult,
  type InferShape,
  type Shape,
  type TypedAttempt,
  type ValidationOutcome,
} from '@tollgate/shared';
import { extractJson, extractYesNo } from './response-parsing.js';
import { conformsTo, formatInstructions, shapeIssues } from './shapes.js';
import { getLogger, type Logger } from './logger.js';

type Parsed =
  | { ok: true; payload: unknown }
  | { ok: false; issue: string };

type Validated<T> =
  | { ok: true; value: T }
  | { ok: false; issues: string[] };

/** How the raw text of a response becomes a value. */
export interface ResponseInterpreter<T> {
  instructions: string;
  parse(raw: string): Parsed;
  validate(payload: unknown): Validated<T>;
}

export function shapeInterpreter<S extends Shape>(shape: S): ResponseInterpreter<InferShape<S>> {
  return {
    instructions: formatInstructions(shape),
    parse(raw) {
      if (shape.kind === 'string') {
        return { ok: true, payload: stripCodeFence(raw) };
      }
      const extracted = extractJson(raw);
      return extracted.ok ? { ok: true, payload: extracted.value } : { ok: false, issue: extracted.error };
    },
    validate(payload) {
      if (conformsTo(shape, payload)) return { ok: true, value: payload };
      return { ok: false, issues: shapeIssues(shape, payload) };
    },
  };
}

export const yesNoInterpreter: ResponseInterpreter<boolean> = {
  instructions: 'Think it through, then finish with a final line containing only YES or NO.',
  parse(raw) {
    const verdict = extractYesNo(raw);
    return verdict.ok ? { ok: true, payload: verdict.value } : { ok: false, issue: verdict.error };
  },
  validate(payload) {
    return typeof payload === 'boolean'
      ? { ok: true, value: payload }
      : { ok: false, issues: ['(root): Expected YES or NO'] };
  },
};

export interface SemanticLoopOptions {
  endpoint: string;
  maxAttempts: number;
  logger?: Logger;
}

export interface TypedResult<T> {
  value: T;
  attempts: TypedAttempt[];
  /** Results of every call made, in order */
  calls: CallResult[];
}

type LoopState<T> =
  | { phase: 'drafting' }
  | { phase: 'parsing'; prompt: string; call: CallResult }
  | { phase: 'validating'; prompt: string; call: CallResult; payload: unknown }
  | { phase: 'succeeded'; value: T }
  | { phase: 'exhausted' };

export function buildPrompt(basePrompt: string, instructions: string, notes: string[]): string {
  const parts = [basePrompt, instructions];
  if (notes.length > 0) {
    parts.push(
      'Your earlier answers could not be used:',
      ...notes,
      'Answer again, following the format above and fixing these problems.',
    );
  }
  return parts.join('\n\n');
}

function correctionNote(attempt: TypedAttempt): string {
  return [
    `Attempt ${attempt.index} returned:`,
    attempt.rawResponse,
    'Problems:',
    ...attempt.issues.map(issue => `- ${issue}`),
  ].join('\n');
}

/**
 * Drafting, parsing and validating until a value is produced or the attempt
 * budget is spent. Every semantic attempt is one `call`; transport failures
 * thrown by `call` end the loop immediately.
 */
export async function runSemanticLoop<T>(
  basePrompt: string,
  interpreter: ResponseInterpreter<T>,
  call: (prompt: string) => Promise<CallResult>,
  options: SemanticLoopOptions,
): Promise<TypedResult<T>> {
  if (options.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be at least 1, got ${options.maxAttempts}`);
  }
  const logger = (options.logger ?? getLogger()).child({ component: 'typed-invocation', endpoint: options.endpoint });
  const attempts: TypedAttempt[] = [];
  const calls: CallResult[] = [];
  const notes: string[] = [];

  const fail = (prompt: string, callResult: CallResult, outcome: ValidationOutcome, issues: string[]): LoopState<T> => {
    const attempt: TypedAttempt = {
      index: attempts.length + 1,
      prompt,
      rawResponse: callResult.text,
      outcome,
      issues,
      callId: callResult.record.id,
    };
    attempts.push(attempt);
    notes.push(correctionNote(attempt));
    logger.info({ attempt: attempt.index, outcome, issues }, 'Response rejected');
    return attempts.length >= options.maxAttempts ? { phase: 'exhausted' } : { phase: 'drafting' };
  };

  let state: LoopState<T> = { phase: 'drafting' };
  for (;;) {
    switch (state.phase) {
      case 'drafting': {
        const prompt = buildPrompt(basePrompt, interpreter.instructions, notes);
        const result = await call(prompt);
        calls.push(result);
        state = { phase: 'parsing', prompt, call: result };
        break;
      }
      case 'parsing': {
        const parsed = interpreter.parse(state.call.text);
        state = parsed.ok
          ? { phase: 'validating', prompt: state.prompt, call: state.call, payload: parsed.payload }
          : fail(state.prompt, state.call, 'parse_failed', [parsed.issue]);
        break;
      }
      case 'validating': {
        const validated = interpreter.validate(state.payload);
        if (validated.ok) {
          attempts.push({
            index: attempts.length + 1,
            prompt: state.prompt,
            rawResponse: state.call.text,
            outcome: 'valid',
            issues: [],
            callId: state.call.record.id,
          });
          state = { phase: 'succeeded', value: validated.value };
        } else {
          state = fail(state.prompt, state.call, 'shape_mismatch', validated.issues);
        }
        break;
      }
      case 'succeeded':
        return { value: state.value, attempts, calls };
      case 'exhausted':
        throw new TypeValidationExhaustedError(options.endpoint, attempts);
    }
  }
}
