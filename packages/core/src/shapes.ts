import { z } from 'zod';
import type {
  BooleanShape,
  EnumShape,
  InferShape,
  ListShape,
  MappingShape,
  NumberShape,
  ObjectShape,
  Shape,
  StringShape,
} from '@tollgate/shared';

interface Described {
  description?: string;
}

/** Builders for target shapes. */
export const shape = {
  string(options: Described = {}): StringShape {
    return { kind: 'string', ...options };
  },

  number(options: Omit<NumberShape, 'kind'> = {}): NumberShape {
    return { kind: 'number', ...options };
  },

  /** A number between 0 and 1 inclusive. */
  probability(options: Described = {}): NumberShape {
    return { kind: 'number', min: 0, max: 1, ...options };
  },

  boolean(options: Described = {}): BooleanShape {
    return { kind: 'boolean', ...options };
  },

  enumeration<V extends string>(values: readonly [V, ...V[]], options: Described = {}): EnumShape<V> {
    return { kind: 'enum', values, ...options };
  },

  list<I extends Shape>(items: I, options: Omit<ListShape<I>, 'kind' | 'items'> = {}): ListShape<I> {
    return { kind: 'list', items, ...options };
  },

  mapping<V extends Shape>(values: V, options: Described = {}): MappingShape<V> {
    return { kind: 'mapping', values, ...options };
  },

  object<F extends Record<string, Shape>>(fields: F, options: Described = {}): ObjectShape<F> {
    return { kind: 'object', fields, ...options };
  },
};

// --- description ---

function numberBounds(s: NumberShape): string {
  if (s.min !== undefined && s.max !== undefined) return ` between ${s.min} and ${s.max}`;
  if (s.min !== undefined) return ` >= ${s.min}`;
  if (s.max !== undefined) return ` <= ${s.max}`;
  return '';
}

function items(n: number): string {
  return n === 1 ? '1 item' : `${n} items`;
}

function itemBounds(s: ListShape): string {
  if (s.minItems !== undefined && s.maxItems !== undefined) {
    return ` (between ${s.minItems} and ${items(s.maxItems)})`;
  }
  if (s.minItems !== undefined) return ` (at least ${items(s.minItems)})`;
  if (s.maxItems !== undefined) return ` (at most ${items(s.maxItems)})`;
  return '';
}

function render(s: Shape, depth: number): string {
  const pad = '  '.repeat(depth + 1);
  const close = '  '.repeat(depth);

  switch (s.kind) {
    case 'string':
      return 'string';
    case 'number':
      return (s.integer ? 'integer' : 'number') + numberBounds(s);
    case 'boolean':
      return 'true or false';
    case 'enum':
      return 'one of ' + s.values.map(v => JSON.stringify(v)).join(', ');
    case 'list':
      return `[\n${pad}${render(s.items, depth + 1)},\n${pad}...\n${close}]${itemBounds(s)}`;
    case 'mapping':
      return `{\n${pad}"<key>": ${render(s.values, depth + 1)},\n${pad}...\n${close}}`;
    case 'object': {
      const entries = Object.entries(s.fields);
      const lines = entries.map(([name, field], i) => {
        const comma = i < entries.length - 1 ? ',' : '';
        const comment = field.description ? ` // ${field.description}` : '';
        return `${pad}${JSON.stringify(name)}: ${render(field, depth + 1)}${comma}${comment}`;
      });
      return `{\n${lines.join('\n')}\n${close}}`;
    }
  }
}

/**
 * Pseudo-JSON description of a shape, with field descriptions as trailing
 * `//` comments and bounds spelled out.
 */
export function describeShape(s: Shape): string {
  const body = render(s, 0);
  return s.description ? `// ${s.description}\n${body}` : body;
}

/** Formatting instructions appended to the prompt of a typed call. */
export function formatInstructions(s: Shape): string {
  if (s.kind === 'string') {
    return 'Respond with the answer as plain text only.';
  }
  return [
    'Return your final answer as JSON matching this structure:',
    describeShape(s),
    'Respond with valid JSON only (no comments, no trailing commas). A ```json code block is fine.',
  ].join('\n');
}

// --- validation ---

function toZod(s: Shape): z.ZodTypeAny {
  switch (s.kind) {
    case 'string':
      return z.string();
    case 'number': {
      let schema = z.number();
      if (s.integer) schema = schema.int();
      if (s.min !== undefined) schema = schema.gte(s.min);
      if (s.max !== undefined) schema = schema.lte(s.max);
      return schema;
    }
    case 'boolean':
      return z.boolean();
    case 'enum': {
      const values = s.values;
      return z.string().refine(v => values.some(x => x === v), {
        message: `Expected one of ${values.map(v => JSON.stringify(v)).join(', ')}`,
      });
    }
    case 'list': {
      let schema = z.array(toZod(s.items));
      if (s.minItems !== undefined) schema = schema.min(s.minItems);
      if (s.maxItems !== undefined) schema = schema.max(s.maxItems);
      return schema;
    }
    case 'mapping':
      return z.record(z.string(), toZod(s.values));
    case 'object': {
      const fields: Record<string, z.ZodTypeAny> = {};
      for (const [name, field] of Object.entries(s.fields)) {
        fields[name] = toZod(field);
      }
      return z.object(fields);
    }
  }
}

const compiled = new WeakMap<Shape, z.ZodTypeAny>();

function validatorFor(s: Shape): z.ZodTypeAny {
  let schema = compiled.get(s);
  if (!schema) {
    schema = toZod(s);
    compiled.set(s, schema);
  }
  return schema;
}

export function conformsTo<S extends Shape>(s: S, value: unknown): value is InferShape<S> {
  return validatorFor(s).safeParse(value).success;
}

/** Every mismatch between `value` and `s`, as `path: message` lines. Empty when it conforms. */
export function shapeIssues(s: Shape, value: unknown): string[] {
  const result = validatorFor(s).safeParse(value);
  if (result.success) return [];
  return result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
}
