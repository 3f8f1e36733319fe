import { z } from 'zod';
import type { Shape } from '../types/shape.js';

const description = z.string().optional();

/** Validates shapes loaded from JSON (e.g. the CLI's --shape file). */
export const shapeSchema: z.ZodType<Shape> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('string'), description }),
    z.object({
      kind: z.literal('number'),
      description,
      integer: z.boolean().optional(),
      min: z.number().optional(),
      max: z.number().optional(),
    }),
    z.object({ kind: z.literal('boolean'), description }),
    z.object({ kind: z.literal('enum'), description, values: z.array(z.string()).min(1) }),
    z.object({
      kind: z.literal('list'),
      description,
      items: shapeSchema,
      minItems: z.number().int().nonnegative().optional(),
      maxItems: z.number().int().nonnegative().optional(),
    }),
    z.object({ kind: z.literal('mapping'), description, values: shapeSchema }),
    z.object({ kind: z.literal('object'), description, fields: z.record(z.string(), shapeSchema) }),
  ]),
);
