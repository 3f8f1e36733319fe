/**
 * Target shapes for typed invocation.
 *
 * A closed set of tagged variants. The same tree is walked to render formatting
 * instructions for the model and to validate what comes back.
 */

interface ShapeBase {
  description?: string;
}

export interface StringShape extends ShapeBase {
  kind: 'string';
}

export interface NumberShape extends ShapeBase {
  kind: 'number';
  integer?: boolean;
  min?: number;
  max?: number;
}

export interface BooleanShape extends ShapeBase {
  kind: 'boolean';
}

export interface EnumShape<V extends string = string> extends ShapeBase {
  kind: 'enum';
  values: readonly V[];
}

export interface ListShape<I extends Shape = Shape> extends ShapeBase {
  kind: 'list';
  items: I;
  minItems?: number;
  maxItems?: number;
}

export interface MappingShape<V extends Shape = Shape> extends ShapeBase {
  kind: 'mapping';
  values: V;
}

export interface ObjectShape<F extends Record<string, Shape> = Record<string, Shape>> extends ShapeBase {
  kind: 'object';
  fields: F;
}

export type Shape =
  | StringShape
  | NumberShape
  | BooleanShape
  | EnumShape
  | ListShape
  | MappingShape
  | ObjectShape;

export type ShapeKind = Shape['kind'];

/** Static type of a value that satisfies `S`. */
export type InferShape<S> =
  S extends StringShape ? string
    : S extends NumberShape ? number
      : S extends BooleanShape ? boolean
        : S extends EnumShape<infer V> ? V
          : S extends ListShape<infer I> ? InferShape<I>[]
            : S extends MappingShape<infer V> ? Record<string, InferShape<V>>
              : S extends ObjectShape<infer F> ? { [K in keyof F]: InferShape<F[K]> }
                : never;
