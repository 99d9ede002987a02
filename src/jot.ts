import type { ResponseFormatTextJSONSchemaConfig } from 'openai/resources/responses/responses';

type JsonSchema =
  | { type: 'string'; description?: string; enum?: readonly string[] }
  | { type: 'number'; description?: string }
  | { type: 'array'; description?: string; items: JsonSchema }
  | {
      type: 'object';
      description?: string;
      properties: Record<string, JsonSchema>;
      required: string[];
      additionalProperties: boolean;
    };

export interface JotSchema<T> {
  toJsonSchema(): JsonSchema;
  parse(value: unknown, path?: string): T;
}

interface NodeOptions {
  description?: string;
}

function describe(options: NodeOptions) {
  return options.description ? { description: options.description } : {};
}

class StringNode implements JotSchema<string> {
  constructor(readonly options: NodeOptions = {}) {}

  toJsonSchema(): JsonSchema {
    return { type: 'string', ...describe(this.options) };
  }

  parse(value: unknown, path: string = 'value'): string {
    if (typeof value !== 'string') {
      throw new TypeError(`${path} must be a string`);
    }

    return value;
  }
}

interface NumberNodeOptions extends NodeOptions {
  minimum?: number;
  maximum?: number;
}

class NumberNode implements JotSchema<number> {
  constructor(readonly options: NumberNodeOptions = {}) {}

  toJsonSchema(): JsonSchema {
    // Range is enforced by parse only.
    return { type: 'number', ...describe(this.options) };
  }

  parse(value: unknown, path: string = 'value'): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new TypeError(`${path} must be a finite number`);
    }
    const { minimum, maximum } = this.options;
    if ((minimum !== undefined && value < minimum) || (maximum !== undefined && value > maximum)) {
      throw new RangeError(`${path} must be within [${minimum ?? '-inf'}, ${maximum ?? 'inf'}]`);
    }

    return value;
  }
}

class EnumNode<TValue extends readonly string[]> implements JotSchema<TValue[number]> {
  constructor(readonly values: TValue, readonly options: NodeOptions = {}) {}

  toJsonSchema(): JsonSchema {
    return { type: 'string', enum: this.values, ...describe(this.options) };
  }

  parse(value: unknown, path: string = 'value'): TValue[number] {
    const match = this.values.find((candidate) => candidate === value);
    if (match === undefined) {
      throw new TypeError(`${path} must be one of ${this.values.join(', ')}`);
    }

    return match;
  }
}

class ArrayNode<T> implements JotSchema<T[]> {
  constructor(readonly itemNode: JotSchema<T>, readonly options: NodeOptions = {}) {}

  toJsonSchema(): JsonSchema {
    return { type: 'array', items: this.itemNode.toJsonSchema(), ...describe(this.options) };
  }

  parse(value: unknown, path: string = 'value'): T[] {
    if (!Array.isArray(value)) {
      throw new TypeError(`${path} must be an array`);
    }

    return value.map((item, index) => this.itemNode.parse(item, `${path}[${index}]`));
  }
}

export interface ObjectNodeOptions extends NodeOptions {
  allowAdditionalProperties?: boolean;
}

type ObjectShape = Record<string, JotSchema<unknown>>;

type InferShape<Shape extends ObjectShape> = { [K in keyof Shape]: InferJot<Shape[K]> };

class ObjectNode<Shape extends ObjectShape> implements JotSchema<InferShape<Shape>> {
  constructor(readonly shape: Shape, readonly options: ObjectNodeOptions = {}) {}

  toJsonSchema(): JsonSchema {
    const properties: Record<string, JsonSchema> = {};
    for (const [key, node] of Object.entries(this.shape)) {
      properties[key] = node.toJsonSchema();
    }

    return {
      type: 'object',
      properties,
      required: Object.keys(this.shape),
      additionalProperties: this.options.allowAdditionalProperties ?? false,
      ...describe(this.options),
    };
  }

  parse(value: unknown, path: string = 'value'): InferShape<Shape> {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      throw new TypeError(`${path} must be an object`);
    }

    const source = new Map<string, unknown>(Object.entries(value));
    const result: Record<string, unknown> = {};
    for (const [key, node] of Object.entries(this.shape)) {
      result[key] = node.parse(source.get(key), `${path}.${key}`);
    }

    return result as InferShape<Shape>;
  }
}

export type InferJot<TSchema> = TSchema extends JotSchema<infer TValue> ? TValue : never;

export const jot = {
  string: (options?: NodeOptions): JotSchema<string> => new StringNode(options),
  number: (options?: NumberNodeOptions): JotSchema<number> => new NumberNode(options),
  enum: <TValue extends readonly string[]>(values: TValue, options?: NodeOptions): JotSchema<TValue[number]> =>
    new EnumNode(values, options),
  array: <T>(schema: JotSchema<T>, options?: NodeOptions): JotSchema<T[]> => new ArrayNode(schema, options),
  object: <Shape extends ObjectShape>(shape: Shape, options?: ObjectNodeOptions) => new ObjectNode(shape, options),
};

/** Wraps a jot schema as a strict `json_schema` text format for the Responses API. */
export function compileJotSchema<T>(name: string, schema: JotSchema<T>): ResponseFormatTextJSONSchemaConfig {
  return {
    type: 'json_schema',
    name,
    schema: schema.toJsonSchema(),
    strict: true,
  };
}
