import { z } from 'zod';
import { ValidationError, describeError } from '../errors';
import type { DynamicMapping, DynamicValue, PayloadValidator, ValidationResult } from '../interfaces';

/**
 * Wire-level parameter kinds a schema can demand
 */
export type ParameterKind = 'string' | 'bool' | 'int' | 'float' | 'mapping' | 'sequence';

/**
 * Extra check over the normalized payload. Returns an error message, or
 * nothing when the payload passes.
 */
export type PayloadRule = (payload: DynamicMapping) => string | undefined;

export interface OperationSchema {
  description?: string;
  /** Must be present and non-null */
  required?: readonly string[];
  /** Normalized to the given kind when present and non-null */
  parameters?: Readonly<Record<string, ParameterKind>>;
  /** Filled in when the key is missing */
  defaults?: DynamicMapping;
  rules?: readonly PayloadRule[];
}

type ParameterSchema = z.ZodType<DynamicValue, z.ZodTypeDef, unknown>;

const INTEGER_TEXT = /^[+-]?\d+$/;

function parseBoolText(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  const text = value.trim().toLowerCase();
  return text === 'true' ? true : text === 'false' ? false : value;
}

function parseIntText(value: unknown): unknown {
  return typeof value === 'string' && INTEGER_TEXT.test(value.trim()) ? Number.parseInt(value.trim(), 10) : value;
}

function parseFloatText(value: unknown): unknown {
  return typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value)) ? Number(value) : value;
}

const PARAMETER_SCHEMAS: Readonly<Record<ParameterKind, ParameterSchema>> = {
  string: z.preprocess(
    (value) => (typeof value === 'number' || typeof value === 'boolean' ? String(value) : value),
    z.string({ invalid_type_error: 'expected a string' }),
  ),
  bool: z.preprocess(parseBoolText, z.boolean({ invalid_type_error: 'expected true or false' })),
  int: z.preprocess(parseIntText, z.number({ invalid_type_error: 'expected an integer' }).int('expected an integer')),
  float: z.preprocess(parseFloatText, z.number({ invalid_type_error: 'expected a number' })),
  mapping: z.custom<DynamicMapping>((value) => value !== null && typeof value === 'object' && !Array.isArray(value), 'expected a mapping'),
  sequence: z.custom<DynamicValue[]>((value) => Array.isArray(value), 'expected a sequence'),
};

/**
 * Schema-driven payload validation. Operations without a registered schema
 * pass unchanged.
 *
 * @example
 * ```typescript
 * const validator = new StandardPayloadValidator();
 * validator.registerOperation('rename', {
 *   required: ['objectPath', 'name'],
 *   parameters: { name: 'string', recursive: 'bool' },
 *   defaults: { recursive: false },
 * });
 * ```
 */
export class StandardPayloadValidator implements PayloadValidator {
  private readonly schemas = new Map<string, OperationSchema>();

  registerOperation(operation: string, schema: OperationSchema): this {
    if (!operation) {
      throw new ValidationError('Operation name cannot be null or empty');
    }
    this.schemas.set(operation, schema);
    return this;
  }

  hasSchema(operation: string): boolean {
    return this.schemas.has(operation);
  }

  validate(payload: DynamicMapping, operation: string): ValidationResult {
    const normalized: DynamicMapping = { ...payload };
    const schema = this.schemas.get(operation);
    if (!schema) {
      return { isValid: true, errors: [], normalizedPayload: normalized };
    }

    const errors: string[] = [];

    for (const name of schema.required ?? []) {
      if (!(name in payload) || payload[name] === undefined) {
        errors.push(`Required parameter '${name}' is missing`);
      } else if (payload[name] === null) {
        errors.push(`Required parameter '${name}' cannot be null`);
      }
    }

    for (const [name, value] of Object.entries(schema.defaults ?? {})) {
      if (normalized[name] === undefined) {
        normalized[name] = value;
      }
    }

    for (const [name, kind] of Object.entries(schema.parameters ?? {})) {
      const value = payload[name];
      if (value === undefined || value === null) {
        continue;
      }
      const parsed = PARAMETER_SCHEMAS[kind].safeParse(value);
      if (parsed.success) {
        normalized[name] = parsed.data;
      } else {
        errors.push(`Parameter '${name}' type error: ${parsed.error.issues.map((issue) => issue.message).join(', ')}`);
      }
    }

    for (const rule of schema.rules ?? []) {
      try {
        const message = rule(normalized);
        if (message) {
          errors.push(message);
        }
      } catch (error: unknown) {
        errors.push(`Custom validation error: ${describeError(error)}`);
      }
    }

    return { isValid: errors.length === 0, errors, normalizedPayload: normalized };
  }
}
