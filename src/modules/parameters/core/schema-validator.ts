/**
 * Parameters Module - Schema Validator
 *
 * Structural validation of descriptor arrays against a declarative schema:
 * a TypeBox root schema plus per-item conditional rules of the form
 * "when the value at path P matches R, the item must also satisfy S".
 *
 * Pure and deterministic. Business rules live in the processors.
 */

import { TypeGuard, type TSchema } from '@sinclair/typebox';
import { ValueErrorType, type ValueError } from '@sinclair/typebox/errors';
import { Value } from '@sinclair/typebox/value';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface StructuralError {
  /** Location inside the instance, e.g. `[0].values_source.type` */
  readonly path: string;
  readonly message: string;
}

export interface ConditionalRule {
  readonly description: string;
  readonly when: {
    /** Dotted path inside one array item, e.g. `values_source.type` */
    readonly path: string;
    readonly pattern: RegExp;
  };
  readonly then: TSchema;
}

export interface DescriptorSchema {
  readonly root: TSchema;
  readonly conditionals: readonly ConditionalRule[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Formatting
// ─────────────────────────────────────────────────────────────────────────────

const describeValue = (value: unknown): string => {
  if (value === undefined) return 'undefined';
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
};

/** `/0/values_source/type` → `[0].values_source.type` */
export const formatPointer = (pointer: string): string => {
  if (pointer === '') return 'root';

  return pointer
    .split('/')
    .slice(1)
    .map((segment) => segment.replace(/~1/g, '/').replace(/~0/g, '~'))
    .reduce(
      (acc, segment) =>
        /^\d+$/.test(segment) ? `${acc}[${segment}]` : acc === '' ? segment : `${acc}.${segment}`,
      ''
    );
};

const literalOptions = (schema: TSchema): unknown[] | undefined => {
  if (!TypeGuard.IsUnion(schema)) return undefined;
  const literals = schema.anyOf.flatMap((member) =>
    TypeGuard.IsLiteral(member) ? [member.const] : []
  );
  return literals.length === schema.anyOf.length ? literals : undefined;
};

const messageFor = (error: ValueError): string => {
  const { schema, value } = error;

  switch (error.type) {
    case ValueErrorType.ObjectRequiredProperty:
      return 'is required';
    case ValueErrorType.ObjectAdditionalProperties:
      return 'is not an allowed property';
    case ValueErrorType.Union: {
      const options = literalOptions(schema);
      if (options !== undefined) {
        return `must be one of: ${options.map(String).join(', ')} (got ${describeValue(value)})`;
      }
      return `does not match any allowed shape (got ${describeValue(value)})`;
    }
    case ValueErrorType.Literal:
      return `must equal ${describeValue(schema['const'])} (got ${describeValue(value)})`;
    case ValueErrorType.String:
      return `must be a string (got ${describeValue(value)})`;
    case ValueErrorType.StringPattern:
      return `must match ${String(schema['pattern'])} (got ${describeValue(value)})`;
    case ValueErrorType.StringMinLength:
      return `must be at least ${String(schema['minLength'])} character(s) long`;
    case ValueErrorType.Number:
      return `must be a number (got ${describeValue(value)})`;
    case ValueErrorType.Integer:
      return `must be an integer (got ${describeValue(value)})`;
    case ValueErrorType.Boolean:
      return `must be a boolean (got ${describeValue(value)})`;
    case ValueErrorType.Null:
      return `must be null (got ${describeValue(value)})`;
    case ValueErrorType.Object:
      return `must be an object (got ${describeValue(value)})`;
    case ValueErrorType.Array:
      return `must be an array (got ${describeValue(value)})`;
    case ValueErrorType.ArrayMinItems:
      return `must contain at least ${String(schema['minItems'])} item(s)`;
    case ValueErrorType.ArrayMaxItems:
      return `must contain at most ${String(schema['maxItems'])} item(s)`;
    default:
      return error.message;
  }
};

const toStructuralErrors = (errors: Iterable<ValueError>, prefix: string): StructuralError[] =>
  [...errors].map((error) => ({
    path: formatPointer(`${prefix}${error.path}`),
    message: messageFor(error),
  }));

// ─────────────────────────────────────────────────────────────────────────────
// Conditionals
// ─────────────────────────────────────────────────────────────────────────────

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const valueAtPath = (item: unknown, path: string): unknown => {
  let current: unknown = item;
  for (const key of path.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
};

const applyConditionals = (
  rules: readonly ConditionalRule[],
  item: unknown,
  index: number
): StructuralError[] =>
  rules.flatMap((rule) => {
    const selector = valueAtPath(item, rule.when.path);
    if (typeof selector !== 'string' || !rule.when.pattern.test(selector)) return [];
    return toStructuralErrors(Value.Errors(rule.then, item), `/${String(index)}`);
  });

// ─────────────────────────────────────────────────────────────────────────────
// Validator
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Validates an instance against a descriptor schema.
 * Returns an empty array when the instance is structurally valid.
 */
export const validateAgainstSchema = (
  schema: DescriptorSchema,
  instance: unknown
): StructuralError[] => {
  const errors = toStructuralErrors(Value.Errors(schema.root, instance), '');

  if (Array.isArray(instance)) {
    instance.forEach((item: unknown, index) => {
      errors.push(...applyConditionals(schema.conditionals, item, index));
    });
  }

  const seen = new Set<string>();
  return errors.filter((error) => {
    const key = `${error.path}\u0000${error.message}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
};

export const formatStructuralError = (error: StructuralError): string =>
  `${error.path}: ${error.message}`;
