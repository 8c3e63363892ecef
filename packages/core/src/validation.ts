import { z } from 'zod';
import { SchemaValidationError, type SchemaIssueDetail } from './errors';

type AnySchema = z.ZodTypeAny;
type PathSegment = string | number;

// issue codes zod reports when a required value is simply absent
const MISSING_VALUE_CODES = new Set<string>([
  z.ZodIssueCode.invalid_type,
  z.ZodIssueCode.invalid_union,
  z.ZodIssueCode.invalid_literal,
  z.ZodIssueCode.invalid_enum_value
]);

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const lookup = (root: unknown, path: readonly PathSegment[]): { found: boolean; value: unknown } => {
  let current: unknown = root;
  for (const segment of path) {
    if (Array.isArray(current) && typeof segment === 'number') {
      if (segment >= current.length) return { found: false, value: undefined };
      current = current[segment];
      continue;
    }
    if (isRecord(current) && Object.prototype.hasOwnProperty.call(current, segment)) {
      current = current[String(segment)];
      continue;
    }
    return { found: false, value: undefined };
  }
  return { found: true, value: current };
};

export const valueAtPath = (root: unknown, path: readonly PathSegment[]): unknown => lookup(root, path).value;

export const toJsonPointer = (path: readonly PathSegment[]): string =>
  path.length
    ? path.map((segment) => `/${String(segment).replace(/~/g, '~0').replace(/\//g, '~1')}`).join('')
    : '/';

export const describeValue = (value: unknown): string => {
  if (typeof value === 'string') return `'${value}'`;
  if (typeof value === 'number' || typeof value === 'bigint' || value === undefined) return String(value);
  return JSON.stringify(value) ?? String(value);
};

const describeBound = (issue: (z.ZodTooSmallIssue | z.ZodTooBigIssue) & { message: string }, value: unknown): string => {
  if (issue.type !== 'number') return issue.message;
  if (issue.code === z.ZodIssueCode.too_small) {
    return issue.inclusive
      ? `${describeValue(value)} is less than the minimum of ${String(issue.minimum)}`
      : `${describeValue(value)} is less than or equal to the minimum of ${String(issue.minimum)}`;
  }
  return issue.inclusive
    ? `${describeValue(value)} is greater than the maximum of ${String(issue.maximum)}`
    : `${describeValue(value)} is greater than or equal to the maximum of ${String(issue.maximum)}`;
};

export const formatIssue = (issue: z.ZodIssue, input: unknown): SchemaIssueDetail => {
  const { found, value } = lookup(input, issue.path);
  const pointer = toJsonPointer(issue.path);

  if (!found && issue.path.length && MISSING_VALUE_CODES.has(issue.code)) {
    const key = issue.path[issue.path.length - 1];
    return {
      pointer: toJsonPointer(issue.path.slice(0, -1)),
      constraint: 'required',
      message: `'${String(key)}' is a required property`
    };
  }

  switch (issue.code) {
    case z.ZodIssueCode.invalid_type:
      return { pointer, constraint: 'type', message: `${describeValue(value)} is not of type '${issue.expected}'` };
    case z.ZodIssueCode.invalid_enum_value:
      return {
        pointer,
        constraint: 'enum',
        message: `${describeValue(value)} is not one of [${issue.options.map(describeValue).join(', ')}]`
      };
    case z.ZodIssueCode.invalid_literal:
      return { pointer, constraint: 'const', message: `${describeValue(value)} was expected to be ${describeValue(issue.expected)}` };
    case z.ZodIssueCode.too_small:
      return { pointer, constraint: 'minimum', message: describeBound(issue, value) };
    case z.ZodIssueCode.too_big:
      return { pointer, constraint: 'maximum', message: describeBound(issue, value) };
    case z.ZodIssueCode.unrecognized_keys:
      return {
        pointer,
        constraint: 'additionalProperties',
        message: `Additional properties are not allowed (${issue.keys.map(describeValue).join(', ')} ${
          issue.keys.length === 1 ? 'was' : 'were'
        } unexpected)`
      };
    case z.ZodIssueCode.invalid_string:
      return {
        pointer,
        constraint: typeof issue.validation === 'string' ? issue.validation : 'format',
        message: `${describeValue(value)} ${issue.message}`
      };
    case z.ZodIssueCode.custom:
      return { pointer, constraint: 'custom', message: `${describeValue(value)} ${issue.message}` };
    default:
      return { pointer, constraint: issue.code, message: issue.message };
  }
};

export const safeParse = <Schema extends AnySchema>(schema: Schema, value: unknown): z.output<Schema> => {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }
  throw new SchemaValidationError(result.error.issues.map((issue) => formatIssue(issue, value)));
};
