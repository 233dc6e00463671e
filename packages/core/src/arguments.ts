/**
 * @module arguments
 * Validation, defaulting and typed reads of tool arguments against the
 * catalog schema.
 */

import type {
  DraftSession,
  ToolArguments,
  ToolDescriptor,
  ToolErrorKind,
  ToolParameterType,
} from '@draftcast/types';
import { ToolCallError } from './errors.js';

export type ArgumentValidation =
  | { valid: true; args: ToolArguments }
  | { valid: false; kind: Extract<ToolErrorKind, 'MissingRequiredArgument' | 'InvalidArgument'>; error: string };

function ok(args: ToolArguments): ArgumentValidation {
  return { valid: true, args };
}

function missing(field: string): ArgumentValidation {
  return { valid: false, kind: 'MissingRequiredArgument', error: `Missing required argument: ${field}` };
}

function invalid(field: string, expected: ToolParameterType): ArgumentValidation {
  return { valid: false, kind: 'InvalidArgument', error: invalidMessage(field, expected) };
}

function invalidMessage(field: string, expected: ToolParameterType): string {
  return `Invalid argument '${field}': expected ${expected}`;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Whether `value` has the JSON type a schema property declares. */
export function matchesType(value: unknown, type: ToolParameterType): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'array':
      return Array.isArray(value);
    case 'object':
      return isRecord(value);
  }
}

/**
 * Check that every field `tool` requires is present. `null` and `undefined`
 * count as absent and are dropped from the returned arguments. Fields are
 * checked in schema order.
 */
export function checkRequired(tool: ToolDescriptor, args: ToolArguments): ArgumentValidation {
  const present: ToolArguments = {};
  for (const [key, value] of Object.entries(args)) {
    if (value !== null && value !== undefined) present[key] = value;
  }

  for (const field of tool.inputSchema.required ?? []) {
    if (!(field in present)) return missing(field);
  }
  return ok(present);
}

/** Check each declared field against its schema type. Undeclared fields pass unchecked. */
export function checkTypes(tool: ToolDescriptor, args: ToolArguments): ArgumentValidation {
  for (const [key, value] of Object.entries(args)) {
    const schema = tool.inputSchema.properties[key];
    if (schema && !matchesType(value, schema.type)) {
      return invalid(key, schema.type);
    }
  }
  return ok(args);
}

/**
 * Merge schema defaults, then the session's canvas size, then the caller's
 * values. Later sources win.
 */
export function mergeArguments(
  tool: ToolDescriptor,
  args: ToolArguments,
  session?: Pick<DraftSession, 'width' | 'height'>,
): ToolArguments {
  const merged: ToolArguments = {};
  for (const [key, schema] of Object.entries(tool.inputSchema.properties)) {
    if (schema.default !== undefined) merged[key] = schema.default;
  }
  if (session) {
    merged.width = session.width;
    merged.height = session.height;
  }
  return { ...merged, ...args };
}

// ── Typed reads ────────────────────────────────────────────────

export function readString(args: ToolArguments, key: string): string {
  const value = args[key];
  if (typeof value !== 'string') throw new ToolCallError('InvalidArgument', invalidMessage(key, 'string'));
  return value;
}

export function readNumber(args: ToolArguments, key: string): number {
  const value = args[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ToolCallError('InvalidArgument', invalidMessage(key, 'number'));
  }
  return value;
}

export function readBoolean(args: ToolArguments, key: string): boolean {
  const value = args[key];
  if (typeof value !== 'boolean') throw new ToolCallError('InvalidArgument', invalidMessage(key, 'boolean'));
  return value;
}

export function optionalString(args: ToolArguments, key: string): string | undefined {
  return args[key] === undefined ? undefined : readString(args, key);
}

export function optionalNumber(args: ToolArguments, key: string): number | undefined {
  return args[key] === undefined ? undefined : readNumber(args, key);
}

export function optionalArray(args: ToolArguments, key: string): unknown[] | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) throw new ToolCallError('InvalidArgument', invalidMessage(key, 'array'));
  return value;
}

/** An optional array whose every element must be an object. */
export function optionalRecords(args: ToolArguments, key: string): Record<string, unknown>[] | undefined {
  const items = optionalArray(args, key);
  if (items === undefined) return undefined;
  const records: Record<string, unknown>[] = [];
  for (const item of items) {
    if (!isRecord(item)) throw new ToolCallError('InvalidArgument', `Invalid argument '${key}': expected array of objects`);
    records.push(item);
  }
  return records;
}
