import { CliError, type ErrorCode } from './errors.js';

export type OutputFormat = 'json' | 'text';

export interface SuccessResult {
  ok: true;
  [key: string]: unknown;
}

export interface ErrorResult {
  ok: false;
  error: {
    code: ErrorCode;
    message: string;
  };
}

export type Result = SuccessResult | ErrorResult;

/** Amounts and ids are bigints; they are written as decimal strings. */
function replacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export function toJson(data: unknown): string {
  return JSON.stringify(data, replacer, 2);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatTextOutput(data: Record<string, unknown>, indent = 0): string {
  const lines: string[] = [];
  const prefix = '  '.repeat(indent);
  for (const [key, value] of Object.entries(data)) {
    if (key === 'ok') continue;
    if (value === null || value === undefined) continue;
    if (isRecord(value)) {
      lines.push(`${prefix}${key}:`);
      lines.push(formatTextOutput(value, indent + 1));
    } else if (Array.isArray(value)) {
      lines.push(`${prefix}${key}:`);
      for (const item of value) {
        if (isRecord(item)) {
          lines.push(formatTextOutput(item, indent + 1));
          lines.push('');
        } else {
          lines.push(`${prefix}  - ${String(item)}`);
        }
      }
    } else {
      lines.push(`${prefix}${key}: ${String(value)}`);
    }
  }
  return lines.join('\n');
}

export function formatSuccess(data: Record<string, unknown>, format: OutputFormat): string {
  const result: SuccessResult = { ok: true, ...data };
  const json = toJson(result);
  if (format === 'json') return json;
  // round-trip so bigints and wallet references print as they do in JSON
  const plain: unknown = JSON.parse(json);
  return isRecord(plain) ? formatTextOutput(plain) : json;
}

export function outputSuccess(data: Record<string, unknown>, format: OutputFormat): void {
  console.log(formatSuccess(data, format));
}

export function toErrorResult(error: unknown): ErrorResult {
  let code: ErrorCode = 'ERR_INTERNAL';
  let message = 'An unexpected error occurred';

  if (error instanceof CliError) {
    code = error.code;
    message = error.message;
  } else if (error instanceof Error) {
    message = error.message;
  }

  return { ok: false, error: { code, message } };
}

export function outputError(error: unknown, format: OutputFormat): void {
  const result = toErrorResult(error);
  if (format === 'json') {
    console.error(JSON.stringify(result, null, 2));
  } else {
    console.error(`Error [${result.error.code}]: ${result.error.message}`);
  }
  process.exitCode = 1;
}
