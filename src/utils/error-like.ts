// Structural view of thrown values. Errors raised by Node internals and native
// addons may come from another realm, so `instanceof Error` is not reliable.

export interface ValidationIssue {
  path: Array<string | number>;
  message: string;
  code: string;
}

export interface ErrorLike {
  name: string;
  message: string;
  stack?: string;
  code?: string;
  path?: string;
  issues?: ValidationIssue[];
}

function isValidationIssue(value: unknown): value is ValidationIssue {
  return (
    typeof value === 'object' &&
    value !== null &&
    'path' in value &&
    Array.isArray(value.path) &&
    'message' in value &&
    typeof value.message === 'string' &&
    'code' in value &&
    typeof value.code === 'string'
  );
}

/** Any object carrying a string `message`; null for everything else. */
export function toErrorLike(value: unknown): ErrorLike | null {
  if (typeof value !== 'object' || value === null) {
    return null;
  }
  if (!('message' in value) || typeof value.message !== 'string') {
    return null;
  }

  const errorLike: ErrorLike = {
    name: 'name' in value && typeof value.name === 'string' ? value.name : 'Error',
    message: value.message
  };
  if ('stack' in value && typeof value.stack === 'string') {
    errorLike.stack = value.stack;
  }
  if ('code' in value && typeof value.code === 'string') {
    errorLike.code = value.code;
  }
  if ('path' in value && typeof value.path === 'string') {
    errorLike.path = value.path;
  }
  if ('issues' in value && Array.isArray(value.issues)) {
    errorLike.issues = value.issues.filter(isValidationIssue);
  }
  return errorLike;
}

/** The `code` of a Node system error (`ENOENT`, `ERR_PARSE_ARGS_*`, `SQLITE_*`). */
export function errorCode(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string') {
    return value.code;
  }
  return undefined;
}

export function errorMessage(value: unknown): string {
  return toErrorLike(value)?.message ?? String(value);
}
