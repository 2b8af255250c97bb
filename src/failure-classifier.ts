import type { FailureLink, FailureSignature } from './types.js';

/** Reads a property that may sit behind a throwing getter. */
function readSafely<T>(read: () => T, fallback: T): T {
  try {
    return read();
  } catch {
    return fallback;
  }
}

/** `String(value)`, or the `[object Tag]` form when the value has no usable conversion. */
export function describeValue(value: unknown): string {
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

function readCause(error: Error): unknown {
  return readSafely(() => error.cause, undefined);
}

/**
 * Walks an error and its `cause` chain, outermost first. Stops at the first
 * non-Error cause (which still contributes a link) or when the chain loops.
 */
function causeChain(error: unknown): unknown[] {
  const chain: unknown[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    chain.push(current);
    current = current instanceof Error ? readCause(current) : undefined;
  }

  return chain;
}

function readStack(error: Error): string {
  const stack = readSafely(() => error.stack, undefined);
  return typeof stack === 'string' ? stack : '';
}

function readMessage(error: Error): string {
  return describeValue(readSafely(() => error.message, '') ?? '');
}

function errorKind(error: Error): string {
  const name = readSafely(() => error.name, '');
  if (name && name !== 'Error') return describeValue(name);
  return readSafely(() => error.constructor?.name, '') || 'Error';
}

/** First `at ...` frame of a V8 stack trace, or '' when there is none. */
export function topStackFrame(error: Error): string {
  const stack = readStack(error);
  if (!stack) return '';
  const frame = stack
    .split('\n')
    .map(line => line.trim())
    .find(line => line.startsWith('at '));
  return frame ?? '';
}

function toLink(value: unknown): FailureLink {
  if (value instanceof Error) {
    return {
      kind: errorKind(value),
      message: readMessage(value),
      callSite: topStackFrame(value),
    };
  }
  return { kind: typeof value, message: describeValue(value), callSite: '' };
}

/**
 * Reduces an error to its structural signature: one (kind, message, call site)
 * link per error in the cause chain. Differing messages on any link give
 * different signatures, even when the root cause is the same.
 */
export function classifyFailure(error: unknown): FailureSignature {
  return causeChain(error).map(toLink);
}

/** Canonical key; equal keys mean structurally equal signatures. */
export function signatureKey(signature: FailureSignature): string {
  return JSON.stringify(signature.map(link => [link.kind, link.message, link.callSite]));
}

export function sameSignature(a: FailureSignature, b: FailureSignature): boolean {
  return signatureKey(a) === signatureKey(b);
}

function errorCode(error: Error): unknown {
  return readSafely(() => ('code' in error ? error.code : undefined), undefined);
}

/** True when any link in the chain is a socket error for a port already in use. */
export function isAddressInUse(error: unknown): boolean {
  return causeChain(error).some(
    link => link instanceof Error && errorCode(link) === 'EADDRINUSE'
  );
}

export function formatError(error: unknown): string {
  return causeChain(error)
    .map((link, depth) => {
      const text = link instanceof Error
        ? readStack(link) || `${errorKind(link)}: ${readMessage(link)}`
        : describeValue(link);
      return depth === 0 ? text : `  [cause]: ${text.split('\n').join('\n  ')}`;
    })
    .join('\n');
}
