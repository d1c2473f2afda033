import { expect } from 'vitest';

import { EnumError, isEnumError, type EnumErrorCode } from './errors';

/**
 * Calls a public operation with arguments its signature would reject, the
 * way untyped callers can.
 */
export function callUnchecked(
  operation: (...args: never[]) => unknown,
  ...args: unknown[]
): unknown {
  return Reflect.apply(operation, undefined, args);
}

export function captureError(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the action to throw');
}

export function expectEnumError(
  action: () => unknown,
  code: EnumErrorCode,
  message: string
): void {
  const error = captureError(action);

  expect(error).toBeInstanceOf(EnumError);
  expect(isEnumError(error, code)).toBe(true);
  expect(error instanceof Error ? error.message : undefined).toBe(
    `${code}: ${message}`
  );
}
