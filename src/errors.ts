import { describeValue } from './type-utils';

/**
 * Failure taxonomy shared by the item factory, the enum factory and the
 * registry.
 *
 * - `InvalidArgumentType`: wrong value kind passed to a public operation.
 * - `ReservedKeyError`: item data uses `Name` or `EnumType`.
 * - `ReservedItemName`: a member is named `Name` or `GetEnumItems`.
 * - `DuplicateItem`: two members of one enum share a name.
 * - `DuplicateEnum`: the enum name is already registered.
 * - `EnumTypeMismatch`: an item was created for a different enum.
 */
export type EnumErrorCode =
  | 'InvalidArgumentType'
  | 'ReservedKeyError'
  | 'ReservedItemName'
  | 'DuplicateItem'
  | 'DuplicateEnum'
  | 'EnumTypeMismatch';

/**
 * Thrown synchronously by every public operation.
 *
 * The message is prefixed with the code (`DuplicateEnum: ...`), so a caller
 * logging only `error.message` still sees which rule failed.
 */
export class EnumError extends Error {
  readonly code: EnumErrorCode;

  constructor(code: EnumErrorCode, message: string) {
    super(`${code}: ${message}`);
    this.name = 'EnumError';
    this.code = code;
  }
}

/**
 * Narrows a caught value to `EnumError`, optionally of a specific code.
 */
export function isEnumError(
  error: unknown,
  code?: EnumErrorCode
): error is EnumError {
  if (!(error instanceof EnumError)) return false;
  return code === undefined || error.code === code;
}

/**
 * Builds the `InvalidArgumentType` error for a public operation argument.
 *
 * Example message:
 *   InvalidArgumentType: Expected enumType to be a non-empty string, received number
 */
export function invalidArgument(
  argument: string,
  expected: string,
  received: unknown
): EnumError {
  return new EnumError(
    'InvalidArgumentType',
    `Expected ${argument} to be ${expected}, received ${describeValue(received)}`
  );
}
