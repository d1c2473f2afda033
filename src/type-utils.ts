/**
 * String-only keys of an object type.
 *
 * Example:
 *   type Sizes = { Small: {}; Large: {} };
 *   type Names = StringKeys<Sizes>; // 'Small' | 'Large'
 *
 * Equivalent forms:
 * - `Extract<keyof TObject, string>` (shown below)
 * - `keyof TObject & string` (intersection)
 */
export type StringKeys<TObject> = Extract<keyof TObject, string>;

/**
 * Typed `Object.keys` helper (string keys only).
 *
 * Why this exists:
 * - `Object.keys(obj)` returns the object’s **own enumerable string keys**,
 *   typed as `string[]`.
 * - Raw item mappings are authored as object literals, so the runtime keys
 *   match the static type and can be narrowed to `StringKeys<TObject>[]`.
 *
 * Note:
 * - This is a **type-level convenience**, not a runtime type guard.
 * - Order follows `Object.keys`: integer-like keys ascending, then the
 *   remaining keys in insertion order.
 */
export function stringKeysOf<TObject extends object>(
  obj: TObject
): Array<StringKeys<TObject>> {
  return Object.keys(obj) as Array<StringKeys<TObject>>;
}

/**
 * Plain mapping check used for auxiliary item data and raw item maps.
 *
 * Arrays and `null` are rejected; any other object counts as a mapping.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Short label for the kind of a value, used in `InvalidArgumentType` messages.
 */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
