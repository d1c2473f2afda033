import type { AnyEnum, AnyEnumItem, IdentityToken } from './types';

/**
 * Property key of the identity token carried by every item and enum.
 *
 * The token is a per-instance `symbol`: it cannot be forged from outside and
 * two tokens are never equal unless they are the same token. Because the key
 * is an own enumerable symbol property, a shallow copy (`{ ...item }`) keeps
 * the original token and therefore the original identity.
 */
export const identityKey: unique symbol = Symbol('closed-enum.identity');

/**
 * Property key of the kind tag (`'EnumItem'` or `'Enum'`).
 *
 * A value is an item or an enum because it was stamped as one, not because
 * it happens to have a `Name` field.
 */
export const kindKey: unique symbol = Symbol('closed-enum.kind');

export type ValueKind = 'EnumItem' | 'Enum';

/**
 * Mints a fresh identity token. The label only shows up in debuggers.
 */
export function mintIdentity(label: string): IdentityToken {
  return Symbol(label);
}

/**
 * Items frozen by the item factory. Only these can join an enum: a shallow
 * copy shares the identity token but is neither frozen nor minted.
 */
const mintedItems = new WeakSet<AnyEnumItem>();

export function recordMintedItem(item: AnyEnumItem): void {
  mintedItems.add(item);
}

/**
 * Whether `value` is an item returned by the item factory itself, as
 * opposed to a copy of one.
 */
export function isMintedItem(value: unknown): value is AnyEnumItem {
  return isEnumItem(value) && mintedItems.has(value);
}

function hasKind(value: unknown, kind: ValueKind): boolean {
  if (typeof value !== 'object' || value === null) return false;
  return Reflect.get(value, kindKey) === kind;
}

export function isEnumItem(value: unknown): value is AnyEnumItem {
  return hasKind(value, 'EnumItem');
}

export function isEnum(value: unknown): value is AnyEnum {
  return hasKind(value, 'Enum');
}

function identityOf(value: unknown): IdentityToken | undefined {
  if (isEnumItem(value) || isEnum(value)) return value[identityKey];
  return undefined;
}

/**
 * Identity equality for items and enums.
 *
 * Only the identity tokens are compared:
 * - two items created separately are unequal, even with identical `Name`,
 *   `EnumType` and data;
 * - a shallow copy of an item (or enum) equals its original;
 * - anything that is not an item or an enum is unequal to everything,
 *   including itself.
 */
export function equals(left: unknown, right: unknown): boolean {
  const token = identityOf(left);
  if (token === undefined) return false;
  return token === identityOf(right);
}

/**
 * Whether `value` is one of the members of `enumValue` (by identity).
 */
export function isMemberOf(enumValue: AnyEnum, value: unknown): boolean {
  if (!isEnumItem(value)) return false;
  return enumValue.GetEnumItems().some(member => equals(member, value));
}

/**
 * Diagnostic rendering of an item: `Enum.<EnumType>.<Name>`.
 * Not a parseable format.
 */
export function renderItem(enumType: string, name: string): string {
  return `Enum.${enumType}.${name}`;
}

/**
 * Diagnostic rendering of an enum: `Enum.<Name>`.
 */
export function renderEnum(enumName: string): string {
  return `Enum.${enumName}`;
}
