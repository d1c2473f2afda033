import { EnumError, invalidArgument } from './errors';
import {
  identityKey,
  kindKey,
  mintIdentity,
  recordMintedItem,
  renderItem
} from './identity';
import type {
  AnyEnumItem,
  EnumItem,
  ItemData,
  NoItemData,
  ReservedItemKey,
  ReservedKeyGuard
} from './types';
import { isRecord } from './type-utils';

const RESERVED_ITEM_KEYS: readonly ReservedItemKey[] = ['Name', 'EnumType'];

/**
 * Create a single immutable enum member.
 *
 * Behavior:
 * - Copies the own enumerable properties of `data` (shallow) onto a new
 *   object, then sets `Name` and `EnumType`.
 * - Stamps a fresh identity token; see `equals` for the comparison rules.
 * - Freezes the result: no property can be added, removed or changed.
 * - Does not touch any registry. The item only becomes part of an enum when
 *   it is passed to `createEnum` for the enum named `enumType`.
 *
 * Failure modes (`EnumError`):
 * - `InvalidArgumentType`: `enumType` is not a non-empty string, `name` is not
 *   a string, or `data` is not a mapping.
 * - `ReservedKeyError`: `data` owns a `Name` or `EnumType` key.
 *
 * Example:
 * ```ts
 * const red = createItem('Color', 'Red', { hex: '#ff0000' });
 *
 * red.Name;      // 'Red'
 * red.EnumType;  // 'Color'
 * red.hex;       // '#ff0000'
 * `${red}`;      // 'Enum.Color.Red'
 * ```
 *
 * @param enumType - Name of the enum the item is created for.
 * @param name - Member name, unique within that enum.
 * @param data - Optional auxiliary data.
 */
export function createItem<
  TType extends string,
  TName extends string,
  TData extends ItemData = NoItemData
>(
  enumType: TType,
  name: TName,
  data?: TData & ReservedKeyGuard
): EnumItem<TType, TName, TData>;

export function createItem(
  enumType: string,
  name: string,
  data?: ItemData
): AnyEnumItem {
  return buildItem(enumType, name, data);
}

/**
 * Untyped core of `createItem`, shared with `createEnumFromMapping`.
 */
export function buildItem(
  enumType: string,
  name: string,
  data: ItemData = {}
): AnyEnumItem {
  if (typeof enumType !== 'string' || enumType.length === 0) {
    throw invalidArgument('enumType', 'a non-empty string', enumType);
  }
  if (typeof name !== 'string') {
    throw invalidArgument('name', 'a string', name);
  }
  if (!isRecord(data)) {
    throw invalidArgument('data', 'a mapping', data);
  }

  const rendered = renderItem(enumType, name);

  for (const key of RESERVED_ITEM_KEYS) {
    if (Object.hasOwn(data, key)) {
      throw new EnumError(
        'ReservedKeyError',
        `Item data for ${rendered} uses reserved key "${key}"`
      );
    }
  }

  // Reserved and internal keys come last so nothing in `data` can shadow them.
  const item: AnyEnumItem = {
    ...data,
    Name: name,
    EnumType: enumType,
    [identityKey]: mintIdentity(rendered),
    [kindKey]: 'EnumItem',
    [Symbol.toPrimitive]: () => rendered
  };

  Object.freeze(item);
  recordMintedItem(item);

  return item;
}
