import { EnumError, invalidArgument } from './errors';
import {
  identityKey,
  isMintedItem,
  kindKey,
  mintIdentity,
  renderEnum,
  renderItem
} from './identity';
import { buildItem } from './item-factory';
import {
  EnumRegistry,
  duplicateEnum,
  globalEnumRegistry,
  type EnumIndex
} from './registry';
import type {
  AnyEnum,
  AnyEnumItem,
  Enum,
  ItemsFromMapping,
  RawItemMapping,
  ReservedMemberName
} from './types';
import { isRecord, stringKeysOf } from './type-utils';

const RESERVED_MEMBER_NAMES: ReadonlySet<string> = new Set<ReservedMemberName>(
  ['Name', 'GetEnumItems']
);

/**
 * Enum construction bound to one registry.
 */
export interface EnumFactory {
  /**
   * The registry every successful `createEnum` writes to.
   */
  readonly registry: EnumRegistry;

  /**
   * Read-only name lookup over `registry`.
   */
  readonly Enums: EnumIndex;

  /**
   * Independent shallow copy of `registry`'s name → enum mapping.
   */
  getEnums(): Record<string, AnyEnum>;

  /**
   * Assemble previously created items into an immutable enum and register it.
   *
   * Validation (first failure wins, items are checked in order):
   * 1. `InvalidArgumentType`: `enumName` is not a non-empty string, or
   *    `items` is not an array.
   * 2. `DuplicateEnum`: `enumName` is already registered.
   * 3. Per item:
   *    - `InvalidArgumentType`: not an item returned by `createItem` (a copy
   *      of one does not count);
   *    - `ReservedItemName`: named `Name` or `GetEnumItems`;
   *    - `DuplicateItem`: name already used by an earlier item;
   *    - `EnumTypeMismatch`: created for a different enum.
   *
   * The registry is written only after every check has passed, so a failed
   * call leaves no trace.
   *
   * Example:
   * ```ts
   * const Color = createEnum('Color', [
   *   createItem('Color', 'Red'),
   *   createItem('Color', 'Blue')
   * ]);
   *
   * Color.Red.Name;               // 'Red'
   * Color.GetEnumItems().length;  // 2
   * String(Color);                // 'Enum.Color'
   * ```
   */
  createEnum<TName extends string, TItems extends readonly AnyEnumItem[]>(
    enumName: TName,
    items: TItems
  ): Enum<TName, TItems[number]>;

  /**
   * Convenience path: one `createItem(enumName, memberName, data)` call per
   * entry of `rawItems`, then `createEnum`.
   *
   * Member order is `Object.keys(rawItems)` order (integer-like keys
   * ascending, then insertion order). It only affects `GetEnumItems()`.
   *
   * Example:
   * ```ts
   * const Size = createEnumFromMapping('Size', {
   *   Small: { cm: 10 },
   *   Large: { cm: 30 }
   * });
   *
   * Size.Large.cm; // 30
   * ```
   */
  createEnumFromMapping<TName extends string, TRaw extends RawItemMapping>(
    enumName: TName,
    rawItems: TRaw
  ): Enum<TName, ItemsFromMapping<TName, TRaw>>;
}

/**
 * Checks every item against the enum being assembled and returns the
 * accepted members keyed by name.
 */
function collectMembers(
  enumName: string,
  items: readonly AnyEnumItem[]
): Map<string, AnyEnumItem> {
  const members = new Map<string, AnyEnumItem>();

  for (const [position, item] of items.entries()) {
    // Copies of items share the identity but are mutable; only accept the
    // frozen originals.
    if (!isMintedItem(item)) {
      throw invalidArgument(`items[${position}]`, 'an enum item', item);
    }

    if (RESERVED_MEMBER_NAMES.has(item.Name)) {
      throw new EnumError(
        'ReservedItemName',
        `Enum "${enumName}" cannot contain an item named "${item.Name}"`
      );
    }

    if (members.has(item.Name)) {
      throw new EnumError(
        'DuplicateItem',
        `Enum "${enumName}" already contains an item named "${item.Name}"`
      );
    }

    if (item.EnumType !== enumName) {
      throw new EnumError(
        'EnumTypeMismatch',
        `${renderItem(item.EnumType, item.Name)} cannot be added to enum "${enumName}"`
      );
    }

    members.set(item.Name, item);
  }

  return members;
}

function assertEnumName(enumName: string): void {
  if (typeof enumName !== 'string' || enumName.length === 0) {
    throw invalidArgument('enumName', 'a non-empty string', enumName);
  }
}

/**
 * Untyped core of `createEnum`.
 */
function assembleEnum(
  registry: EnumRegistry,
  enumName: string,
  items: readonly AnyEnumItem[]
): AnyEnum {
  assertEnumName(enumName);
  if (!Array.isArray(items)) {
    throw invalidArgument('items', 'an array of enum items', items);
  }
  if (registry.has(enumName)) {
    throw duplicateEnum(enumName);
  }

  const members = collectMembers(enumName, items);

  // Own copy: later changes to the caller's array must not reach the enum.
  const ordered: readonly AnyEnumItem[] = Object.freeze([...items]);
  const rendered = renderEnum(enumName);

  const surface: AnyEnum = {
    Name: enumName,
    GetEnumItems: () => [...ordered],
    [identityKey]: mintIdentity(rendered),
    [kindKey]: 'Enum',
    [Symbol.toPrimitive]: () => rendered
  };

  // Members first: the surface keys win (reserved names are rejected above).
  const enumValue: AnyEnum = Object.freeze({
    ...Object.fromEntries(members),
    ...surface
  });

  registry.register(enumValue);

  return enumValue;
}

/**
 * Bind `createEnum` and `createEnumFromMapping` to a registry.
 *
 * Variants:
 * 1) `createEnumFactory()`
 *    - Uses a fresh, empty registry: an isolated namespace, e.g. one per
 *      test case.
 * 2) `createEnumFactory(registry)`
 *    - Shares `registry` with every other factory bound to it.
 *
 * The package-level `createEnum` / `createEnumFromMapping` are
 * `createEnumFactory(globalEnumRegistry)`.
 *
 * @param registry - Registry to read from and write to.
 * @returns Factory operations plus read access to the registry.
 */
export function createEnumFactory(
  registry: EnumRegistry = new EnumRegistry()
): EnumFactory {
  function createEnum<
    TName extends string,
    TItems extends readonly AnyEnumItem[]
  >(enumName: TName, items: TItems): Enum<TName, TItems[number]>;

  function createEnum(
    enumName: string,
    items: readonly AnyEnumItem[]
  ): AnyEnum {
    return assembleEnum(registry, enumName, items);
  }

  function createEnumFromMapping<
    TName extends string,
    TRaw extends RawItemMapping
  >(
    enumName: TName,
    rawItems: TRaw
  ): Enum<TName, ItemsFromMapping<TName, TRaw>>;

  function createEnumFromMapping(
    enumName: string,
    rawItems: RawItemMapping
  ): AnyEnum {
    assertEnumName(enumName);
    if (!isRecord(rawItems)) {
      throw invalidArgument('rawItems', 'a mapping', rawItems);
    }

    const items = stringKeysOf(rawItems).map(memberName =>
      buildItem(enumName, memberName, rawItems[memberName])
    );

    return assembleEnum(registry, enumName, items);
  }

  return {
    registry,
    Enums: registry.index,
    getEnums: () => registry.snapshot(),
    createEnum,
    createEnumFromMapping
  };
}

const globalFactory = createEnumFactory(globalEnumRegistry);

/**
 * `EnumFactory.createEnum` bound to the process-wide registry.
 */
export const createEnum: EnumFactory['createEnum'] = globalFactory.createEnum;

/**
 * `EnumFactory.createEnumFromMapping` bound to the process-wide registry.
 */
export const createEnumFromMapping: EnumFactory['createEnumFromMapping'] =
  globalFactory.createEnumFromMapping;
