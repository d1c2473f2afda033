import type { Simplify, ValueOf } from 'type-fest';

import { identityKey, kindKey } from './identity';

/**
 * Opaque per-instance identity. See `identityKey`.
 */
export type IdentityToken = symbol;

/**
 * Auxiliary data attached to an item at creation time.
 *
 * The shape is deliberately open: the factories only check that it is a
 * mapping and that it does not use a reserved key.
 */
export type ItemData = Readonly<Record<string, unknown>>;

/**
 * Data type of an item created without auxiliary data.
 */
export type NoItemData = Record<never, never>;

/**
 * Keys an item sets itself; item data may not supply them.
 */
export type ReservedItemKey = 'Name' | 'EnumType';

/**
 * Names that collide with an enum's own surface; no member may use them.
 */
export type ReservedMemberName = 'Name' | 'GetEnumItems';

/**
 * Compile-time counterpart of the `ReservedKeyError` check.
 *
 * Intersected with the authored data so that `{ Name: 'x' }` is rejected at
 * the call site:
 *
 *   createItem('Color', 'Red', { Name: 'x' }); // compile error on `Name`
 */
export type ReservedKeyGuard = {
  readonly [Key in ReservedItemKey]?: never;
};

/**
 * Diagnostic rendering hook. `String(value)` and template literals go
 * through it; it is a symbol key so it can never collide with a member or a
 * data key.
 */
type Rendered = {
  readonly [Symbol.toPrimitive]: (hint?: string) => string;
};

type ItemFields<TType extends string, TName extends string> = {
  readonly Name: TName;
  readonly EnumType: TType;
};

/**
 * A single immutable enum member.
 *
 * @template TType - Name of the enum the item is created for.
 * @template TName - Member name.
 * @template TData - Auxiliary data copied onto the item.
 *
 * Example:
 *   const red = createItem('Color', 'Red', { hex: '#ff0000' });
 *   // red: EnumItem<'Color', 'Red', { hex: string }>
 *   red.hex;          // string
 *   String(red);      // 'Enum.Color.Red'
 */
export type EnumItem<
  TType extends string = string,
  TName extends string = string,
  TData extends ItemData = NoItemData
> = Readonly<TData> &
  ItemFields<TType, TName> & {
    readonly [identityKey]: IdentityToken;
    readonly [kindKey]: 'EnumItem';
  } & Rendered;

/**
 * Widest item type: any enum, any member, any data.
 */
export type AnyEnumItem = EnumItem<string, string, ItemData>;

/**
 * Member lookup of an enum: one read-only property per item, keyed by the
 * item's `Name`.
 *
 * Key remapping iterates the item union, so
 * `EnumMembers<EnumItem<'Color', 'Red'> | EnumItem<'Color', 'Blue'>>`
 * is `{ readonly Red: EnumItem<'Color', 'Red'>; readonly Blue: EnumItem<'Color', 'Blue'> }`.
 */
export type EnumMembers<TItem extends AnyEnumItem> = {
  readonly [Item in TItem as Item['Name']]: Item;
};

/**
 * Everything an enum exposes besides its members.
 */
export type EnumSurface<TName extends string, TItem extends AnyEnumItem> = {
  readonly Name: TName;
  /**
   * Returns a new array with every member, in construction order. Mutating
   * the array does not affect the enum or later calls.
   */
  GetEnumItems(): TItem[];
  readonly [identityKey]: IdentityToken;
  readonly [kindKey]: 'Enum';
} & Rendered;

/**
 * A complete, registered, immutable enumeration.
 */
export type Enum<
  TName extends string = string,
  TItem extends AnyEnumItem = AnyEnumItem
> = Simplify<EnumMembers<TItem>> & EnumSurface<TName, TItem>;

/**
 * Widest enum type. Member properties are not visible on it; keep the value
 * returned by `createEnum` for typed member access.
 */
export type AnyEnum = EnumSurface<string, AnyEnumItem>;

/**
 * Item union of an enum type.
 *
 * Example:
 *   type ColorItem = EnumItemOf<typeof Color>;
 */
export type EnumItemOf<TEnum extends AnyEnum> = ReturnType<
  TEnum['GetEnumItems']
>[number];

/**
 * Raw input of `createEnumFromMapping`: member name → auxiliary data.
 */
export type RawItemMapping = Readonly<Record<string, ItemData>>;

/**
 * Item union produced from a raw mapping. Numeric keys become string member
 * names, as they do at runtime.
 *
 * Example:
 *   ItemsFromMapping<'Size', { Small: {}; Large: { cm: number } }>
 *   // EnumItem<'Size', 'Small', {}> | EnumItem<'Size', 'Large', { cm: number }>
 */
export type ItemsFromMapping<
  TName extends string,
  TRaw extends RawItemMapping
> = Extract<
  ValueOf<{
    [Key in keyof TRaw & (string | number)]: EnumItem<
      TName,
      `${Key}`,
      TRaw[Key]
    >;
  }>,
  AnyEnumItem
>;
