export type {
  AnyEnum,
  AnyEnumItem,
  Enum,
  EnumItem,
  EnumItemOf,
  EnumMembers,
  IdentityToken,
  ItemData,
  ItemsFromMapping,
  NoItemData,
  RawItemMapping,
  ReservedItemKey,
  ReservedMemberName
} from './types';

export { createItem } from './item-factory';
export {
  createEnum,
  createEnumFromMapping,
  createEnumFactory,
  type EnumFactory
} from './enum-factory';
export {
  EnumRegistry,
  Enums,
  getEnums,
  globalEnumRegistry,
  type EnumIndex
} from './registry';

export { equals, isEnum, isEnumItem, isMemberOf } from './identity';
export { EnumError, isEnumError, type EnumErrorCode } from './errors';
