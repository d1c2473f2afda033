import { EnumError } from './errors';
import type { AnyEnum } from './types';

/**
 * Read-only, name-indexed view of a registry.
 *
 * Lookups are live: an enum registered after the view was taken is visible
 * through it. Unknown names read as `undefined`.
 */
export type EnumIndex = Readonly<Record<string, AnyEnum | undefined>>;

/**
 * Builds the `EnumIndex` proxy over a registry's backing map.
 *
 * Supported:
 * - `index.Color`, `index['Color']`
 * - `'Color' in index`
 * - `Object.keys(index)`, `{ ...index }` (registered names, in registration order)
 *
 * Refused (trap returns `false`, so strict-mode code gets a `TypeError`):
 * - assignment, `delete`, `Object.defineProperty`
 * - `Object.preventExtensions`, `Object.seal`, `Object.freeze`
 */
function createIndex(enums: ReadonlyMap<string, AnyEnum>): EnumIndex {
  const target: Record<string, AnyEnum | undefined> = {};

  return new Proxy(target, {
    get(_target, property) {
      if (typeof property !== 'string') return undefined;
      return enums.get(property);
    },
    has(_target, property) {
      return typeof property === 'string' && enums.has(property);
    },
    ownKeys() {
      return [...enums.keys()];
    },
    getOwnPropertyDescriptor(_target, property) {
      if (typeof property !== 'string') return undefined;

      const value = enums.get(property);
      if (value === undefined) return undefined;

      // Must stay configurable: the proxy target itself has no such property.
      return { value, writable: false, enumerable: true, configurable: true };
    },
    set() {
      return false;
    },
    deleteProperty() {
      return false;
    },
    defineProperty() {
      return false;
    },
    // A non-extensible target would make `ownKeys` above violate the proxy
    // invariants, so the view can never be sealed or frozen.
    preventExtensions() {
      return false;
    }
  });
}

/**
 * Write-once store of enums keyed by enum name.
 *
 * - The only writer is the enum factory bound to this registry.
 * - A name can be registered once; there is no update, delete or reset.
 * - Reads never expose the backing map: `snapshot()` copies it and `index`
 *   is a read-only proxy.
 *
 * The process-wide instance is `globalEnumRegistry`. Code that needs an
 * isolated namespace (typically a test suite) creates its own registry and
 * passes it to `createEnumFactory`.
 */
export class EnumRegistry {
  private readonly enums = new Map<string, AnyEnum>();

  /**
   * Live, read-only name lookup over this registry.
   */
  readonly index: EnumIndex = createIndex(this.enums);

  get size(): number {
    return this.enums.size;
  }

  has(enumName: string): boolean {
    return this.enums.has(enumName);
  }

  get(enumName: string): AnyEnum | undefined {
    return this.enums.get(enumName);
  }

  /**
   * Registered enum names, in registration order.
   */
  names(): string[] {
    return [...this.enums.keys()];
  }

  /**
   * Registers a fully built enum under its `Name`.
   *
   * Check and insert happen without yielding, so two registrations of the
   * same name can never both succeed.
   *
   * @throws EnumError `DuplicateEnum` when the name is taken.
   */
  register(enumValue: AnyEnum): void {
    if (this.enums.has(enumValue.Name)) {
      throw duplicateEnum(enumValue.Name);
    }
    this.enums.set(enumValue.Name, enumValue);
  }

  /**
   * Independent shallow copy of the name → enum mapping.
   */
  snapshot(): Record<string, AnyEnum> {
    return Object.fromEntries(this.enums);
  }
}

export function duplicateEnum(enumName: string): EnumError {
  return new EnumError(
    'DuplicateEnum',
    `An enum named "${enumName}" is already registered`
  );
}

/**
 * Process-wide registry behind the default `createEnum`,
 * `createEnumFromMapping`, `Enums` and `getEnums`.
 */
export const globalEnumRegistry = new EnumRegistry();

/**
 * Global accessor: every enum created through the default factory, by name.
 *
 * ```ts
 * createEnum('Color', [createItem('Color', 'Red')]);
 * Enums.Color === Color; // true
 * Enums.Missing;         // undefined
 * ```
 */
export const Enums: EnumIndex = globalEnumRegistry.index;

/**
 * Independent shallow copy of the global name → enum mapping. Mutating the
 * result does not affect the registry.
 */
export function getEnums(): Record<string, AnyEnum> {
  return globalEnumRegistry.snapshot();
}
