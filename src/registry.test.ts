import { describe, expect, it } from 'vitest';

import {
  createEnum,
  createEnumFactory,
  createEnumFromMapping
} from './enum-factory';
import { equals } from './identity';
import { createItem } from './item-factory';
import { EnumRegistry, Enums, getEnums, globalEnumRegistry } from './registry';
import { expectEnumError } from './test-helpers';

describe('EnumRegistry', () => {
  it('starts empty', () => {
    const registry = new EnumRegistry();

    expect(registry.size).toBe(0);
    expect(registry.names()).toEqual([]);
    expect(registry.snapshot()).toEqual({});
    expect(registry.get('Color')).toBeUndefined();
  });

  it('lists names in registration order', () => {
    const { createEnum: create, registry } = createEnumFactory();

    create('Color', []);
    create('Size', []);
    create('Shape', []);

    expect(registry.names()).toEqual(['Color', 'Size', 'Shape']);
    expect(registry.size).toBe(3);
  });

  it('refuses to register a name twice', () => {
    const registry = new EnumRegistry();
    const first = createEnumFactory(registry).createEnum('Color', []);
    const other = createEnumFactory().createEnum('Color', []);

    expectEnumError(
      () => registry.register(other),
      'DuplicateEnum',
      'An enum named "Color" is already registered'
    );
    expect(registry.get('Color')).toBe(first);
  });

  it('returns independent snapshots', () => {
    const { createEnum: create, registry } = createEnumFactory();
    const Color = create('Color', []);

    const snapshot = registry.snapshot();
    delete snapshot.Color;
    snapshot.Size = Color;

    expect(registry.get('Color')).toBe(Color);
    expect(registry.has('Size')).toBe(false);
    expect(registry.snapshot()).toEqual({ Color });
  });

  describe('index', () => {
    it('looks enums up by name', () => {
      const { createEnum: create, registry } = createEnumFactory();
      const Color = create('Color', [createItem('Color', 'Red')]);

      expect(registry.index.Color).toBe(Color);
      expect(registry.index['Color']).toBe(Color);
      expect(registry.index.Missing).toBeUndefined();
      expect('Color' in registry.index).toBe(true);
      expect('Missing' in registry.index).toBe(false);
    });

    it('sees enums registered after it was taken', () => {
      const { createEnum: create, registry } = createEnumFactory();
      const index = registry.index;

      expect(index.Size).toBeUndefined();

      const Size = create('Size', []);

      expect(index.Size).toBe(Size);
    });

    it('enumerates registered names', () => {
      const { createEnum: create, registry } = createEnumFactory();
      const Color = create('Color', []);
      const Size = create('Size', []);

      expect(Object.keys(registry.index)).toEqual(['Color', 'Size']);
      expect({ ...registry.index }).toEqual({ Color, Size });
    });

    it('refuses writes', () => {
      const { createEnum: create, registry } = createEnumFactory();
      const Color = create('Color', []);

      expect(Reflect.set(registry.index, 'Size', Color)).toBe(false);
      expect(Reflect.set(registry.index, 'Color', undefined)).toBe(false);
      expect(Reflect.deleteProperty(registry.index, 'Color')).toBe(false);
      expect(() =>
        Object.defineProperty(registry.index, 'Size', { value: Color })
      ).toThrow(TypeError);

      expect(registry.index.Color).toBe(Color);
      expect(registry.has('Size')).toBe(false);
    });

    it('cannot be made non-extensible', () => {
      const { createEnum: create, registry } = createEnumFactory();
      const Color = create('Color', []);

      expect(() => Object.preventExtensions(registry.index)).toThrow(
        TypeError
      );
      expect(() => Object.freeze(registry.index)).toThrow(TypeError);
      expect(Reflect.preventExtensions(registry.index)).toBe(false);
      expect(Object.isExtensible(registry.index)).toBe(true);

      const Size = create('Size', []);

      expect(Object.keys(registry.index)).toEqual(['Color', 'Size']);
      expect({ ...registry.index }).toEqual({ Color, Size });
    });
  });
});

describe('global registry', () => {
  it('exposes enums created through the default factory', () => {
    const items = [
      createItem('GlobalShape', 'Circle'),
      createItem('GlobalShape', 'Square')
    ];

    const Shape = createEnum('GlobalShape', items);

    expect(Enums.GlobalShape).toBe(Shape);
    expect(getEnums()['GlobalShape']).toBe(Shape);
    expect(equals(getEnums()['GlobalShape'], Shape)).toBe(true);
    expect(globalEnumRegistry.get('GlobalShape')).toBe(Shape);
  });

  it('registers mapping-built enums', () => {
    const Weight = createEnumFromMapping('GlobalWeight', {
      Light: { kg: 1 },
      Heavy: { kg: 50 }
    });

    expect(Enums.GlobalWeight).toBe(Weight);
    expect(Weight.Heavy.kg).toBe(50);
  });

  it('rejects a second enum with a registered name', () => {
    createEnum('GlobalTwice', []);

    expectEnumError(
      () => createEnum('GlobalTwice', []),
      'DuplicateEnum',
      'An enum named "GlobalTwice" is already registered'
    );
  });

  it('hands out copies from getEnums', () => {
    const Level = createEnum('GlobalLevel', [createItem('GlobalLevel', 'Low')]);

    const copy = getEnums();
    delete copy.GlobalLevel;
    copy.GlobalFake = Level;

    expect(Enums.GlobalLevel).toBe(Level);
    expect(Enums.GlobalFake).toBeUndefined();
    expect(getEnums()['GlobalFake']).toBeUndefined();
    expect(getEnums()).not.toBe(getEnums());
  });

  it('is read-only through Enums', () => {
    const Mood = createEnum('GlobalMood', []);

    expect(Reflect.set(Enums, 'GlobalMood', undefined)).toBe(false);
    expect(Reflect.deleteProperty(Enums, 'GlobalMood')).toBe(false);
    expect(Enums.GlobalMood).toBe(Mood);
  });
});
