import { describe, expect, it } from 'vitest';

import {
  EnumError,
  Enums,
  createEnum,
  createEnumFromMapping,
  createItem,
  equals,
  getEnums,
  isEnumError
} from './index';

describe('public API', () => {
  it('builds, registers and renders an enum', () => {
    const Planet = createEnum('Planet', [
      createItem('Planet', 'Mercury', { order: 1 }),
      createItem('Planet', 'Venus', { order: 2 })
    ]);

    expect(Planet.Venus.order).toBe(2);
    expect(String(Planet)).toBe('Enum.Planet');
    expect(String(Planet.Mercury)).toBe('Enum.Planet.Mercury');
    expect(Enums.Planet).toBe(Planet);
    expect(equals(getEnums()['Planet'], Planet)).toBe(true);
  });

  it('lets callers branch on the error code', () => {
    createEnumFromMapping('Metal', { Iron: {}, Gold: {} });

    let code: string | undefined;
    try {
      createEnumFromMapping('Metal', { Silver: {} });
    } catch (error) {
      if (!isEnumError(error)) throw error;
      code = error.code;
    }

    expect(code).toBe('DuplicateEnum');
  });

  it('exports the error class', () => {
    expect(() => createItem('Metal', 'Tin', { EnumType: undefined })).toThrow(
      EnumError
    );
  });
});
