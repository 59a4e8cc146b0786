import { describe, expect, test } from 'vitest';

import { makeToken } from '../testing/make-token';
import { ElementInventory } from './element-inventory';

describe('ElementInventory', () => {
  const pages = [
    {
      pageNo: 1,
      height: 1000,
      tokens: [
        makeToken('Title', 50, 50, { fontSize: 24 }),
        makeToken('body', 50, 500, { fontSize: 10 }),
        makeToken('note', 50, 900, { fontSize: 7 }),
      ],
    },
    {
      pageNo: 2,
      height: 1000,
      tokens: [makeToken('tiny', 50, 500, { fontSize: 4 })],
    },
  ];

  test('counts tokens by position band and size class', () => {
    const inventory = ElementInventory.capture(pages);

    expect(inventory.total).toBe(4);
    expect(inventory.byPosition).toEqual({ top: 1, middle: 2, bottom: 1 });
    expect(inventory.pages[0]).toEqual({
      pageNo: 1,
      total: 3,
      byPosition: { top: 1, middle: 1, bottom: 1 },
      bySize: { large: 1, standard: 1, small: 1, tiny: 0 },
    });
    expect(inventory.pages[1].bySize.tiny).toBe(1);
  });

  test('the inventory is frozen', () => {
    const inventory = ElementInventory.capture(pages);

    expect(Object.isFrozen(inventory)).toBe(true);
    expect(Object.isFrozen(inventory.pages[0].byPosition)).toBe(true);
  });

  test('classifies font sizes at the thresholds', () => {
    expect(ElementInventory.sizeClass(18.5)).toBe('large');
    expect(ElementInventory.sizeClass(18)).toBe('standard');
    expect(ElementInventory.sizeClass(10)).toBe('standard');
    expect(ElementInventory.sizeClass(6)).toBe('small');
    expect(ElementInventory.sizeClass(5.9)).toBe('tiny');
  });

  test('coverage is clamped to [0,1]', () => {
    const inventory = ElementInventory.capture(pages);

    expect(ElementInventory.coverage(inventory, 3)).toBe(0.75);
    expect(ElementInventory.coverage(inventory, 9)).toBe(1);
    expect(ElementInventory.coverage(ElementInventory.capture([]), 0)).toBe(0);
  });

  test('maps coverage to a status', () => {
    expect(ElementInventory.coverageStatus(0.85)).toBe('GOOD');
    expect(ElementInventory.coverageStatus(0.7)).toBe('WARNING');
    expect(ElementInventory.coverageStatus(0.69)).toBe('POOR');
  });
});
