import { describe, expect, it } from 'vitest';
import type { CloverCategory, CloverItem, CloverModifierGroup } from '../types/cloverContracts';
import { buildCloverMenu, buildCloverWeeklyHours, mapCloverOrderStatus } from './cloverCatalog';

const categories: CloverCategory[] = [
  { id: 'C-ESPRESSO', name: 'Espresso' },
  { id: 'C-BAKERY', name: 'Bakery' },
];

const modifierGroups: CloverModifierGroup[] = [
  {
    id: 'MG-SIZE',
    name: 'Cup Size',
    minRequired: 1,
    maxAllowed: 1,
    modifiers: {
      elements: [
        { id: 'M-12', name: '12 oz', price: 0 },
        { id: 'M-16', name: '16 oz', price: 60 },
        { id: 'M-20', name: '20 oz', price: 120, available: false },
      ],
    },
  },
  {
    id: 'MG-SWEET',
    name: 'Sweeteners',
    maxAllowed: 3,
    modifiers: { elements: [{ id: 'M-HONEY', name: 'Honey', price: 25 }] },
  },
  { id: 'MG-UNEXPANDED', name: 'Toppings' },
];

const items: CloverItem[] = [
  {
    id: 'I-AMERICANO',
    name: 'Americano',
    price: 325,
    categories: { elements: [{ id: 'C-ESPRESSO' }] },
    modifierGroups: { elements: [{ id: 'MG-SIZE' }, { id: 'MG-SWEET' }, { id: 'MG-UNEXPANDED' }] },
  },
  {
    id: 'I-CROISSANT',
    name: 'Croissant',
    price: 410,
    categories: { elements: [{ id: 'C-BAKERY' }] },
  },
  { id: 'I-WATER', name: 'Water', price: 100 },
  {
    id: 'I-SECRET',
    name: 'Off-menu Special',
    price: 900,
    hidden: true,
    categories: { elements: [{ id: 'C-ESPRESSO' }] },
  },
];

describe('buildCloverMenu', () => {
  it('groups visible items by category and sorts categories by name', () => {
    const menu = buildCloverMenu(categories, items, modifierGroups);

    expect(menu.map((entry) => [entry.name, entry.items.map((item) => item.id)])).toEqual([
      ['Bakery', ['I-CROISSANT']],
      ['Espresso', ['I-AMERICANO']],
      ['Other', ['I-WATER']],
    ]);
  });

  it('converts cents and derives modifier selection rules from the group limits', () => {
    const menu = buildCloverMenu(categories, items, modifierGroups);
    const americano = menu.find((entry) => entry.name === 'Espresso')?.items[0];

    expect(americano).toEqual({
      id: 'I-AMERICANO',
      name: 'Americano',
      price: 3.25,
      customizations: ['size', 'sugar'],
      modifierLists: [
        {
          id: 'MG-SIZE',
          name: 'Cup Size',
          selectionType: 'SINGLE',
          minSelections: 1,
          maxSelections: 1,
          modifiers: [
            { id: 'M-12', name: '12 oz', price: 0, isDefault: false },
            { id: 'M-16', name: '16 oz', price: 0.6, isDefault: false },
          ],
        },
        {
          id: 'MG-SWEET',
          name: 'Sweeteners',
          selectionType: 'MULTIPLE',
          minSelections: 0,
          maxSelections: 3,
          modifiers: [{ id: 'M-HONEY', name: 'Honey', price: 0.25, isDefault: false }],
        },
      ],
    });
  });

  it('has no variations or images', () => {
    const menu = buildCloverMenu(categories, items, modifierGroups);
    const croissant = menu[0]?.items[0];

    expect(croissant?.variations).toBeUndefined();
    expect(croissant?.imageURL).toBeUndefined();
    expect(croissant?.customizations).toBeUndefined();
    expect(croissant?.price).toBe(4.1);
  });

  it('drops unavailable items', () => {
    const menu = buildCloverMenu(
      [],
      [{ id: 'I-SOLD-OUT', name: 'Sold Out Scone', price: 300, available: false }],
      [],
    );

    expect(menu).toEqual([]);
  });
});

describe('mapCloverOrderStatus', () => {
  it('maps order and payment states', () => {
    expect(mapCloverOrderStatus({ state: 'open' })).toBe('SUBMITTED');
    expect(mapCloverOrderStatus({ state: 'locked' })).toBe('IN_PROGRESS');
    expect(mapCloverOrderStatus({ state: 'paid', paymentState: 'PAID' })).toBe('COMPLETED');
    expect(mapCloverOrderStatus({ state: 'paid', paymentState: 'PARTIALLY_PAID' })).toBe('IN_PROGRESS');
    expect(mapCloverOrderStatus({ state: 'paid', paymentState: 'REFUNDED' })).toBe('CANCELLED');
    expect(mapCloverOrderStatus({ state: 'paid', paymentState: 'PARTIALLY_REFUNDED' })).toBe('CANCELLED');
    expect(mapCloverOrderStatus({ state: 'paid' })).toBe('READY');
    expect(mapCloverOrderStatus({})).toBe('SUBMITTED');
  });
});

describe('buildCloverWeeklyHours', () => {
  it('converts HHMM slots into weekday periods', () => {
    const hours = buildCloverWeeklyHours([
      {
        id: 'OH-1',
        monday: { elements: [{ start: 700, end: 1500 }] },
        saturday: { elements: [{ start: 800, end: 1130 }, { start: 1300, end: 1700 }] },
      },
    ]);

    expect(hours).toEqual({
      MON: [{ startTime: '07:00', endTime: '15:00' }],
      SAT: [
        { startTime: '08:00', endTime: '11:30' },
        { startTime: '13:00', endTime: '17:00' },
      ],
    });
  });

  it('returns null when no day has hours', () => {
    expect(buildCloverWeeklyHours([{ id: 'OH-1', sunday: { elements: [] } }])).toBeNull();
  });
});
