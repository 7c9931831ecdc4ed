import { describe, expect, it } from 'vitest';
import type { SquareCatalogObject } from '../types/squareContracts';
import { buildSquareMenu, mapSquareOrderStatus } from './squareCatalog';

const category = (id: string, name: string): SquareCatalogObject => ({
  id,
  type: 'CATEGORY',
  category_data: { name },
});

const variation = (id: string, name: string, cents: number, ordinal: number) => ({
  id,
  type: 'ITEM_VARIATION',
  item_variation_data: {
    name,
    price_money: { amount: cents, currency: 'USD' },
    ordinal,
  },
});

const catalog: SquareCatalogObject[] = [
  category('CAT-TEA', 'Tea'),
  category('CAT-COFFEE', 'Coffee'),
  category('CAT-EMPTY', 'Seasonal'),
  {
    id: 'ITEM-LATTE',
    type: 'ITEM',
    item_data: {
      name: 'Latte',
      categories: [{ id: 'CAT-COFFEE' }],
      variations: [variation('VAR-L', 'Large', 575, 2), variation('VAR-S', 'Small', 450, 1)],
      image_ids: ['IMG-MISSING', 'IMG-LATTE'],
      modifier_list_info: [
        { modifier_list_id: 'ML-MILK', min_selected_modifiers: -1, max_selected_modifiers: 1 },
        { modifier_list_id: 'ML-SYRUP' },
        { modifier_list_id: 'ML-HIDDEN', hidden_from_customer: true },
        { modifier_list_id: 'ML-DISABLED', enabled: false },
      ],
    },
  },
  {
    id: 'ITEM-CHAI',
    type: 'ITEM',
    item_data: {
      name: 'Chai',
      categories: [{ id: 'CAT-TEA' }],
      variations: [variation('VAR-C', 'Regular', 399, 0)],
    },
  },
  {
    id: 'ITEM-COOKIE',
    type: 'ITEM',
    item_data: { name: 'Cookie', variations: [] },
  },
  {
    id: 'ITEM-OLD',
    type: 'ITEM',
    item_data: { name: 'Retired Blend', is_archived: true, categories: [{ id: 'CAT-COFFEE' }] },
  },
  {
    id: 'ITEM-GONE',
    type: 'ITEM',
    is_deleted: true,
    item_data: { name: 'Deleted Mocha', categories: [{ id: 'CAT-COFFEE' }] },
  },
  {
    id: 'IMG-LATTE',
    type: 'IMAGE',
    image_data: { url: 'https://images.test/latte.jpg' },
  },
  {
    id: 'ML-MILK',
    type: 'MODIFIER_LIST',
    modifier_list_data: {
      name: 'Milk Options',
      selection_type: 'SINGLE',
      modifiers: [
        {
          id: 'MOD-WHOLE',
          type: 'MODIFIER',
          modifier_data: { name: 'Whole', on_by_default: true },
        },
        {
          id: 'MOD-OAT',
          type: 'MODIFIER',
          modifier_data: { name: 'Oat', price_money: { amount: 75, currency: 'USD' } },
        },
      ],
    },
  },
  {
    id: 'ML-SYRUP',
    type: 'MODIFIER_LIST',
    modifier_list_data: {
      name: 'Syrups',
      selection_type: 'MULTIPLE',
      modifiers: [
        {
          id: 'MOD-VANILLA',
          type: 'MODIFIER',
          modifier_data: { name: 'Vanilla', price_money: { amount: 50, currency: 'USD' } },
        },
      ],
    },
  },
  {
    id: 'ML-HIDDEN',
    type: 'MODIFIER_LIST',
    modifier_list_data: { name: 'Staff Only', modifiers: [] },
  },
  {
    id: 'ML-DISABLED',
    type: 'MODIFIER_LIST',
    modifier_list_data: { name: 'Ice Level', modifiers: [] },
  },
];

describe('buildSquareMenu', () => {
  it('groups items by category, sorted by name, with uncategorized items under Other', () => {
    const menu = buildSquareMenu(catalog);

    expect(menu.map((entry) => entry.name)).toEqual(['Coffee', 'Other', 'Tea']);
    expect(menu.map((entry) => entry.items.map((item) => item.name))).toEqual([
      ['Latte'],
      ['Cookie'],
      ['Chai'],
    ]);
  });

  it('sorts variations by ordinal and prices the item from the first one', () => {
    const [coffee] = buildSquareMenu(catalog);
    const latte = coffee?.items[0];

    expect(latte?.price).toBe(4.5);
    expect(latte?.variations).toEqual([
      { id: 'VAR-S', name: 'Small', price: 4.5, ordinal: 1 },
      { id: 'VAR-L', name: 'Large', price: 5.75, ordinal: 2 },
    ]);
    expect(latte?.imageURL).toBe('https://images.test/latte.jpg');
  });

  it('keeps visible modifier lists with their selection bounds', () => {
    const [coffee] = buildSquareMenu(catalog);
    const latte = coffee?.items[0];

    expect(latte?.modifierLists).toEqual([
      {
        id: 'ML-MILK',
        name: 'Milk Options',
        selectionType: 'SINGLE',
        minSelections: 0,
        maxSelections: 1,
        modifiers: [
          { id: 'MOD-WHOLE', name: 'Whole', price: 0, isDefault: true },
          { id: 'MOD-OAT', name: 'Oat', price: 0.75, isDefault: false },
        ],
      },
      {
        id: 'ML-SYRUP',
        name: 'Syrups',
        selectionType: 'MULTIPLE',
        minSelections: 0,
        maxSelections: 1,
        modifiers: [{ id: 'MOD-VANILLA', name: 'Vanilla', price: 0.5, isDefault: false }],
      },
    ]);
    expect(latte?.customizations).toEqual(['milk', 'other']);
  });

  it('keeps an unlimited maximum as the -1 Square sends', () => {
    const menu = buildSquareMenu([
      {
        id: 'ML-TOPPINGS',
        type: 'MODIFIER_LIST',
        modifier_list_data: { name: 'Toppings', selection_type: 'MULTIPLE', modifiers: [] },
      },
      {
        id: 'ITEM-BYO',
        type: 'ITEM',
        item_data: {
          name: 'Build Your Own',
          modifier_list_info: [{ modifier_list_id: 'ML-TOPPINGS', max_selected_modifiers: -1 }],
        },
      },
    ]);

    expect(menu[0]?.items[0]?.modifierLists).toEqual([
      {
        id: 'ML-TOPPINGS',
        name: 'Toppings',
        selectionType: 'MULTIPLE',
        minSelections: 0,
        maxSelections: -1,
        modifiers: [],
      },
    ]);
  });

  it('prices items without variations at zero and leaves optional fields unset', () => {
    const menu = buildSquareMenu(catalog);
    const cookie = menu.find((entry) => entry.name === 'Other')?.items[0];

    expect(cookie).toEqual({
      id: 'ITEM-COOKIE',
      name: 'Cookie',
      price: 0,
      variations: undefined,
      customizations: undefined,
      imageURL: undefined,
      modifierLists: [],
    });
  });

  it('produces the same menu for the same catalog', () => {
    expect(buildSquareMenu(catalog)).toEqual(buildSquareMenu(catalog));
  });

  it('returns an empty menu for an empty catalog', () => {
    expect(buildSquareMenu([])).toEqual([]);
  });
});

describe('mapSquareOrderStatus', () => {
  it('maps order states', () => {
    expect(mapSquareOrderStatus({ state: 'COMPLETED' })).toBe('COMPLETED');
    expect(mapSquareOrderStatus({ state: 'CANCELED' })).toBe('CANCELLED');
    expect(mapSquareOrderStatus({ state: 'OPEN' })).toBe('IN_PROGRESS');
    expect(mapSquareOrderStatus({ state: 'DRAFT' })).toBe('DRAFT');
    expect(mapSquareOrderStatus({ state: 'SOMETHING_NEW' })).toBe('SUBMITTED');
  });

  it('refines open orders from the pickup fulfillment', () => {
    const open = (state: string) =>
      mapSquareOrderStatus({
        state: 'OPEN',
        fulfillments: [
          { type: 'SHIPMENT', state: 'FULFILLED' },
          { type: 'PICKUP', state },
        ],
      });

    expect(open('PROPOSED')).toBe('SUBMITTED');
    expect(open('RESERVED')).toBe('IN_PROGRESS');
    expect(open('PREPARED')).toBe('READY');
    expect(open('FULFILLED')).toBe('COMPLETED');
    expect(open('CANCELED')).toBe('CANCELLED');
    expect(open('FAILED')).toBe('IN_PROGRESS');
  });

  it('matches states regardless of case', () => {
    expect(mapSquareOrderStatus({ state: 'completed' })).toBe('COMPLETED');
    expect(mapSquareOrderStatus({ state: 'Canceled' })).toBe('CANCELLED');
    expect(
      mapSquareOrderStatus({ state: 'open', fulfillments: [{ type: 'PICKUP', state: 'prepared' }] }),
    ).toBe('READY');
  });
});
