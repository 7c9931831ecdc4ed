import type { MenuCategory, MenuItemModifierList } from '../types/menuContracts';
import type {
  CloverCategory,
  CloverItem,
  CloverModifierGroup,
  CloverOpeningHours,
  CloverOrder,
} from '../types/cloverContracts';
import { OrderStatus } from '../types/orderStatus';
import type { OrderStatusValue } from '../types/orderStatus';
import type { WeekdayKey } from '../types/menuContracts';
import { addPeriod, formatHhmm } from '../utils/businessHours';
import type { WeeklyHours } from '../utils/businessHours';
import { centsToDollars, extractCustomizationTypes, groupIntoCategories } from './menuNormalization';
import type { CategorizedItem } from './menuNormalization';

const toModifierList = (group: CloverModifierGroup): MenuItemModifierList | null => {
  const modifiers = group.modifiers?.elements;
  if (!modifiers) {
    return null;
  }

  const maxSelections = group.maxAllowed ?? 1;
  return {
    id: group.id,
    name: group.name,
    selectionType: maxSelections > 1 ? 'MULTIPLE' : 'SINGLE',
    minSelections: Math.max(0, group.minRequired ?? 0),
    maxSelections,
    modifiers: modifiers
      .filter((modifier) => modifier.available !== false)
      .map((modifier) => ({
        id: modifier.id,
        name: modifier.name,
        price: centsToDollars(modifier.price),
        isDefault: false,
      })),
  };
};

const isVisible = (item: CloverItem) => item.hidden !== true && item.available !== false;

export const buildCloverMenu = (
  categories: CloverCategory[],
  items: CloverItem[],
  modifierGroups: CloverModifierGroup[],
): MenuCategory[] => {
  const listsById = new Map<string, MenuItemModifierList>();
  for (const group of modifierGroups) {
    const list = toModifierList(group);
    if (list) {
      listsById.set(group.id, list);
    }
  }

  const entries: CategorizedItem[] = items.filter(isVisible).map((item) => {
    const modifierLists = (item.modifierGroups?.elements ?? []).flatMap((group) => {
      const list = listsById.get(group.id);
      return list ? [list] : [];
    });

    return {
      categoryIds: (item.categories?.elements ?? []).map((category) => category.id),
      item: {
        id: item.id,
        name: item.name,
        price: centsToDollars(item.price),
        customizations: extractCustomizationTypes(modifierLists),
        modifierLists,
      },
    };
  });

  return groupIntoCategories(categories, entries);
};

export const mapCloverOrderStatus = (
  order: Pick<CloverOrder, 'state' | 'paymentState'>,
): OrderStatusValue => {
  switch (order.state?.toLowerCase()) {
    case 'open':
      return OrderStatus.SUBMITTED;
    case 'locked':
      return OrderStatus.IN_PROGRESS;
    case 'paid':
      switch (order.paymentState?.toUpperCase()) {
        case 'PAID':
          return OrderStatus.COMPLETED;
        case 'PARTIALLY_PAID':
          return OrderStatus.IN_PROGRESS;
        case 'REFUNDED':
        case 'PARTIALLY_REFUNDED':
          return OrderStatus.CANCELLED;
        default:
          return OrderStatus.READY;
      }
    default:
      return OrderStatus.SUBMITTED;
  }
};

const CLOVER_DAYS: Array<[keyof Omit<CloverOpeningHours, 'id' | 'name'>, WeekdayKey]> = [
  ['sunday', 'SUN'],
  ['monday', 'MON'],
  ['tuesday', 'TUE'],
  ['wednesday', 'WED'],
  ['thursday', 'THU'],
  ['friday', 'FRI'],
  ['saturday', 'SAT'],
];

export const buildCloverWeeklyHours = (entries: CloverOpeningHours[]): WeeklyHours | null => {
  const weeklyHours: WeeklyHours = {};
  let periods = 0;

  for (const entry of entries) {
    for (const [field, day] of CLOVER_DAYS) {
      for (const slot of entry[field]?.elements ?? []) {
        addPeriod(weeklyHours, day, { startTime: formatHhmm(slot.start), endTime: formatHhmm(slot.end) });
        periods += 1;
      }
    }
  }

  return periods > 0 ? weeklyHours : null;
};
