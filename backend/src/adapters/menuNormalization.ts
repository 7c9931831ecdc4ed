import type { MenuCategory, MenuItem, MenuItemModifierList, SelectionType } from '../types/menuContracts';

export const UNCATEGORIZED_NAME = 'Other';

export const centsToDollars = (cents: number | null | undefined): number =>
  Math.round(cents ?? 0) / 100;

export const toSelectionType = (value: string | null | undefined): SelectionType =>
  value?.toUpperCase() === 'MULTIPLE' ? 'MULTIPLE' : 'SINGLE';

const CUSTOMIZATION_KEYWORDS: Array<{ tag: string; keywords: string[] }> = [
  { tag: 'size', keywords: ['size'] },
  { tag: 'ice', keywords: ['ice'] },
  { tag: 'milk', keywords: ['milk'] },
  { tag: 'sugar', keywords: ['sugar', 'sweet'] },
];

export const extractCustomizationTypes = (
  modifierLists: MenuItemModifierList[],
): string[] | undefined => {
  if (modifierLists.length === 0) {
    return undefined;
  }

  return modifierLists.map((list) => {
    const name = list.name.toLowerCase();
    const match = CUSTOMIZATION_KEYWORDS.find(({ keywords }) =>
      keywords.some((keyword) => name.includes(keyword)),
    );
    return match?.tag ?? 'other';
  });
};

const compareNames = (a: { name: string }, b: { name: string }) => {
  if (a.name < b.name) {
    return -1;
  }
  return a.name > b.name ? 1 : 0;
};

export type CategorizedItem = {
  categoryIds: string[];
  item: MenuItem;
};

export const groupIntoCategories = (
  categories: Array<{ id: string; name: string }>,
  items: CategorizedItem[],
): MenuCategory[] => {
  const placed = new Set<CategorizedItem>();
  const result: MenuCategory[] = [];

  for (const category of categories) {
    const members = items.filter((entry) => entry.categoryIds.includes(category.id));
    if (members.length === 0) {
      continue;
    }
    members.forEach((entry) => placed.add(entry));
    result.push({ name: category.name, items: members.map((entry) => entry.item) });
  }

  const remaining = items.filter((entry) => !placed.has(entry));
  if (remaining.length > 0) {
    result.push({ name: UNCATEGORIZED_NAME, items: remaining.map((entry) => entry.item) });
  }

  return result.sort(compareNames);
};
