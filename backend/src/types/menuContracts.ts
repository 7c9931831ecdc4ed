import { z } from 'zod';

export const SelectionTypeSchema = z.enum(['SINGLE', 'MULTIPLE']);

export type SelectionType = z.infer<typeof SelectionTypeSchema>;

export const MenuItemModifierSchema = z.object({
  id: z.string(),
  name: z.string(),
  price: z.number(),
  isDefault: z.boolean(),
});

export type MenuItemModifier = z.infer<typeof MenuItemModifierSchema>;

export const MenuItemModifierListSchema = z.object({
  id: z.string(),
  name: z.string(),
  selectionType: SelectionTypeSchema,
  minSelections: z.number().int().nonnegative(),
  // Square sends -1 for an unlimited maximum.
  maxSelections: z.number().int().min(-1),
  modifiers: z.array(MenuItemModifierSchema),
});

export type MenuItemModifierList = z.infer<typeof MenuItemModifierListSchema>;

export const MenuItemVariationSchema = z.object({
  id: z.string(),
  name: z.string(),
  price: z.number(),
  ordinal: z.number().int(),
});

export type MenuItemVariation = z.infer<typeof MenuItemVariationSchema>;

export const MenuItemSchema = z.object({
  id: z.string(),
  name: z.string(),
  price: z.number(),
  variations: z.array(MenuItemVariationSchema).optional(),
  customizations: z.array(z.string()).optional(),
  imageURL: z.string().optional(),
  modifierLists: z.array(MenuItemModifierListSchema).optional(),
});

export type MenuItem = z.infer<typeof MenuItemSchema>;

export const MenuCategorySchema = z.object({
  name: z.string(),
  items: z.array(MenuItemSchema),
});

export type MenuCategory = z.infer<typeof MenuCategorySchema>;

// `timestamp` is epoch seconds.
export const CachedMenuSchema = z.object({
  categories: z.array(MenuCategorySchema),
  timestamp: z.number().nonnegative(),
});

export type CachedMenu = z.infer<typeof CachedMenuSchema>;

export type MenuSyncState = {
  readonly categories: readonly MenuCategory[];
  readonly isLoading: boolean;
  readonly errorMessage: string | null;
};

export type BusinessHoursPeriod = {
  startTime: string;
  endTime: string;
};

export const WEEKDAY_KEYS = ['SUN', 'MON', 'TUE', 'WED', 'THU', 'FRI', 'SAT'] as const;

export type WeekdayKey = (typeof WEEKDAY_KEYS)[number];

export type BusinessHoursInfo = {
  weeklyHours: Partial<Record<WeekdayKey, BusinessHoursPeriod[]>>;
  isCurrentlyOpen: boolean;
};
