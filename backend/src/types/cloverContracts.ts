import { z } from 'zod';

const elementsOf = <T extends z.ZodTypeAny>(schema: T) =>
  z.object({
    elements: z.array(schema).nullish(),
  });

export const CloverCategorySchema = z.object({
  id: z.string(),
  name: z.string(),
  sortOrder: z.number().int().nullish(),
});

export type CloverCategory = z.infer<typeof CloverCategorySchema>;

export const CloverModifierSchema = z.object({
  id: z.string(),
  name: z.string(),
  price: z.number().int().nullish(),
  available: z.boolean().nullish(),
});

export const CloverModifierGroupSchema = z.object({
  id: z.string(),
  name: z.string(),
  showByDefault: z.boolean().nullish(),
  alternateName: z.string().nullish(),
  minRequired: z.number().int().nullish(),
  maxAllowed: z.number().int().nullish(),
  modifiers: elementsOf(CloverModifierSchema).nullish(),
});

export type CloverModifierGroup = z.infer<typeof CloverModifierGroupSchema>;

export const CloverItemSchema = z.object({
  id: z.string(),
  name: z.string(),
  price: z.number().int().nullish(),
  priceType: z.string().nullish(),
  hidden: z.boolean().nullish(),
  available: z.boolean().nullish(),
  categories: elementsOf(CloverCategorySchema.pick({ id: true }).passthrough()).nullish(),
  modifierGroups: elementsOf(CloverModifierGroupSchema.pick({ id: true }).passthrough()).nullish(),
});

export type CloverItem = z.infer<typeof CloverItemSchema>;

export const CloverCategoriesResponseSchema = elementsOf(CloverCategorySchema);
export const CloverItemsResponseSchema = elementsOf(CloverItemSchema);
export const CloverModifierGroupsResponseSchema = elementsOf(CloverModifierGroupSchema);

export const CloverOrderResponseSchema = z.object({
  id: z.string(),
  currency: z.string().nullish(),
  total: z.number().int().nullish(),
  paymentState: z.string().nullish(),
  state: z.string().nullish(),
  createdTime: z.number().nullish(),
  modifiedTime: z.number().nullish(),
});

export type CloverOrder = z.infer<typeof CloverOrderResponseSchema>;

export const CloverErrorResponseSchema = z.object({
  message: z.string(),
  type: z.string().nullish(),
});

const CloverDayHoursSchema = elementsOf(
  z.object({
    start: z.number().int(),
    end: z.number().int(),
  }),
);

export const CloverOpeningHoursSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  sunday: CloverDayHoursSchema.nullish(),
  monday: CloverDayHoursSchema.nullish(),
  tuesday: CloverDayHoursSchema.nullish(),
  wednesday: CloverDayHoursSchema.nullish(),
  thursday: CloverDayHoursSchema.nullish(),
  friday: CloverDayHoursSchema.nullish(),
  saturday: CloverDayHoursSchema.nullish(),
});

export type CloverOpeningHours = z.infer<typeof CloverOpeningHoursSchema>;

export const CloverOpeningHoursResponseSchema = elementsOf(CloverOpeningHoursSchema);
