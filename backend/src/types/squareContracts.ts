import { z } from 'zod';

export const SquareMoneySchema = z.object({
  amount: z.number().int(),
  currency: z.string(),
});

export const SquareItemVariationSchema = z.object({
  id: z.string(),
  type: z.string(),
  item_variation_data: z
    .object({
      name: z.string().nullish(),
      pricing_type: z.string().nullish(),
      price_money: SquareMoneySchema.nullish(),
      ordinal: z.number().int().nullish(),
    })
    .nullish(),
});

export const SquareModifierListInfoSchema = z.object({
  modifier_list_id: z.string(),
  min_selected_modifiers: z.number().int().nullish(),
  max_selected_modifiers: z.number().int().nullish(),
  enabled: z.boolean().nullish(),
  hidden_from_customer: z.boolean().nullish(),
});

export const SquareItemDataSchema = z.object({
  name: z.string(),
  description: z.string().nullish(),
  is_archived: z.boolean().nullish(),
  categories: z.array(z.object({ id: z.string(), ordinal: z.number().nullish() })).nullish(),
  variations: z.array(SquareItemVariationSchema).nullish(),
  image_ids: z.array(z.string()).nullish(),
  modifier_list_info: z.array(SquareModifierListInfoSchema).nullish(),
});

export const SquareModifierSchema = z.object({
  id: z.string(),
  type: z.string(),
  is_deleted: z.boolean().nullish(),
  modifier_data: z
    .object({
      name: z.string(),
      price_money: SquareMoneySchema.nullish(),
      ordinal: z.number().int().nullish(),
      modifier_list_id: z.string().nullish(),
      on_by_default: z.boolean().nullish(),
    })
    .nullish(),
});

export const SquareModifierListDataSchema = z.object({
  name: z.string(),
  ordinal: z.number().int().nullish(),
  selection_type: z.string().nullish(),
  modifiers: z.array(SquareModifierSchema).nullish(),
});

export const SquareCatalogObjectSchema = z.object({
  id: z.string(),
  type: z.string(),
  is_deleted: z.boolean().nullish(),
  category_data: z.object({ name: z.string() }).nullish(),
  item_data: SquareItemDataSchema.nullish(),
  image_data: z
    .object({
      name: z.string().nullish(),
      url: z.string().nullish(),
      caption: z.string().nullish(),
    })
    .nullish(),
  modifier_list_data: SquareModifierListDataSchema.nullish(),
});

export type SquareCatalogObject = z.infer<typeof SquareCatalogObjectSchema>;

export type SquareItemData = z.infer<typeof SquareItemDataSchema>;

export const SquareCatalogSearchResponseSchema = z.object({
  objects: z.array(SquareCatalogObjectSchema).nullish(),
  related_objects: z.array(SquareCatalogObjectSchema).nullish(),
  cursor: z.string().nullish(),
});

export const SquareErrorResponseSchema = z.object({
  errors: z
    .array(
      z.object({
        category: z.string(),
        code: z.string(),
        detail: z.string().nullish(),
        field: z.string().nullish(),
      }),
    )
    .nullish(),
});

export const SquareOrderSchema = z.object({
  id: z.string(),
  location_id: z.string(),
  state: z.string(),
  fulfillments: z
    .array(
      z.object({
        uid: z.string().nullish(),
        type: z.string(),
        state: z.string(),
      }),
    )
    .nullish(),
  created_at: z.string().nullish(),
  updated_at: z.string().nullish(),
});

export type SquareOrder = z.infer<typeof SquareOrderSchema>;

export const SquareOrderResponseSchema = z.object({
  order: SquareOrderSchema.nullish(),
});

const SquareBusinessHoursPeriodSchema = z.object({
  day_of_week: z.string(),
  start_local_time: z.string().nullish(),
  end_local_time: z.string().nullish(),
});

export const SquareLocationSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  business_hours: z
    .object({
      periods: z.array(SquareBusinessHoursPeriodSchema).nullish(),
    })
    .nullish(),
});

export type SquareLocation = z.infer<typeof SquareLocationSchema>;

export const SquareLocationsResponseSchema = z.object({
  locations: z.array(SquareLocationSchema).nullish(),
});

export const SquareLocationResponseSchema = z.object({
  location: SquareLocationSchema.nullish(),
});
