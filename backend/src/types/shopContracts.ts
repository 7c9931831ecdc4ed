import { z } from 'zod';

export const PosTypeSchema = z.enum(['square', 'clover']);

export type PosType = z.infer<typeof PosTypeSchema>;

export const POS_DISPLAY_NAMES: Record<PosType, string> = {
  square: 'Square',
  clover: 'Clover',
};

export const ShopSchema = z.object({
  id: z.string().trim().min(1, 'id is required'),
  name: z.string().trim().min(1, 'name is required'),
  address: z.string().trim().min(1, 'address is required'),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  phone: z.string().trim().min(1, 'phone is required'),
  website: z.string().default(''),
  description: z.string().default(''),
  imageName: z.string().default(''),
  stampName: z.string().default(''),
  merchantId: z.string().trim().min(1, 'merchantId is required'),
  posType: PosTypeSchema,
});

export type Shop = z.infer<typeof ShopSchema>;

export const ShopParamsSchema = z.object({
  shopId: z.string().trim().min(1, 'shopId is required'),
});
