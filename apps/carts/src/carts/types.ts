import { z } from 'zod';

export const cartSchema = z.object({
  id: z.string().min(1),
  customerId: z.string().min(1),
});

export const itemSchema = z.object({
  id: z.string().min(1),
  cartId: z.string().min(1),
  itemId: z.string().min(1),
  quantity: z.number().int().min(1),
  unitPrice: z.number().min(0),
});

export type Cart = z.infer<typeof cartSchema>;

export type Item = z.infer<typeof itemSchema>;

export type CartDto = Cart & {
  items: Item[];
};

export type AddItemInput = {
  itemId: string;
  quantity?: number;
  unitPrice: number;
};

export type UpdateItemInput = {
  itemId: string;
  quantity: number;
  unitPrice?: number;
};
