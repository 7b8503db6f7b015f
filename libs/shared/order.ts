import { z } from 'zod';

export const OrderTypes = ['delivery', 'takeaway', 'dine_in'] as const;
export type OrderType = (typeof OrderTypes)[number];

export const PaymentMethods = ['cash', 'card', 'online'] as const;
export type PaymentMethod = (typeof PaymentMethods)[number];

export const OrderStatuses = [
  'pending',
  'confirmed',
  'preparing',
  'ready',
  'delivering',
  'completed',
  'cancelled',
] as const;
export type OrderStatus = (typeof OrderStatuses)[number];

export const MemberRoles = [
  'owner',
  'manager',
  'kitchen',
  'delivery',
  'customer',
] as const;
export type MemberRole = (typeof MemberRoles)[number];

export const STAFF_ROLES: readonly MemberRole[] = [
  'owner',
  'manager',
  'kitchen',
  'delivery',
];

export const isStaffRole = (role: string | null | undefined): boolean =>
  typeof role === 'string' && (STAFF_ROLES as readonly string[]).includes(role);

// Request limits carried over from the checkout flow
export const MAX_ITEMS_PER_ORDER = 50;
export const MIN_QUANTITY_PER_ITEM = 1;
export const MAX_QUANTITY_PER_ITEM = 100;
export const MAX_INGREDIENT_QUANTITY = 10;

export const SplitHalfSchema = z.enum(['first', 'second']);
export type SplitHalf = z.infer<typeof SplitHalfSchema>;

export const AddedIngredientSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional().default(''),
  quantity: z
    .number()
    .int()
    .min(1)
    .max(MAX_INGREDIENT_QUANTITY)
    .optional()
    .default(1),
  /** Explicit split attribution; when absent the name suffix decides. */
  half: SplitHalfSchema.optional(),
});

export const RemovedIngredientSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
});

export const LineItemVariantsSchema = z
  .object({
    size: z
      .object({ id: z.string().min(1), name: z.string().optional() })
      .nullish(),
    addedIngredients: z.array(AddedIngredientSchema).optional(),
    removedIngredients: z.array(RemovedIngredientSchema).optional(),
    isSplit: z.boolean().optional(),
    secondProduct: z
      .object({ id: z.string().min(1), name: z.string().optional() })
      .nullish(),
  })
  .passthrough()
  .superRefine((variants, ctx) => {
    if (variants.isSplit && !variants.secondProduct?.id) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['secondProduct'],
        message: 'split items must name their second product',
      });
    }
  });

export const ProposedLineItemSchema = z.object({
  menuItemId: z.string().min(1),
  name: z.string().min(1),
  quantity: z
    .number()
    .int()
    .min(MIN_QUANTITY_PER_ITEM)
    .max(MAX_QUANTITY_PER_ITEM),
  unitPrice: z.number().nonnegative(),
  subtotal: z.number().nonnegative(),
  note: z.string().optional(),
  variants: LineItemVariantsSchema.optional(),
});

export const PlaceOrderSchema = z.object({
  tenantId: z.string().uuid().optional(),
  orderId: z.string().uuid().optional(),
  items: z.array(ProposedLineItemSchema).min(1).max(MAX_ITEMS_PER_ORDER),
  orderType: z.enum(OrderTypes),
  paymentMethod: z.enum(PaymentMethods),
  customerName: z.string().trim().min(1),
  customerPhone: z.string().trim().min(1),
  customerEmail: z.string().email().optional(),
  deliveryAddress: z.string().optional(),
  deliveryCity: z.string().optional(),
  deliveryPostalCode: z.string().optional(),
  deliveryLatitude: z.number().min(-90).max(90).optional(),
  deliveryLongitude: z.number().min(-180).max(180).optional(),
  note: z.string().optional(),
  scheduledSlot: z.string().datetime({ offset: true }).optional(),
  cashierCustomerId: z.string().uuid().optional(),
  zone: z.string().optional(),
  status: z.enum(OrderStatuses).optional(),
  subtotal: z.number().nonnegative(),
  deliveryFee: z.number().nonnegative().default(0),
  discount: z.number().nonnegative().optional(),
  total: z.number(),
});

export type AddedIngredientInput = z.infer<typeof AddedIngredientSchema>;
export type LineItemVariantsInput = z.infer<typeof LineItemVariantsSchema>;
export type ProposedLineItemInput = z.infer<typeof ProposedLineItemSchema>;
export type PlaceOrderInput = z.infer<typeof PlaceOrderSchema>;

export type PlaceOrderResponse = {
  success: true;
  orderId: string;
  orderNumber: string;
  total: number;
  corrected: boolean;
  clientSecret?: string;
  paymentIntentId?: string;
};

export type PaymentRetryResponse = {
  success: true;
  orderId: string;
  orderNumber: string;
  total: number;
  clientSecret: string;
  paymentIntentId: string;
};

export type VerifyPaymentResponse = {
  success: true;
  orderId: string;
  orderNumber: string;
  status: OrderStatus;
  paid: true;
  paymentIntentId: string;
};
