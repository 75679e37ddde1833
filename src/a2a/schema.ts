/**
 * Zod schemas for agent-to-agent messages.
 *
 * A message is a closed union discriminated by `kind`. Requests are further
 * discriminated by `requestType`, each with its own payload schema. The
 * schemas validate messages arriving on the indirect (pub/sub) path, and
 * their inferred types are the message types used everywhere else.
 */
import { z } from 'zod';

// ─── Request Payloads ───────────────────────────────────────────

export const requestTypeSchema = z.enum([
  'search_products',
  'get_product_details',
  'create_cart',
  'add_to_cart',
  'update_cart_item',
  'remove_from_cart',
  'get_cart',
  'clear_cart',
  'analyze_style',
  'compare_prices',
  'process_checkout',
  'validate_order',
  'get_order_status',
  'cancel_order',
  'get_ads',
]);

const cartRef = { cartId: z.string().min(1) };
const orderRef = { orderId: z.string().min(1) };

export const requestPayloadSchemas = {
  search_products: z.object({
    query: z.string().min(1),
    filters: z.record(z.unknown()).optional(),
    limit: z.number().int().positive().optional(),
  }),
  get_product_details: z.object({ productId: z.string().min(1) }),
  create_cart: z.object({ ownerId: z.string().min(1) }),
  add_to_cart: z.object({
    ...cartRef,
    productId: z.string().min(1),
    quantity: z.number().int().positive(),
  }),
  update_cart_item: z.object({
    ...cartRef,
    productId: z.string().min(1),
    quantity: z.number().int().nonnegative(),
  }),
  remove_from_cart: z.object({ ...cartRef, productId: z.string().min(1) }),
  get_cart: z.object(cartRef),
  clear_cart: z.object(cartRef),
  analyze_style: z.object({
    description: z.string().optional(),
    imageUrl: z.string().url().optional(),
  }),
  compare_prices: z.object({
    productId: z.string().min(1),
    limit: z.number().int().positive().optional(),
  }),
  process_checkout: z.object({ ...cartRef, paymentMethod: z.string().optional() }),
  validate_order: z.object(orderRef),
  get_order_status: z.object(orderRef),
  cancel_order: z.object({ ...orderRef, reason: z.string().optional() }),
  get_ads: z.object({
    placement: z.string().optional(),
    keywords: z.array(z.string()).optional(),
  }),
} satisfies Record<z.infer<typeof requestTypeSchema>, z.ZodTypeAny>;

// ─── Common Fields ──────────────────────────────────────────────

const baseFields = {
  id: z.string().min(1),
  sender: z.string(),
  receiver: z.string(),
  conversationId: z.string().min(1),
  timestamp: z.coerce.date(),
  metadata: z.record(z.unknown()).default({}),
};

// ─── Variants ───────────────────────────────────────────────────

function requestVariant<T extends z.infer<typeof requestTypeSchema>, P extends z.ZodTypeAny>(
  requestType: T,
  content: P,
) {
  return z.object({
    ...baseFields,
    kind: z.literal('request'),
    requiresAck: z.boolean().default(true),
    requestType: z.literal(requestType),
    content,
  });
}

const p = requestPayloadSchemas;

export const requestMessageSchema = z.discriminatedUnion('requestType', [
  requestVariant('search_products', p.search_products),
  requestVariant('get_product_details', p.get_product_details),
  requestVariant('create_cart', p.create_cart),
  requestVariant('add_to_cart', p.add_to_cart),
  requestVariant('update_cart_item', p.update_cart_item),
  requestVariant('remove_from_cart', p.remove_from_cart),
  requestVariant('get_cart', p.get_cart),
  requestVariant('clear_cart', p.clear_cart),
  requestVariant('analyze_style', p.analyze_style),
  requestVariant('compare_prices', p.compare_prices),
  requestVariant('process_checkout', p.process_checkout),
  requestVariant('validate_order', p.validate_order),
  requestVariant('get_order_status', p.get_order_status),
  requestVariant('cancel_order', p.cancel_order),
  requestVariant('get_ads', p.get_ads),
]);

/** `error` is present exactly when `success` is false. */
export const responseMessageSchema = z
  .object({
    ...baseFields,
    kind: z.literal('response'),
    requiresAck: z.boolean().default(false),
    requestId: z.string().min(1),
    success: z.boolean(),
    error: z.string().min(1).optional(),
    content: z.unknown(),
  })
  .superRefine((message, ctx) => {
    if (message.success && message.error !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['error'],
        message: 'A successful response cannot carry an error',
      });
    }
    if (!message.success && message.error === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['error'],
        message: 'A failed response must carry an error',
      });
    }
  });

export const ackMessageSchema = z.object({
  ...baseFields,
  kind: z.literal('ack'),
  requiresAck: z.literal(false).default(false),
  ackForMessageId: z.string().min(1),
  success: z.boolean(),
  error: z.string().optional(),
});

export const notificationTypeSchema = z.enum([
  'agent_thinking',
  'agent_action',
  'agent_delegation',
  'agent_error',
  'agent_response',
]);

export const frontendNotificationSchema = z.object({
  ...baseFields,
  kind: z.literal('frontend_notification'),
  requiresAck: z.literal(false).default(false),
  notificationType: notificationTypeSchema,
  agentName: z.string().min(1),
  agentId: z.string().min(1),
  content: z.string(),
});

export const systemKindSchema = z.enum(['notification', 'error', 'heartbeat', 'register', 'deregister']);

function systemVariant<K extends z.infer<typeof systemKindSchema>>(kind: K) {
  return z.object({
    ...baseFields,
    kind: z.literal(kind),
    requiresAck: z.boolean().default(false),
    content: z.unknown(),
  });
}

// ─── Message Union ──────────────────────────────────────────────

export const a2aMessageSchema = z.union([
  requestMessageSchema,
  responseMessageSchema,
  ackMessageSchema,
  frontendNotificationSchema,
  systemVariant('notification'),
  systemVariant('error'),
  systemVariant('heartbeat'),
  systemVariant('register'),
  systemVariant('deregister'),
]);
