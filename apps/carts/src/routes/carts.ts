import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import type { CartService } from '../carts/cart-service';
import { parseBody, parseParams, parseQuery } from './utils';

type RegisterCartRoutesOptions = {
  cartService: CartService;
};

const customerParamsSchema = z.object({
  customerId: z.string().min(1).max(120),
});

const itemParamsSchema = customerParamsSchema.extend({
  itemId: z.string().min(1).max(120),
});

const mergeQuerySchema = z.object({
  sessionId: z.string().min(1).max(120),
});

const addItemSchema = z.object({
  itemId: z.string().min(1).max(120),
  quantity: z.coerce.number().int().min(1).max(1000).optional(),
  unitPrice: z.coerce.number().min(0),
});

const updateItemSchema = z.object({
  itemId: z.string().min(1).max(120),
  quantity: z.coerce.number().int().min(1).max(1000),
  unitPrice: z.coerce.number().min(0).optional(),
});

export async function registerCartRoutes(app: FastifyInstance, options: RegisterCartRoutesOptions) {
  const { cartService } = options;

  app.get('/carts/:customerId', async (request) => {
    const { customerId } = parseParams(customerParamsSchema, request.params);
    return cartService.getCart(customerId);
  });

  app.delete('/carts/:customerId', async (request, reply) => {
    const { customerId } = parseParams(customerParamsSchema, request.params);
    await cartService.deleteCart(customerId);
    return reply.code(202).send();
  });

  app.get('/carts/:customerId/merge', async (request, reply) => {
    const { customerId } = parseParams(customerParamsSchema, request.params);
    const { sessionId } = parseQuery(mergeQuerySchema, request.query);
    const cart = await cartService.mergeCarts(customerId, sessionId);
    return reply.code(202).send(cart);
  });

  app.get('/carts/:customerId/items', async (request) => {
    const { customerId } = parseParams(customerParamsSchema, request.params);
    return cartService.listItems(customerId);
  });

  app.post('/carts/:customerId/items', async (request, reply) => {
    const { customerId } = parseParams(customerParamsSchema, request.params);
    const body = parseBody(addItemSchema, request.body);

    const result = await cartService.addItem(customerId, body);
    request.log.info({ customerId, itemId: body.itemId, created: result.created }, 'Cart item added');
    return reply.code(201).send(result.item);
  });

  app.patch('/carts/:customerId/items', async (request, reply) => {
    const { customerId } = parseParams(customerParamsSchema, request.params);
    const body = parseBody(updateItemSchema, request.body);

    const item = await cartService.updateItem(customerId, body);
    return reply.code(202).send(item);
  });

  app.get('/carts/:customerId/items/:itemId', async (request) => {
    const { customerId, itemId } = parseParams(itemParamsSchema, request.params);
    return cartService.getItem(customerId, itemId);
  });

  app.delete('/carts/:customerId/items/:itemId', async (request, reply) => {
    const { customerId, itemId } = parseParams(itemParamsSchema, request.params);
    await cartService.removeItem(customerId, itemId);
    return reply.code(202).send();
  });
}
