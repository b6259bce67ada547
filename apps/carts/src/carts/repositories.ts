import { RedisDocumentRepository, type DocumentRepository } from '../lib/document-repository';
import type { RedisClient } from '../lib/redis';
import { cartSchema, itemSchema, type Cart, type Item } from './types';

export interface CartRepository extends DocumentRepository<Cart> {
  findByCustomerId(customerId: string): Promise<Cart | null>;
}

export interface ItemRepository extends DocumentRepository<Item> {
  findByCartId(cartId: string): Promise<Item[]>;
}

export class RedisCartRepository extends RedisDocumentRepository<Cart> implements CartRepository {
  constructor(redis: RedisClient) {
    super(redis, 'carts', cartSchema);
  }

  async findByCustomerId(customerId: string): Promise<Cart | null> {
    const carts = await this.findAll();
    return carts.find((cart) => cart.customerId === customerId) ?? null;
  }
}

export class RedisItemRepository extends RedisDocumentRepository<Item> implements ItemRepository {
  constructor(redis: RedisClient) {
    super(redis, 'items', itemSchema);
  }

  async findByCartId(cartId: string): Promise<Item[]> {
    const items = await this.findAll();
    return items.filter((item) => item.cartId === cartId);
  }
}
