import { randomUUID } from 'crypto';

import { createNotFoundError } from '../http/problem';
import type { AppLogger } from '../lib/logger';
import type { CartRepository, ItemRepository } from './repositories';
import type { AddItemInput, Cart, CartDto, Item, UpdateItemInput } from './types';

export type AddItemResult = {
  item: Item;
  created: boolean;
};

export class CartService {
  constructor(
    private readonly carts: CartRepository,
    private readonly items: ItemRepository,
    private readonly logger: AppLogger,
    private readonly generateId: () => string = randomUUID,
  ) {}

  async getCart(customerId: string): Promise<CartDto> {
    const cart = await this.findOrCreateCart(customerId);
    const items = await this.items.findByCartId(cart.id);
    return { ...cart, items };
  }

  async deleteCart(customerId: string): Promise<void> {
    const cart = await this.carts.findByCustomerId(customerId);
    if (!cart) {
      throw createNotFoundError('Cart', { customerId });
    }

    await this.deleteCartWithItems(cart);
    this.logger.info({ customerId, cartId: cart.id }, 'Cart deleted');
  }

  /** Moves the lines of the anonymous session cart into the customer's cart. */
  async mergeCarts(customerId: string, sessionId: string): Promise<CartDto> {
    const sessionCart = await this.carts.findByCustomerId(sessionId);
    if (!sessionCart) {
      throw createNotFoundError('Session cart', { sessionId });
    }

    const target = await this.findOrCreateCart(customerId);
    if (target.id !== sessionCart.id) {
      const sessionItems = await this.items.findByCartId(sessionCart.id);
      for (const item of sessionItems) {
        await this.addToCart(target, {
          itemId: item.itemId,
          quantity: item.quantity,
          unitPrice: item.unitPrice,
        });
      }

      await this.deleteCartWithItems(sessionCart);
      this.logger.info(
        { customerId, sessionId, mergedLines: sessionItems.length },
        'Session cart merged',
      );
    }

    return this.getCart(customerId);
  }

  async listItems(customerId: string): Promise<Item[]> {
    const cart = await this.findOrCreateCart(customerId);
    return this.items.findByCartId(cart.id);
  }

  async getItem(customerId: string, itemId: string): Promise<Item> {
    const cart = await this.findOrCreateCart(customerId);
    const item = await this.findLine(cart, itemId);
    if (!item) {
      throw createNotFoundError('Cart item', { customerId, itemId });
    }

    return item;
  }

  async addItem(customerId: string, input: AddItemInput): Promise<AddItemResult> {
    const cart = await this.findOrCreateCart(customerId);
    return this.addToCart(cart, input);
  }

  async updateItem(customerId: string, input: UpdateItemInput): Promise<Item> {
    const existing = await this.getItem(customerId, input.itemId);
    const updated: Item = {
      ...existing,
      quantity: input.quantity,
      unitPrice: input.unitPrice ?? existing.unitPrice,
    };

    return this.items.save(updated);
  }

  async removeItem(customerId: string, itemId: string): Promise<void> {
    const item = await this.getItem(customerId, itemId);
    await this.items.deleteById(item.id);
  }

  private async addToCart(cart: Cart, input: AddItemInput): Promise<AddItemResult> {
    const quantity = input.quantity ?? 1;
    const existing = await this.findLine(cart, input.itemId);

    if (existing) {
      const item = await this.items.save({ ...existing, quantity: existing.quantity + quantity });
      return { item, created: false };
    }

    const item = await this.items.save({
      id: this.generateId(),
      cartId: cart.id,
      itemId: input.itemId,
      quantity,
      unitPrice: input.unitPrice,
    });
    return { item, created: true };
  }

  private async findLine(cart: Cart, itemId: string): Promise<Item | null> {
    const items = await this.items.findByCartId(cart.id);
    return items.find((item) => item.itemId === itemId) ?? null;
  }

  private async findOrCreateCart(customerId: string): Promise<Cart> {
    const existing = await this.carts.findByCustomerId(customerId);
    if (existing) {
      return existing;
    }

    const cart = await this.carts.save({ id: this.generateId(), customerId });
    this.logger.debug({ customerId, cartId: cart.id }, 'Cart created');
    return cart;
  }

  private async deleteCartWithItems(cart: Cart) {
    const items = await this.items.findByCartId(cart.id);
    for (const item of items) {
      await this.items.deleteById(item.id);
    }

    await this.carts.deleteById(cart.id);
  }
}
