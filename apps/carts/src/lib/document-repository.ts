import type { ZodType } from 'zod';

import type { RedisClient } from './redis';

export type Identified = {
  id: string;
};

export interface DocumentRepository<T extends Identified> {
  findAll(): Promise<T[]>;
  findById(id: string): Promise<T | null>;
  save(entity: T): Promise<T>;
  deleteById(id: string): Promise<boolean>;
}

/**
 * JSON documents stored under `<prefix>:<id>`, with the ids of the collection
 * kept in the set `<prefix>:ids`.
 */
export class RedisDocumentRepository<T extends Identified> implements DocumentRepository<T> {
  constructor(
    protected readonly redis: RedisClient,
    private readonly prefix: string,
    private readonly schema: ZodType<T>,
  ) {}

  async findAll(): Promise<T[]> {
    const ids = await this.redis.smembers(this.indexKey());
    if (ids.length === 0) {
      return [];
    }

    const documents = await this.redis.mget(ids.map((id) => this.documentKey(id)));
    return documents
      .filter((document): document is string => document !== null)
      .map((document) => this.parse(document));
  }

  async findById(id: string): Promise<T | null> {
    const document = await this.redis.get(this.documentKey(id));
    return document === null ? null : this.parse(document);
  }

  async save(entity: T): Promise<T> {
    await this.redis
      .multi()
      .set(this.documentKey(entity.id), JSON.stringify(entity))
      .sadd(this.indexKey(), entity.id)
      .exec();

    return entity;
  }

  async deleteById(id: string): Promise<boolean> {
    const results = await this.redis.multi().del(this.documentKey(id)).srem(this.indexKey(), id).exec();
    const deleted = results?.[0]?.[1];
    return typeof deleted === 'number' && deleted > 0;
  }

  private parse(document: string): T {
    const parsed: unknown = JSON.parse(document);
    return this.schema.parse(parsed);
  }

  private documentKey(id: string) {
    return `${this.prefix}:${id}`;
  }

  private indexKey() {
    return `${this.prefix}:ids`;
  }
}
