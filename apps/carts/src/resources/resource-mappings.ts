import { randomUUID } from 'crypto';
import type { ZodType } from 'zod';

import type { DocumentRepository, Identified } from '../lib/document-repository';

const RESOURCE_PATH_PATTERN = /^[a-z][a-z0-9-]*$/;

export class ResourceMappingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ResourceMappingError';
  }
}

export type ResourceDescriptor<T extends Identified> = {
  /** Collection segment, e.g. `carts` for `/carts` and `/carts/{id}`. */
  path: string;
  repository: DocumentRepository<T>;
  schema: ZodType<T>;
};

/** A repository exposed over HTTP, with the entity type erased. */
export type ExposedResource = {
  path: string;
  list(): Promise<Identified[]>;
  get(id: string): Promise<Identified | null>;
  create(body: unknown): Promise<Identified>;
  replace(id: string, body: unknown): Promise<Identified>;
  update(id: string, body: unknown): Promise<Identified | null>;
  remove(id: string): Promise<boolean>;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fieldsOf(body: unknown): Record<string, unknown> {
  return isRecord(body) ? body : {};
}

function toExposedResource<T extends Identified>(
  descriptor: ResourceDescriptor<T>,
  generateId: () => string,
): ExposedResource {
  const { repository, schema } = descriptor;

  return {
    path: descriptor.path,
    list: () => repository.findAll(),
    get: (id) => repository.findById(id),
    create: async (body) => repository.save(schema.parse({ ...fieldsOf(body), id: generateId() })),
    replace: async (id, body) => repository.save(schema.parse({ ...fieldsOf(body), id })),
    update: async (id, body) => {
      const existing = await repository.findById(id);
      if (!existing) {
        return null;
      }

      return repository.save(schema.parse({ ...existing, ...fieldsOf(body), id }));
    },
    remove: (id) => repository.deleteById(id),
  };
}

/**
 * Repositories exposed as REST collections. Resources are declared with
 * `expose` and become queryable once `initialize` validated them; the set is
 * frozen from then on.
 */
export class ResourceMappings {
  private readonly declared: ExposedResource[] = [];
  private resources: ReadonlyMap<string, ExposedResource> | null = null;

  constructor(private readonly generateId: () => string = randomUUID) {}

  get isInitialized(): boolean {
    return this.resources !== null;
  }

  expose<T extends Identified>(descriptor: ResourceDescriptor<T>): this {
    if (this.resources) {
      throw new ResourceMappingError(
        `Cannot expose resource "${descriptor.path}" after mappings were initialized`,
      );
    }

    this.declared.push(toExposedResource(descriptor, this.generateId));
    return this;
  }

  initialize() {
    if (this.resources) {
      return;
    }

    const resources = new Map<string, ExposedResource>();
    for (const resource of this.declared) {
      if (!RESOURCE_PATH_PATTERN.test(resource.path)) {
        throw new ResourceMappingError(`Invalid resource path "${resource.path}"`);
      }

      if (resources.has(resource.path)) {
        throw new ResourceMappingError(`Resource path "${resource.path}" is exposed twice`);
      }

      resources.set(resource.path, resource);
    }

    this.resources = resources;
  }

  get(path: string): ExposedResource | undefined {
    return this.requireResources().get(path);
  }

  list(): ExposedResource[] {
    return [...this.requireResources().values()];
  }

  private requireResources(): ReadonlyMap<string, ExposedResource> {
    if (!this.resources) {
      throw new ResourceMappingError('Resource mappings are not initialized');
    }

    return this.resources;
  }
}
