import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { createNotFoundError } from '../http/problem';
import type { ExposedResource, ResourceMappings } from './resource-mappings';

type RegisterResourceRoutesOptions = {
  mappings: ResourceMappings;
  basePath: string;
};

const collectionParamsSchema = z.object({
  resource: z.string(),
});

const itemParamsSchema = collectionParamsSchema.extend({
  id: z.string().min(1),
});

function requireResource(mappings: ResourceMappings, name: string): ExposedResource {
  mappings.initialize();

  const resource = mappings.get(name);
  if (!resource) {
    throw createNotFoundError(`Resource ${name}`);
  }

  return resource;
}

/**
 * Generic dispatch for every exposed repository:
 * `<base>/:resource` and `<base>/:resource/:id`. Bodies failing the resource
 * schema surface as a ZodError, which the error handler turns into a 422.
 */
export async function registerResourceRoutes(
  app: FastifyInstance,
  options: RegisterResourceRoutesOptions,
) {
  const { mappings, basePath } = options;
  const config = { resourceDispatch: true };
  const collectionUrl = `${basePath}/:resource`;
  const itemUrl = `${collectionUrl}/:id`;

  app.get(collectionUrl, { config }, async (request) => {
    const params = collectionParamsSchema.parse(request.params);
    const resource = requireResource(mappings, params.resource);
    return { data: await resource.list() };
  });

  app.post(collectionUrl, { config }, async (request, reply) => {
    const params = collectionParamsSchema.parse(request.params);
    const resource = requireResource(mappings, params.resource);
    const created = await resource.create(request.body);

    request.log.info({ resource: resource.path, id: created.id }, 'Resource created');
    return reply.code(201).send(created);
  });

  app.get(itemUrl, { config }, async (request) => {
    const params = itemParamsSchema.parse(request.params);
    const resource = requireResource(mappings, params.resource);
    const entity = await resource.get(params.id);
    if (!entity) {
      throw createNotFoundError(`${resource.path}/${params.id}`);
    }

    return entity;
  });

  app.put(itemUrl, { config }, async (request) => {
    const params = itemParamsSchema.parse(request.params);
    const resource = requireResource(mappings, params.resource);
    return resource.replace(params.id, request.body);
  });

  app.patch(itemUrl, { config }, async (request) => {
    const params = itemParamsSchema.parse(request.params);
    const resource = requireResource(mappings, params.resource);
    const updated = await resource.update(params.id, request.body);
    if (!updated) {
      throw createNotFoundError(`${resource.path}/${params.id}`);
    }

    return updated;
  });

  app.delete(itemUrl, { config }, async (request, reply) => {
    const params = itemParamsSchema.parse(request.params);
    const resource = requireResource(mappings, params.resource);
    const removed = await resource.remove(params.id);
    if (!removed) {
      throw createNotFoundError(`${resource.path}/${params.id}`);
    }

    return reply.code(204).send();
  });
}
