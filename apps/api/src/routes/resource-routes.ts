/**
 * @fileoverview Generic resource routes
 *
 * Thin handlers over a resource service: parse the path, query and body,
 * call the service inside the request's tenant, return the result. Errors
 * propagate to the application error handler.
 *
 * @module api/routes/resource-routes
 */

import {
  pickFilters,
  type ChildInput,
  type NewResource,
  type SearchFilters,
} from '@ehr-backend/core';
import type { ChildCollectionService, ResourceService } from '@ehr-backend/domain';
import type { ChildMeta, Page, ResourceMeta } from '@ehr-backend/types';
import type { FastifyInstance, FastifyRequest } from 'fastify';
import { type z } from 'zod';

import { inTenant } from '../plugins/tenant.js';
import {
  parseBody,
  parseFhirId,
  parseId,
  parsePage,
  RESERVED_QUERY_KEYS,
  type QueryParams,
} from './request-parsing.js';

interface IdParams {
  id: string;
}

interface FhirIdParams {
  fhirId: string;
}

interface ChildParams {
  id: string;
  childId: string;
}

export interface ResourceRouteOptions<T extends ResourceMeta, F extends string> {
  /** Collection path, e.g. `/patients` */
  path: string;
  /** OpenAPI tag */
  tag: string;
  service: ResourceService<T, F>;
  /** Create and update body */
  body: z.ZodType<NewResource<NoInfer<T>>, z.ZodTypeDef, unknown>;
}

export interface ChildRouteOptions<C extends ChildMeta, P extends keyof C & string> {
  /** Parent collection path, e.g. `/claims` */
  parentPath: string;
  /** Child segment, e.g. `diagnoses` */
  segment: string;
  tag: string;
  service: ChildCollectionService<C, P>;
  /** Body of an added row; without one the collection is read-only */
  body?: z.ZodType<ChildInput<NoInfer<C>, NoInfer<P>>, z.ZodTypeDef, unknown>;
}

/**
 * List, or search when the query names filters. `patient_id` switches to
 * listing by patient for families that support it. Unknown keys are ignored.
 */
function listOrSearch<T extends ResourceMeta, F extends string>(
  service: ResourceService<T, F>,
  request: FastifyRequest<{ Querystring: QueryParams }>
): Promise<Page<T>> {
  const query = request.query;
  const page = parsePage(query);

  const patientId = query.patient_id;
  if (typeof patientId === 'string' && patientId !== '' && service.listsByPatient) {
    return service.listByPatient(parseId(patientId, 'patient_id'), page);
  }

  const picked = pickFilters(service.filters, query, RESERVED_QUERY_KEYS);
  if (picked.ignored.length > 0) {
    request.log.debug({ ignored: picked.ignored }, 'Ignoring unsupported query parameters');
  }

  const filters: SearchFilters<F> = picked.filters;
  return Object.keys(filters).length === 0
    ? service.list(page)
    : service.search(filters, page);
}

/**
 * GET/POST `{path}`, GET/PUT/DELETE `{path}/:id`, GET `{path}/fhir/:fhirId`
 */
export function registerResourceRoutes<T extends ResourceMeta, F extends string>(
  fastify: FastifyInstance,
  options: ResourceRouteOptions<T, F>
): void {
  const { path, tag, service, body } = options;
  const resourceType = service.resourceType;
  const schema = { tags: [tag] };

  fastify.get<{ Querystring: QueryParams }>(
    path,
    { schema: { ...schema, summary: `List or search ${resourceType}` } },
    async (request) => inTenant(request, () => listOrSearch(service, request))
  );

  fastify.post(
    path,
    { schema: { ...schema, summary: `Create ${resourceType}` } },
    async (request, reply) => {
      const input = parseBody(body, request.body, resourceType);
      const record = await inTenant(request, () => service.create(input));
      request.log.info({ id: record.id }, `${resourceType} created`);
      return reply.code(201).send(record);
    }
  );

  fastify.get<{ Params: FhirIdParams }>(
    `${path}/fhir/:fhirId`,
    { schema: { ...schema, summary: `Read ${resourceType} by FHIR id` } },
    async (request) => {
      const fhirId = parseFhirId(request.params.fhirId);
      return inTenant(request, () => service.getByFhirId(fhirId));
    }
  );

  fastify.get<{ Params: IdParams }>(
    `${path}/:id`,
    { schema: { ...schema, summary: `Read ${resourceType}` } },
    async (request) => {
      const id = parseId(request.params.id);
      return inTenant(request, () => service.getById(id));
    }
  );

  fastify.put<{ Params: IdParams }>(
    `${path}/:id`,
    { schema: { ...schema, summary: `Update ${resourceType}` } },
    async (request) => {
      const id = parseId(request.params.id);
      const input = parseBody(body, request.body, resourceType);
      return inTenant(request, () => service.update(id, input));
    }
  );

  fastify.delete<{ Params: IdParams }>(
    `${path}/:id`,
    { schema: { ...schema, summary: `Delete ${resourceType}` } },
    async (request, reply) => {
      const id = parseId(request.params.id);
      await inTenant(request, () => service.delete(id));
      request.log.info({ id }, `${resourceType} deleted`);
      return reply.code(204).send();
    }
  );
}

/**
 * GET/POST `{parentPath}/:id/{segment}`, DELETE `{parentPath}/:id/{segment}/:childId`
 */
export function registerChildRoutes<C extends ChildMeta, P extends keyof C & string>(
  fastify: FastifyInstance,
  options: ChildRouteOptions<C, P>
): void {
  const { parentPath, segment, tag, service, body } = options;
  const resourceType = service.resourceType;
  const path = `${parentPath}/:id/${segment}`;
  const schema = { tags: [tag] };

  fastify.get<{ Params: IdParams }>(
    path,
    { schema: { ...schema, summary: `List ${resourceType}` } },
    async (request) => {
      const parentId = parseId(request.params.id);
      return inTenant(request, () => service.list(parentId));
    }
  );

  if (body === undefined) {
    return;
  }

  fastify.post<{ Params: IdParams }>(
    path,
    { schema: { ...schema, summary: `Add ${resourceType}` } },
    async (request, reply) => {
      const parentId = parseId(request.params.id);
      const input = parseBody(body, request.body, resourceType);
      const record = await inTenant(request, () => service.add(parentId, input));
      return reply.code(201).send(record);
    }
  );

  fastify.delete<{ Params: ChildParams }>(
    `${path}/:childId`,
    { schema: { ...schema, summary: `Remove ${resourceType}` } },
    async (request, reply) => {
      const parentId = parseId(request.params.id);
      const childId = parseId(request.params.childId, 'childId');
      await inTenant(request, () => service.remove(parentId, childId));
      return reply.code(204).send();
    }
  );
}
