import { Router, Request, Response } from 'express';
import { convertEntity, Conversion } from '../converter.js';
import { MalformedBlockError } from '../errors.js';
import { CatalogEntry, LoadResult, parseDescriptor } from '../loader.js';
import { MetadataIndex } from '../metadata.js';
import { HelpFlavour } from '../serializer.js';

/**
 * What the routes work from: the loaded content and the run's metadata
 */
export interface ApiContext {
  data: LoadResult;
  metadata: MetadataIndex;
  flavour: HelpFlavour;
}

/**
 * Convert a catalog entry, answering the request itself when that is not possible
 */
function convertOrReply(context: ApiContext, name: string, res: Response): Conversion | undefined {
  const entry = context.data.entityMap.get(name);
  if (!entry) {
    res.status(404).json({ error: `Entity not found: ${name}` });
    return undefined;
  }
  if (entry.docstring === undefined) {
    res.status(404).json({ error: `${name} has no documentation` });
    return undefined;
  }
  return convertOrFail(entry, entry.docstring, context, res);
}

function convertOrFail(entry: CatalogEntry, docstring: string, context: ApiContext, res: Response): Conversion | undefined {
  try {
    return convertEntity(entry.descriptor, docstring, context.metadata, { flavour: context.flavour });
  } catch (err) {
    if (err instanceof MalformedBlockError) {
      res.status(422).json({ error: err.message });
      return undefined;
    }
    throw err;
  }
}

/**
 * Create API routes for browsing and previewing conversions
 */
export function createApiRoutes(context: ApiContext): Router {
  const router = Router();
  const { data, metadata } = context;

  /**
   * GET /api/entities
   * List all catalog entities, optionally filtered by kind
   * Query params: ?kind=parameterized-model&limit=10
   */
  router.get('/entities', (req: Request, res: Response) => {
    const { kind, limit } = req.query;

    let entities = data.entities;

    if (kind && typeof kind === 'string') {
      entities = entities.filter(e => e.descriptor.kind === kind);
    }

    if (limit && typeof limit === 'string') {
      const n = parseInt(limit, 10);
      if (!isNaN(n) && n > 0) {
        entities = entities.slice(0, n);
      }
    }

    const result = entities.map(e => {
      const skip = metadata.isSkipped(e.descriptor.name);
      return {
        name: e.descriptor.name,
        kind: e.descriptor.kind,
        documented: e.docstring !== undefined,
        ...(skip ? { skipped: skip.reason } : {})
      };
    });

    res.json(result);
  });

  /**
   * GET /api/entity/:name
   * The help file for one entity
   */
  router.get('/entity/:name', (req: Request, res: Response) => {
    const conversion = convertOrReply(context, req.params.name, res);
    if (conversion) {
      res.type('application/xml').send(conversion.xml);
    }
  });

  /**
   * GET /api/entity/:name/diagnostics
   * Diagnostics recorded while converting one entity
   */
  router.get('/entity/:name/diagnostics', (req: Request, res: Response) => {
    const conversion = convertOrReply(context, req.params.name, res);
    if (conversion) {
      res.json(conversion.document.diagnostics);
    }
  });

  /**
   * GET /api/document/:name
   * Raw docstring of an entity
   */
  router.get('/document/:name', (req: Request, res: Response) => {
    const { name } = req.params;
    const content = data.corpus.get(name);

    if (content === undefined) {
      res.status(404).json({ error: `Document not found: ${name}` });
      return;
    }

    res.type('text/markdown').send(content);
  });

  /**
   * POST /api/preview
   * Convert a docstring that has no catalog entry
   * Body: { docstring, name?, kind?, signature? }
   */
  router.post('/preview', (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (typeof body !== 'object' || body === null || !('docstring' in body) || typeof body.docstring !== 'string') {
      res.status(400).json({ error: 'Body field "docstring" is required' });
      return;
    }

    const descriptor = parseDescriptor({
      name: 'preview',
      kind: 'callable',
      signature: null,
      ...body
    });
    if (typeof descriptor === 'string') {
      res.status(400).json({ error: descriptor });
      return;
    }

    const conversion = convertOrFail({ descriptor }, body.docstring, context, res);
    if (conversion) {
      res.json({ xml: conversion.xml, diagnostics: conversion.document.diagnostics });
    }
  });

  return router;
}
