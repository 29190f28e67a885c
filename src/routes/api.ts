import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { validateConfig } from '../config.js';
import { IndexError } from '../errors.js';
import { createIndex } from '../indexer.js';
import { LoadResult } from '../loader.js';
import { renderMarkdown } from '../renderer.js';

const indexRequestSchema = z.object({
  text: z.string(),
  config: z.unknown().optional(),
  pages: z.array(z.number().int().positive()).optional()
});

function sendIndexError(res: Response, err: IndexError): void {
  res.status(err.statusCode).json({
    error: err.message,
    code: err.code,
    location: err.location ?? null
  });
}

/**
 * Create API routes for indexing documents and browsing loaded content
 */
export function createApiRoutes(data: LoadResult): Router {
  const router = Router();

  /**
   * POST /api/index
   * Index a document sent in the request body
   * Body: { text, config?, pages? }
   */
  router.post('/index', (req: Request, res: Response) => {
    const parsed = indexRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.issues.map(issue => issue.message).join('; ') });
      return;
    }

    const { text, pages } = parsed.data;
    try {
      const config = parsed.data.config === undefined ? undefined : validateConfig(parsed.data.config, 'request');
      const result = createIndex(text, { config, pages });
      res.json({
        document: result.document,
        index: result.index,
        indexHtml: result.indexHtml,
        warnings: result.warnings
      });
    } catch (err) {
      if (err instanceof IndexError) {
        sendIndexError(res, err);
        return;
      }
      console.error('Failed to index request document', err);
      res.status(500).json({ error: 'Failed to index document.' });
    }
  });

  /**
   * GET /api/documents
   * List all loaded documents with their index statistics
   */
  router.get('/documents', (_req: Request, res: Response) => {
    const documents = Array.from(data.documents.values()).map(doc => ({
      documentId: doc.documentId,
      entries: doc.result?.stats.entries ?? 0,
      occurrences: doc.result?.stats.occurrences ?? 0,
      warnings: doc.result?.warnings.length ?? 0,
      error: doc.error?.message ?? null
    }));
    res.json(documents);
  });

  /**
   * GET /api/document/:id
   * Get the raw annotated markdown of a document
   */
  router.get('/document/:id', (req: Request, res: Response) => {
    const { id } = req.params;
    const doc = data.documents.get(id);

    if (!doc) {
      res.status(404).json({ error: `Document not found: ${id}` });
      return;
    }

    res.type('text/markdown').send(doc.source);
  });

  /**
   * GET /api/render/:id
   * Render a document, with its index, as HTML
   */
  router.get('/render/:id', (req: Request, res: Response) => {
    const { id } = req.params;
    const doc = data.documents.get(id);

    if (!doc) {
      res.status(404).json({ error: `Document not found: ${id}` });
      return;
    }
    if (doc.error) {
      sendIndexError(res, doc.error);
      return;
    }
    if (!doc.result) {
      res.status(500).json({ error: `Document was not indexed: ${id}` });
      return;
    }

    res.json({
      ...renderMarkdown(doc.result.document),
      warnings: doc.result.warnings
    });
  });

  return router;
}
