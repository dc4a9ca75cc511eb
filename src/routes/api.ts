import { Router, type Request, type Response } from 'express';
import { marked } from 'marked';
import {
  isSourceId,
  requireSource,
  SCRIPT_SOURCE,
  SKILLS_SOURCE,
  type LoadResult,
  type SourceDocument,
  type SourceId
} from '../loader.js';
import { renderAssessment, renderScript } from '../renderer.js';
import { MissingInputError, UnrecognizedRoleError } from '../errors.js';
import { ROLES, type Role } from '../types.js';

function isRole(value: string): value is Role {
  return ROLES.some(role => role === value);
}

/**
 * Look up a source, answering 404 when it is unknown or was not found on disk
 */
function findSource(data: LoadResult, id: string, res: Response): SourceDocument | null {
  if (!isSourceId(id)) {
    res.status(404).json({ error: `Document not found: ${id}` });
    return null;
  }
  return loadedSource(data, id, res);
}

function loadedSource(data: LoadResult, id: SourceId, res: Response): SourceDocument | null {
  try {
    return requireSource(data, id);
  } catch (err) {
    if (err instanceof MissingInputError) {
      res.status(404).json({ error: err.message });
      return null;
    }
    throw err;
  }
}

/**
 * Create API routes for previewing content and generated LaTeX
 */
export function createApiRoutes(data: LoadResult): Router {
  const router = Router();

  /**
   * GET /api/documents
   * List the content files that were loaded
   */
  router.get('/documents', (_req: Request, res: Response) => {
    res.json(Array.from(data.sources.keys()));
  });

  /**
   * GET /api/document/:id
   * Parsed model of a content file
   */
  router.get('/document/:id', (req: Request, res: Response) => {
    const source = findSource(data, req.params.id, res);
    if (!source) return;

    res.json(source.document);
  });

  /**
   * GET /api/preview/:id
   * Content file rendered as HTML for reading while authoring
   */
  router.get('/preview/:id', async (req: Request, res: Response) => {
    const source = findSource(data, req.params.id, res);
    if (!source) return;

    try {
      const html = await marked.parse(source.content, { gfm: true });
      res.json({ documentId: source.documentId, html });
    } catch (err) {
      console.error(`[Preview] Failed to render ${source.documentId}:`, err);
      res.status(500).json({ error: `Preview failed: ${err}` });
    }
  });

  /**
   * GET /api/latex/script/:role
   * Script LaTeX for Mentee or Mentor
   * Query params: ?strict=true to reject unknown role headings
   */
  router.get('/latex/script/:role', (req: Request, res: Response) => {
    const { role } = req.params;
    if (!isRole(role)) {
      res.status(400).json({ error: `Role must be one of ${ROLES.join(', ')}` });
      return;
    }

    const source = loadedSource(data, SCRIPT_SOURCE, res);
    if (!source) return;

    try {
      const latex = renderScript(source.document, role, { strict: req.query.strict === 'true' });
      res.type('text/x-tex').send(latex);
    } catch (err) {
      if (err instanceof UnrecognizedRoleError) {
        res.status(422).json({ error: err.message });
        return;
      }
      throw err;
    }
  });

  /**
   * GET /api/latex/assessment
   * Skills assessment LaTeX
   */
  router.get('/latex/assessment', (_req: Request, res: Response) => {
    const source = loadedSource(data, SKILLS_SOURCE, res);
    if (!source) return;

    res.type('text/x-tex').send(renderAssessment(source.document));
  });

  return router;
}
