import { Router, Request, Response, NextFunction } from 'express';
import type { SecureItemStore } from '../storage/SecureItemStore';
import type { StoreResponse, TextResponse } from '../types';

export function createTextsRouter(store: SecureItemStore): Router {
  const router = Router();

  /**
   * Store a text
   * POST /api/texts
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const content: unknown = req.body?.content;
      if (typeof content !== 'string' || content.trim().length === 0) {
        res.status(400).json({ error: 'Field "content" must be a non-empty string' });
        return;
      }

      const metadata = await store.create(content);
      const { id } = metadata;

      const response: StoreResponse = {
        id,
        created: metadata.createdAt.toISOString(),
        expires: metadata.expiresAt.toISOString()
      };

      res.setHeader('Expires', metadata.expiresAt.toUTCString());
      res.setHeader('Location', `${req.baseUrl}/${id}/raw`);
      res.status(201).json(response);
    } catch (error) {
      next(error);
    }
  });

  /**
   * Text metadata as headers
   * HEAD /api/texts/:id
   */
  router.head('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const metadata = await store.describe(req.params.id);
      res.setHeader('Expires', metadata.expiresAt.toUTCString());
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  /**
   * Text content as JSON
   * GET /api/texts/:id/raw
   */
  router.get('/:id/raw', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = req.params;
      const { content, metadata } = await store.read(id);

      const response: TextResponse = {
        id,
        content,
        created: metadata.createdAt.toISOString(),
        expires: metadata.expiresAt.toISOString()
      };

      res.setHeader('Expires', metadata.expiresAt.toUTCString());
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  /**
   * Delete a text ahead of its expiry
   * DELETE /api/texts/:id
   */
  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await store.remove(req.params.id);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
