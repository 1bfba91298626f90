/**
 * Control catalog: Routes
 */
import { Router } from 'express';
import { apiSuccess } from '../models/shared.js';
import { ControlNotFoundError } from '../errors.js';
import type { ControlCatalog } from '../services/control-catalog.js';
import { sendError } from './handler.js';

export function controlRoutes(catalog: ControlCatalog): Router {
  const router = Router();

  // GET /api/controls: list controls, optionally filtered by ?domain= and ?q=
  router.get('/', (req, res) => {
    const domain = typeof req.query.domain === 'string' ? req.query.domain : undefined;
    const query = typeof req.query.q === 'string' ? req.query.q : undefined;

    if (query !== undefined) {
      res.json(apiSuccess(catalog.search(query, domain)));
      return;
    }
    res.json(apiSuccess(domain !== undefined ? catalog.getByDomain(domain) : catalog.all()));
  });

  // GET /api/controls/domains: domain names in catalog order
  router.get('/domains', (_req, res) => {
    res.json(apiSuccess(catalog.domains()));
  });

  // GET /api/controls/summary: control counts per domain
  router.get('/summary', (_req, res) => {
    res.json(apiSuccess(catalog.summary()));
  });

  // GET /api/controls/:controlId: single control
  router.get('/:controlId', (req, res) => {
    const control = catalog.getById(req.params.controlId);
    if (!control) {
      sendError(res, new ControlNotFoundError(req.params.controlId));
      return;
    }
    res.json(apiSuccess(control));
  });

  return router;
}
