/**
 * Assessments: Routes
 */
import { Router } from 'express';
import { z } from 'zod';
import { apiSuccess } from '../models/shared.js';
import type { AssessmentService } from '../services/assessment.js';
import { toMarkdown } from '../services/report.js';
import { asyncRoute, parseBody, userIdOf } from './handler.js';

const StartBody = z.object({
  domain: z.string().trim().min(1),
});

const RespondBody = z.object({
  userResponse: z.string().trim().min(1),
  controlId: z.string().min(1).optional(),
  evidenceProvided: z.boolean().optional(),
});

export function assessmentRoutes(service: AssessmentService): Router {
  const router = Router();

  // GET /api/assessments: the caller's finished assessments
  router.get(
    '/',
    asyncRoute(async (req, res) => {
      const assessments = await service.listAssessments(userIdOf(req));
      res.json(apiSuccess(assessments));
    }),
  );

  // POST /api/assessments/start: start an assessment for one domain
  router.post(
    '/start',
    asyncRoute(async (req, res) => {
      const { domain } = parseBody(StartBody, req.body);
      const started = await service.startAssessment(userIdOf(req), domain);
      res.status(201).json(apiSuccess(started));
    }),
  );

  // POST /api/assessments/:id/respond: answer the current control
  router.post(
    '/:id/respond',
    asyncRoute(async (req, res) => {
      const body = parseBody(RespondBody, req.body);
      const result = await service.submitResponse(userIdOf(req), req.params.id, body);
      res.json(apiSuccess(result));
    }),
  );

  // POST /api/assessments/:id/pause
  router.post(
    '/:id/pause',
    asyncRoute(async (req, res) => {
      const progress = await service.pause(userIdOf(req), req.params.id);
      res.json(apiSuccess(progress));
    }),
  );

  // POST /api/assessments/:id/resume
  router.post(
    '/:id/resume',
    asyncRoute(async (req, res) => {
      const progress = await service.resume(userIdOf(req), req.params.id);
      res.json(apiSuccess(progress));
    }),
  );

  // GET /api/assessments/:id/status: progress and current control
  router.get(
    '/:id/status',
    asyncRoute(async (req, res) => {
      const status = await service.getStatus(userIdOf(req), req.params.id);
      res.json(apiSuccess(status));
    }),
  );

  // GET /api/assessments/:id/report: gap report, ?format=markdown for text
  router.get(
    '/:id/report',
    asyncRoute(async (req, res) => {
      const markdown = req.query.format === 'markdown';
      const report = await service.getReport(userIdOf(req), req.params.id, markdown ? 'markdown' : 'json');
      if (markdown) {
        res.type('text/markdown').send(toMarkdown(report));
        return;
      }
      res.json(apiSuccess(report));
    }),
  );

  return router;
}
