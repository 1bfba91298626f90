import express from 'express';
import { apiError } from './models/shared.js';
import type { ControlCatalog } from './services/control-catalog.js';
import type { AssessmentService } from './services/assessment.js';
import { controlRoutes } from './routes/controls.js';
import { assessmentRoutes } from './routes/assessments.js';
import { sendError } from './routes/handler.js';

export interface AppDependencies {
  catalog: ControlCatalog;
  assessments: AssessmentService;
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  app.use(express.json());

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({
      status: 'operational',
      service: 'Control Assessment Service',
      version: '1.0.0',
      controls: deps.catalog.summary().totalControls,
    });
  });

  // Control catalog
  app.use('/api/controls', controlRoutes(deps.catalog));

  // Guided assessments, scoring and gap reports
  app.use('/api/assessments', assessmentRoutes(deps.assessments));

  app.use((_req, res) => {
    res.status(404).json(apiError('Not found', 'NOT_FOUND'));
  });

  // Malformed JSON bodies and anything else thrown synchronously
  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json(apiError('Malformed JSON body', 'VALIDATION_ERROR'));
      return;
    }
    sendError(res, err);
  });

  return app;
}
