import { Router } from 'express';
import { createModelHealthController } from '../../controllers/modelHealthController.js';
import { assessmentRateLimit } from '../../middleware/rateLimit.js';
import type { ModelHealthService } from '../../services/modelHealth/modelHealthService.js';

export function createModelHealthRoutes(service: ModelHealthService) {
  const controller = createModelHealthController(service);
  const routes = Router();

  routes.get('/models', controller.listModels);
  routes.post('/assessments', assessmentRateLimit, controller.createAssessment);
  routes.get('/system', controller.getSystemOverview);

  return routes;
}
