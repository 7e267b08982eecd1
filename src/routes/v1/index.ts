import { Router } from 'express';
import type { ModelHealthService } from '../../services/modelHealth/modelHealthService.js';
import { createModelHealthRoutes } from './modelHealthRoutes.js';
import { opsRoutes } from './opsRoutes.js';

export function createV1Routes(modelHealthService: ModelHealthService) {
  const v1Routes = Router();

  v1Routes.use('/model-health', createModelHealthRoutes(modelHealthService));
  v1Routes.use('/ops', opsRoutes);

  return v1Routes;
}
