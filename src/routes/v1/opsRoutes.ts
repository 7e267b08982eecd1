import { Router } from 'express';
import { getOpsMetrics } from '../../controllers/opsController.js';

export const opsRoutes = Router();

opsRoutes.get('/metrics', getOpsMetrics);
