import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { toAppError } from '../errors/AppError.js';
import type { ModelHealthService } from '../services/modelHealth/modelHealthService.js';

const riskScaleSchema = z.union([z.literal(0), z.literal(1), z.literal(2)]);

const assessmentSchema = z.object({
  model_type: z.enum(['good', 'bad']),
  traffic_volume: z.number().int().min(0).max(200),
  time_of_day: z.number().int().min(0).max(23),
  day_of_week: z.number().int().min(0).max(6),
  weather_risk: riskScaleSchema,
  road_risk: riskScaleSchema
});

export function createModelHealthController(service: ModelHealthService) {
  async function createAssessment(req: Request, res: Response, next: NextFunction) {
    const parsed = assessmentSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }

    try {
      const assessment = await service.assess({
        modelType: parsed.data.model_type,
        trafficVolume: parsed.data.traffic_volume,
        timeOfDay: parsed.data.time_of_day,
        dayOfWeek: parsed.data.day_of_week,
        weatherRisk: parsed.data.weather_risk,
        roadRisk: parsed.data.road_risk
      });
      return res.json(assessment);
    } catch (error) {
      return next(toAppError(error));
    }
  }

  async function getSystemOverview(_req: Request, res: Response, next: NextFunction) {
    try {
      return res.json(await service.systemOverview());
    } catch (error) {
      return next(toAppError(error));
    }
  }

  function listModels(_req: Request, res: Response) {
    return res.json({ models: service.listModels() });
  }

  return { createAssessment, getSystemOverview, listModels };
}
