import type { Request, Response } from 'express';
import { z } from 'zod';
import { getDependencySnapshots, getRouteSnapshots } from '../observability/metrics.js';
import { getFailureGroups, getUpstreamFailureSummary } from '../observability/failureLedger.js';

const metricsQuerySchema = z.object({
  range: z.enum(['1h', '24h']).optional()
});

const RANGE_MS = {
  '1h': 60 * 60 * 1000,
  '24h': 24 * 60 * 60 * 1000
};

export function getOpsMetrics(req: Request, res: Response) {
  const parsed = metricsQuerySchema.safeParse(req.query);
  if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });

  const range = parsed.data.range ?? '24h';
  return res.json({
    range,
    routes: getRouteSnapshots(),
    dependencies: getDependencySnapshots(),
    failures: getFailureGroups(RANGE_MS[range]),
    upstream_failures: getUpstreamFailureSummary(RANGE_MS[range])
  });
}
