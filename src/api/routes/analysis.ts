import { Router, Request, Response } from 'express';
import { AnalysisController } from '../../session/analysis-controller';
import { sendSelectionError } from './http-errors';

export function createAnalysisRoutes(controller: AnalysisController): Router {
  const router = Router();

  router.get('/analysis', (_req: Request, res: Response) => {
    const report = controller.getReport();
    if (!report.success) {
      return sendSelectionError(res, report.error);
    }
    return res.status(200).json(report.value);
  });

  return router;
}
