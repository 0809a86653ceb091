import { Router, type Request, type Response, type NextFunction } from 'express';
import { healthController } from '../controllers/health.controller';

export function createHealthRoutes(): Router {
  const router = Router();

  /**
   * GET /api/v1/health
   * Database reachability plus live connection counts - no authentication required
   */
  router.get('/health', (req: Request, res: Response, next: NextFunction) => {
    healthController.getHealthCheck(req, res).catch(next);
  });

  /**
   * GET /api/v1/ready
   */
  router.get('/ready', healthController.getReady.bind(healthController));

  return router;
}
