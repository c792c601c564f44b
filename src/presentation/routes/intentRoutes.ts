import { NextFunction, Router, Request, Response } from 'express';
import { IntentService } from '../../application/services/IntentService.js';
import { IntentOutcome, IntentRequest } from '../../core/entities/Intent.js';
import type { Logger } from '../../utils/logger.js';
import { validateIntentRequest } from '../validation.js';

type IntentHandler = (request: IntentRequest) => Promise<IntentOutcome>;

export function methodNotAllowed(req: Request, res: Response): void {
  res.status(405).json({ error: 'Method not allowed' });
}

/**
 * POST /intake, /needs_more_data and /give_advice
 */
export function createIntentRouter(intentService: IntentService, logger: Logger): Router {
  const router = Router();

  const handle = (handler: IntentHandler) => (req: Request, res: Response, next: NextFunction) => {
    const validation = validateIntentRequest(req.body);
    if (!validation.success) {
      logger.warn({ path: req.path, error: validation.error }, 'Invalid request data');
      res.status(400).json({ error: validation.error });
      return;
    }

    handler(validation.data)
      .then((outcome) => {
        res.status(outcome.status).json(outcome.body);
      })
      .catch(next);
  };

  router
    .route('/intake')
    .post(handle((request) => intentService.intake(request)))
    .all(methodNotAllowed);

  router
    .route('/needs_more_data')
    .post(handle((request) => intentService.needsMoreData(request)))
    .all(methodNotAllowed);

  router
    .route('/give_advice')
    .post(handle((request) => intentService.giveAdvice(request)))
    .all(methodNotAllowed);

  return router;
}
