import { Router, type Request, type Response } from 'express';
import { leadRequestInput } from '../../domain/schemas.js';
import { ErrorCode } from '../../domain/errors.js';
import { successResponse, errorResponse, sendAppError } from '../middleware/error-handler.js';
import { createLeadAndAcquireId, type LeadServiceDeps } from '../../services/lead/index.js';
import { logger } from '../../infrastructure/logger.js';

export function createLeadRouter(deps: LeadServiceDeps): Router {
  const router = Router();

  router.post('/create-lead', async (req: Request, res: Response) => {
    const parsed = leadRequestInput.safeParse(req.body);
    if (!parsed.success) {
      const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      res.status(422).json(errorResponse(ErrorCode.VALIDATION_ERROR, 'Invalid request body', details));
      return;
    }

    const result = await createLeadAndAcquireId(parsed.data, deps);
    if (!result.ok) return sendAppError(res, result.error);

    logger.info(
      { orderNumber: result.value.orderNumber, serviceCenterId: result.value.serviceCenterId, attempts: result.value.attempts },
      'Lead created and id acquired',
    );
    res.status(200).json(successResponse(result.value));
  });

  return router;
}
