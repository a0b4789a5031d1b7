import { Router, Request, Response, NextFunction } from 'express';
import { DeploymentRecord, ProcessingMode, SubmitResponse, TaskRequest } from '@pagelaunch/shared';
import { HttpError } from '../middleware/errorHandler';
import { parseTaskRequest, verifySecret } from '../middleware/validation';

export interface Deployer {
  deploy(request: TaskRequest): Promise<DeploymentRecord>;
}

export interface SubmitRouterOptions {
  apiSecret: string;
  processingMode: ProcessingMode;
}

export function createSubmitRouter(deployer: Deployer, options: SubmitRouterOptions): Router {
  const router = Router();

  router.post('/submit', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const request = parseTaskRequest(req.body);

      if (!verifySecret(request.secret, options.apiSecret)) {
        throw new HttpError(403, 'Invalid secret.');
      }

      if (options.processingMode === 'background') {
        void deployer.deploy(request).then(
          (record) => console.log(`[Submit] Background task ${record.task} round ${record.round} completed`),
          (error: unknown) => console.error(`[Submit] Background task ${request.task} round ${request.round} failed:`, error)
        );
        return res
          .status(202)
          .json({ status: 'accepted', message: 'Task received and is being processed.' } satisfies SubmitResponse);
      }

      const deployment = await deployer.deploy(request);
      res.json({ status: 'success', message: 'Task processed and deployed.', deployment } satisfies SubmitResponse);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
