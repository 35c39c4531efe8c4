import { NextFunction, Request, Response, Router } from 'express';
import { CaptureController } from '../controllers/capture.controller';

type Handler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not await handlers; hand rejections to the error middleware
const asyncRoute =
  (handler: Handler) =>
  (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };

export const createRoutes = (controller: CaptureController): Router => {
  const router = Router();

  router.get('/capture', asyncRoute((req, res) => controller.capture(req, res)));
  router.get('/get_file_chunk', asyncRoute((req, res) => controller.getFileChunk(req, res)));
  router.get('/get_img', asyncRoute((req, res) => controller.getImage(req, res)));

  return router;
};
