import express, { Application, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { CaptureController, CaptureControllerDeps } from './controllers/capture.controller';
import { createRoutes } from './routes';
import { errorMessage } from './utils/errors';

export const createApp = (deps: CaptureControllerDeps): Application => {
  const app = express();
  const controller = new CaptureController(deps);

  app.disable('x-powered-by');
  app.use(cors({
    origin: '*',
    methods: ['GET', 'OPTIONS'],
  }));

  app.use('/', createRoutes(controller));

  app.use((req: Request, res: Response) => {
    res.status(404).type('text/plain').send('Not Found');
  });

  // Four arguments mark this as Express' error handler
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    deps.log.addLine(`Error handling request ${req.method} ${req.path}: ${errorMessage(error)}`);
    if (res.headersSent) {
      res.end();
      return;
    }
    res.status(500).type('text/plain').send('Internal Server Error');
  });

  return app;
};
