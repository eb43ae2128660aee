import express, { Application, NextFunction, Request, Response } from 'express';
import { createRouter } from './routes';
import { gnss, GnssParser } from './util/gnss';

export const createApp = (parser: GnssParser = gnss): Application => {
  const app: Application = express();

  app.use((req, res, next) => {
    console.log(`Received request: ${req.method} ${req.url}`);
    next();
  });

  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.use(createRouter(parser));

  // malformed JSON bodies and anything a route did not catch
  app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
    console.error(`Error handling ${req.method} ${req.url}:`, err.message);
    if (res.headersSent) {
      next(err);
      return;
    }
    const status = err instanceof SyntaxError ? 400 : 500;
    res.status(status).json({ error: err.message });
  });

  return app;
};
