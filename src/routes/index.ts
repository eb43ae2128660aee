import { Request, Response, Router } from 'express';
import { GnssParser } from '../util/gnss';
import { createConfigRouter } from './config';
import { createGnssRouter } from './gnss';

export const createRouter = (parser: GnssParser): Router => {
  const router = Router();

  router.use('/api/1', router);
  router.use('/gnss', createGnssRouter(parser));
  router.use('/config', createConfigRouter(parser));

  router.get('/ping', (req: Request, res: Response) => {
    res.json({ healthy: true });
  });

  return router;
};
