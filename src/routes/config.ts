import { Request, Response, Router } from 'express';
import { restartNmeaStream } from '../services/nmeaStream';
import { isRecord } from '../util';
import { getConfig, isValidConfig, setConfig } from '../util/config';
import { GnssParser } from '../util/gnss';

export const createConfigRouter = (parser: GnssParser): Router => {
  const router = Router();

  router.get('/', (req: Request, res: Response) => {
    res.json(getConfig());
  });

  router.post('/', (req: Request, res: Response) => {
    const body: unknown = req.body;
    const update = isRecord(body) ? body.config : undefined;
    const merged = isRecord(update) ? { ...getConfig(), ...update } : update;
    if (!isValidConfig(merged)) {
      res.status(400).json({ error: 'Invalid config' });
      return;
    }
    try {
      const previous = setConfig(parser, merged);
      if (previous.sourceCommand !== merged.sourceCommand) {
        console.log(`NMEA source changed to: ${merged.sourceCommand}`);
        restartNmeaStream();
      }
      res.json({ output: 'done' });
    } catch (error: unknown) {
      res.status(500).json({ error: String(error) });
    }
  });

  return router;
};
