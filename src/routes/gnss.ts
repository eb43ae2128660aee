import { Request, Response, Router } from 'express';
import { FusionMode } from '../types/gnss';
import { isRecord } from '../util';
import { getConfig } from '../util/config';
import { GnssParser } from '../util/gnss';
import { toConstellationView, toStateView } from '../util/gnss/serialize';
import { CONSTELLATIONS, isConstellation } from '../util/gnss/state';

const isFusionMode = (value: unknown): value is FusionMode =>
  value === 'simple' || value === 'advanced';

const readSentences = (body: unknown): string[] => {
  if (!isRecord(body)) {
    return [];
  }
  if (typeof body.sentence === 'string') {
    return [body.sentence];
  }
  if (Array.isArray(body.sentences)) {
    return body.sentences.filter(
      (sentence: unknown): sentence is string => typeof sentence === 'string',
    );
  }
  return [];
};

export const createGnssRouter = (parser: GnssParser): Router => {
  const router = Router();

  router.get('/', (req: Request, res: Response) => {
    res.json(toStateView(parser));
  });

  router.get('/constellations/:name', (req: Request, res: Response) => {
    const name = req.params.name.toUpperCase();
    if (!isConstellation(name)) {
      res.status(404).json({ error: `Unknown constellation ${req.params.name}` });
      return;
    }
    res.json(toConstellationView(parser, name));
  });

  router.get('/fused', (req: Request, res: Response) => {
    res.json(parser.getFusedPosition() ?? {});
  });

  router.post('/fuse', (req: Request, res: Response) => {
    const body: unknown = req.body;
    const mode = isRecord(body) && body.mode !== undefined ? body.mode : getConfig().mode;
    if (!isFusionMode(mode)) {
      res.status(400).json({ error: 'mode must be simple or advanced' });
      return;
    }
    try {
      const fused = parser.fuse(mode);
      res.json({ mode, fusedPosition: fused ?? null });
    } catch (error: unknown) {
      console.log('Fusion failed', error);
      res.status(500).json({ error: 'Fusion failed' });
    }
  });

  router.post('/nmea', (req: Request, res: Response) => {
    const sentences = readSentences(req.body);
    if (!sentences.length) {
      res.status(400).json({ error: 'format is { sentence } or { sentences }' });
      return;
    }
    const decoded = sentences.filter(sentence => parser.feed(sentence.trim()));
    res.json({ received: sentences.length, decoded: decoded.length });
  });

  router.get('/accuracy', (req: Request, res: Response) => {
    const constellations: Record<string, number | undefined> = {};
    for (const name of CONSTELLATIONS) {
      constellations[name] = parser.getConstellationAccuracy(name);
    }
    res.json({ fused: parser.getFusedAccuracy(), constellations });
  });

  router.post('/accuracy', (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (
      !isRecord(body) ||
      typeof body.name !== 'string' ||
      typeof body.value !== 'number'
    ) {
      res.status(400).json({ error: 'format is { name, value }' });
      return;
    }
    const name = body.name.toUpperCase();
    if (!parser.setConstellationAccuracy(name, body.value)) {
      res.status(400).json({ error: `Cannot set accuracy of ${body.name}` });
      return;
    }
    res.json({ [name]: body.value, fused: parser.getFusedAccuracy() });
  });

  router.post('/accuracy/fused', (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (
      !isRecord(body) ||
      typeof body.value !== 'number' ||
      !parser.setFusedAccuracy(body.value)
    ) {
      res.status(400).json({ error: 'format is { value } with value > 0' });
      return;
    }
    res.json({ fused: parser.getFusedAccuracy() });
  });

  router.post('/reset', (req: Request, res: Response) => {
    parser.reset();
    res.json({ output: 'done' });
  });

  return router;
};
