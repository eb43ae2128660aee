import { FusedPosition } from '../types/gnss';
import { IService } from '../types';
import { getConfig } from '../util/config';
import { gnss } from '../util/gnss';
import { broadcast } from '../websockets';

let fusionTimer: NodeJS.Timeout | null = null;

export const fuseAndBroadcast = (): FusedPosition | undefined => {
  const fused = gnss.fuse(getConfig().mode);
  broadcast({
    type: 'fusedPosition',
    data: fused ?? null,
  });
  return fused;
};

const tick = () => {
  try {
    fuseAndBroadcast();
  } catch (e: unknown) {
    console.log('Fusion failed with error', e);
  }
  // interval is re-read so config updates apply on the next round
  fusionTimer = setTimeout(tick, getConfig().fusionInterval);
};

export const stopFusion = () => {
  if (fusionTimer) {
    clearTimeout(fusionTimer);
    fusionTimer = null;
  }
};

export const FusionService: IService = {
  execute: () => {
    stopFusion();
    tick();
  },
  delay: 2000,
};
