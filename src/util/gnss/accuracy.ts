import { ConstellationSnapshot, GlobalState } from '../../types/gnss';
import { CONSTELLATIONS, isConstellation } from './state';

const isValidAccuracy = (meters: number) =>
  Number.isFinite(meters) && meters > 0;

export const isActive = (system: ConstellationSnapshot): boolean => {
  return (
    system.satellitesInfo.size > 0 &&
    system.latitude !== undefined &&
    system.longitude !== undefined
  );
};

/**
 * Root-sum-of-squares combination of independent accuracies:
 * 1 / sqrt(sum(1 / a^2))
 */
export const combineAccuracies = (accuracies: number[]): number => {
  const sum = accuracies.reduce(
    (acc, accuracy) => acc + 1 / (accuracy * accuracy),
    0,
  );
  return 1 / Math.sqrt(sum);
};

export const getFusedAccuracy = (state: GlobalState): number => {
  const active = CONSTELLATIONS.map(name => state.constellations[name]).filter(
    isActive,
  );
  if (active.length) {
    return combineAccuracies(active.map(system => system.accuracy));
  }
  if (state.fusedAccuracy !== undefined) {
    return state.fusedAccuracy;
  }
  return combineAccuracies(
    CONSTELLATIONS.map(name => state.constellations[name].accuracy),
  );
};

/**
 * Lower bound for fused accuracies: the caller's override when one is set,
 * otherwise the computed global accuracy.
 */
export const getAccuracyFloor = (state: GlobalState): number => {
  return state.fusedAccuracy ?? getFusedAccuracy(state);
};

export const clearFusedAccuracy = (state: GlobalState) => {
  state.fusedAccuracy = undefined;
};

export const setFusedAccuracy = (state: GlobalState, meters: number) => {
  if (!isValidAccuracy(meters)) {
    return false;
  }
  state.fusedAccuracy = meters;
  return true;
};

export const getConstellationAccuracy = (
  state: GlobalState,
  name: string,
): number | undefined => {
  return isConstellation(name) ? state.constellations[name].accuracy : undefined;
};

export const setConstellationAccuracy = (
  state: GlobalState,
  name: string,
  meters: number,
): boolean => {
  if (!isConstellation(name) || !isValidAccuracy(meters)) {
    return false;
  }
  state.constellations[name].accuracy = meters;
  return true;
};
