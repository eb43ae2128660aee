import {
  Constellation,
  ConstellationMap,
  ConstellationState,
  GlobalState,
} from '../../types/gnss';

export const CONSTELLATIONS: Constellation[] = [
  Constellation.GPS,
  Constellation.GLONASS,
  Constellation.GALILEO,
  Constellation.BEIDOU,
];

// meters
export const DEFAULT_ACCURACY: Record<Constellation, number> = {
  [Constellation.GPS]: 2.0,
  [Constellation.GLONASS]: 4.0,
  [Constellation.GALILEO]: 3.0,
  [Constellation.BEIDOU]: 3.0,
};

export const isConstellation = (name: string): name is Constellation => {
  return CONSTELLATIONS.some(constellation => constellation === name);
};

export const createConstellationState = (
  accuracy: number,
): ConstellationState => {
  return {
    satellitesUsed: [],
    satellitesInfo: new Map(),
    accuracy,
  };
};

export const createGlobalState = (
  accuracies: Record<Constellation, number> = DEFAULT_ACCURACY,
): GlobalState => {
  const constellations: ConstellationMap = {
    [Constellation.GPS]: createConstellationState(accuracies[Constellation.GPS]),
    [Constellation.GLONASS]: createConstellationState(accuracies[Constellation.GLONASS]),
    [Constellation.GALILEO]: createConstellationState(accuracies[Constellation.GALILEO]),
    [Constellation.BEIDOU]: createConstellationState(accuracies[Constellation.BEIDOU]),
  };
  return { constellations };
};

interface PositionUpdate {
  latitude?: number;
  longitude?: number;
  altitude?: number;
}

/**
 * Copies a decoded position into a constellation that currently sees
 * satellites, or clears its position when it sees none.
 * Altitude is only written when the sentence carries one.
 */
export const applyPosition = (
  system: ConstellationState,
  position: PositionUpdate,
  hasAltitude: boolean,
) => {
  if (system.satellitesInfo.size > 0) {
    system.latitude = position.latitude;
    system.longitude = position.longitude;
    if (hasAltitude) {
      system.altitude = position.altitude;
    }
  } else {
    system.latitude = undefined;
    system.longitude = undefined;
    system.altitude = undefined;
  }
};
