import {
  Constellation,
  ConstellationState,
  FusedPosition,
  GlobalState,
} from '../../types/gnss';
import { getAccuracyFloor } from './accuracy';
import { CONSTELLATIONS } from './state';

export const MIN_SATELLITES = 4; // minimum for a 3D fix
export const WEIGHT_OFFSET = 0.1;
export const VERTICAL_FACTOR = 1.5;
export const ADVANCED_VDOP_FACTOR = 0.8;
export const METERS_PER_DEGREE = 111000;
export const MIN_ACCURACY = 1.0; // meters

interface FusionCandidate {
  name: Constellation;
  latitude: number;
  longitude: number;
  altitude?: number;
  horizontal: number;
  vertical: number;
}

type CandidateBuilder = (
  name: Constellation,
  system: ConstellationState,
) => FusionCandidate | undefined;

interface WeightedFix {
  latitude: number;
  longitude: number;
  altitude: number;
  weights: number[];
  altitudeWeights: number[];
  // candidates that reported an altitude, aligned with altitudeWeights
  withAltitude: FusionCandidate[];
}

const weightOf = (accuracy: number) => 1 / (accuracy + WEIGHT_OFFSET);

const sum = (values: number[]) => values.reduce((acc, v) => acc + v, 0);

/**
 * Weighted mean taken relative to the first value, so identical inputs
 * give back exactly that value.
 */
const weightedMean = (values: number[], weights: number[]): number => {
  const reference = values[0];
  const totalWeight = sum(weights);
  const offset = sum(values.map((v, i) => (v - reference) * weights[i]));
  return reference + offset / totalWeight;
};

const simpleCandidate: CandidateBuilder = (name, system) => {
  const { latitude, longitude, hdop, accuracy } = system;
  if (
    latitude === undefined ||
    longitude === undefined ||
    hdop === undefined ||
    system.satellitesInfo.size < MIN_SATELLITES
  ) {
    return undefined;
  }
  const vdop = system.vdop ?? hdop * VERTICAL_FACTOR;
  return {
    name,
    latitude,
    longitude,
    altitude: system.altitude,
    horizontal: Math.max(hdop * accuracy, accuracy),
    vertical: Math.max(
      vdop * accuracy * VERTICAL_FACTOR,
      accuracy * VERTICAL_FACTOR,
    ),
  };
};

const advancedCandidate: CandidateBuilder = (name, system) => {
  const { latitude, longitude, hdop, pdop, accuracy } = system;
  if (
    latitude === undefined ||
    longitude === undefined ||
    hdop === undefined ||
    pdop === undefined ||
    system.satellitesInfo.size < MIN_SATELLITES
  ) {
    return undefined;
  }
  const vdop = system.vdop ?? pdop * ADVANCED_VDOP_FACTOR;
  return {
    name,
    latitude,
    longitude,
    altitude: system.altitude,
    horizontal: Math.max(Math.sqrt(hdop * hdop + pdop * pdop), accuracy),
    vertical: Math.max(
      Math.sqrt(vdop * vdop + pdop * pdop),
      accuracy * VERTICAL_FACTOR,
    ),
  };
};

export const collectCandidates = (
  state: GlobalState,
  build: CandidateBuilder,
): FusionCandidate[] => {
  const candidates: FusionCandidate[] = [];
  for (const name of CONSTELLATIONS) {
    const candidate = build(name, state.constellations[name]);
    if (candidate) {
      candidates.push(candidate);
    }
  }
  return candidates;
};

const combine = (candidates: FusionCandidate[]): WeightedFix => {
  const weights = candidates.map(c => weightOf(c.horizontal));
  const withAltitude = candidates.filter(c => c.altitude !== undefined);
  const altitudes = withAltitude.map(c => c.altitude ?? 0);
  const altitudeWeights = withAltitude.map(c => weightOf(c.vertical));

  return {
    latitude: weightedMean(
      candidates.map(c => c.latitude),
      weights,
    ),
    longitude: weightedMean(
      candidates.map(c => c.longitude),
      weights,
    ),
    altitude: withAltitude.length
      ? weightedMean(altitudes, altitudeWeights)
      : 0,
    weights,
    altitudeWeights,
    withAltitude,
  };
};

const passThrough = (candidate: FusionCandidate): FusedPosition => {
  return {
    latitude: candidate.latitude,
    longitude: candidate.longitude,
    altitude: candidate.altitude ?? 0,
    horizontalAccuracy: Math.max(candidate.horizontal, MIN_ACCURACY),
    verticalAccuracy: Math.max(candidate.vertical, MIN_ACCURACY),
    contributingSystems: [candidate.name],
  };
};

/**
 * Weighted average of every constellation with a position, an HDOP and at
 * least four satellites in view. Returns undefined when none qualifies.
 */
export const fuseSimple = (state: GlobalState): FusedPosition | undefined => {
  const candidates = collectCandidates(state, simpleCandidate);
  if (!candidates.length) {
    return undefined;
  }
  if (candidates.length === 1) {
    return passThrough(candidates[0]);
  }

  const floor = getAccuracyFloor(state);
  const fix = combine(candidates);

  const horizontalAccuracy = Math.max(
    weightedMean(
      candidates.map(c => c.horizontal),
      fix.weights,
    ),
    floor,
  );
  const verticalAccuracy = fix.withAltitude.length
    ? Math.max(
        weightedMean(
          fix.withAltitude.map(c => c.vertical),
          fix.altitudeWeights,
        ),
        floor * VERTICAL_FACTOR,
      )
    : horizontalAccuracy * VERTICAL_FACTOR;

  return {
    latitude: fix.latitude,
    longitude: fix.longitude,
    altitude: fix.altitude,
    horizontalAccuracy,
    verticalAccuracy,
    contributingSystems: candidates.map(c => c.name),
  };
};

/**
 * Variance weighted fusion: combines HDOP/VDOP with PDOP and estimates the
 * accuracy from the spread of the member fixes around the fused point.
 * Degrees are turned into meters with a flat 111 km per degree.
 */
export const fuseAdvanced = (state: GlobalState): FusedPosition | undefined => {
  const candidates = collectCandidates(state, advancedCandidate);
  if (!candidates.length) {
    return undefined;
  }
  if (candidates.length === 1) {
    return passThrough(candidates[0]);
  }

  const floor = getAccuracyFloor(state);
  const fix = combine(candidates);

  const horizontalVariance =
    sum(
      candidates.map((c, i) => {
        const latDiff = c.latitude - fix.latitude;
        const lonDiff = c.longitude - fix.longitude;
        return fix.weights[i] * (latDiff * latDiff + lonDiff * lonDiff);
      }),
    ) / sum(fix.weights);
  const horizontalAccuracy = Math.max(
    Math.sqrt(horizontalVariance) * METERS_PER_DEGREE,
    floor,
    MIN_ACCURACY,
  );

  const verticalVariance = fix.withAltitude.length
    ? sum(
        fix.withAltitude.map((c, i) => {
          const altDiff = (c.altitude ?? 0) - fix.altitude;
          return fix.altitudeWeights[i] * altDiff * altDiff;
        }),
      ) / sum(fix.altitudeWeights)
    : 0;
  const verticalAccuracy = Math.max(
    verticalVariance > 0
      ? Math.sqrt(verticalVariance)
      : horizontalAccuracy * VERTICAL_FACTOR,
    floor * VERTICAL_FACTOR,
  );

  return {
    latitude: fix.latitude,
    longitude: fix.longitude,
    altitude: fix.altitude,
    horizontalAccuracy,
    verticalAccuracy,
    contributingSystems: candidates.map(c => c.name),
  };
};
