export enum Constellation {
  GPS = 'GPS',
  GLONASS = 'GLONASS',
  GALILEO = 'GALILEO',
  BEIDOU = 'BEIDOU',
}

export type FusionMode = 'simple' | 'advanced';

export interface SatelliteInfo {
  prn: number;
  elevation?: number;
  azimuth?: number;
  snr?: number; // dBHz
}

export interface ConstellationState {
  // PRNs reported by GSA, appended as they come
  satellitesUsed: number[];
  satellitesInfo: Map<number, SatelliteInfo>;
  pdop?: number;
  hdop?: number;
  vdop?: number;
  latitude?: number;
  longitude?: number;
  altitude?: number;
  accuracy: number; // nominal, meters
}

export type ConstellationMap = Record<Constellation, ConstellationState>;

export interface FusedPosition {
  latitude: number;
  longitude: number;
  altitude: number;
  horizontalAccuracy: number;
  verticalAccuracy: number;
  contributingSystems: Constellation[];
}

export interface GlobalState {
  time?: string;
  date?: string; // DDMMYY
  status?: string;
  latitude?: number;
  longitude?: number;
  altitude?: number;
  geoidSeparation?: number;
  hdop?: number;
  fixQuality?: number;
  numSatellites?: number;
  speedKnots?: number;
  trackAngle?: number;
  constellations: ConstellationMap;
  fusedAccuracy?: number; // explicit override
  fusedPosition?: FusedPosition;
}

// What the parser hands out: nothing reachable from it can be mutated
export interface ConstellationSnapshot
  extends Readonly<Omit<ConstellationState, 'satellitesUsed' | 'satellitesInfo'>> {
  readonly satellitesUsed: readonly number[];
  readonly satellitesInfo: ReadonlyMap<number, Readonly<SatelliteInfo>>;
}

export interface GlobalStateSnapshot
  extends Readonly<Omit<GlobalState, 'constellations' | 'fusedPosition'>> {
  readonly constellations: Readonly<Record<Constellation, ConstellationSnapshot>>;
  readonly fusedPosition?: Readonly<FusedPosition>;
}

export type SentenceDecoder = (
  state: GlobalState,
  fields: string[],
  constellation?: Constellation,
) => void;

export interface ConstellationView {
  name: Constellation;
  satellitesUsed: number[];
  satellites: SatelliteInfo[];
  pdop?: number;
  hdop?: number;
  vdop?: number;
  latitude?: number;
  longitude?: number;
  altitude?: number;
  accuracy: number;
  active: boolean;
}

export interface GlobalStateView {
  time?: string;
  date?: string;
  status?: string;
  latitude?: number;
  longitude?: number;
  altitude?: number;
  geoidSeparation?: number;
  hdop?: number;
  fixQuality?: number;
  numSatellites?: number;
  speedKnots?: number;
  trackAngle?: number;
  fusedAccuracy: number;
  fusedPosition?: FusedPosition;
  constellations: ConstellationView[];
}
