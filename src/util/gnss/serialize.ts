import {
  Constellation,
  ConstellationView,
  GlobalStateView,
} from '../../types/gnss';
import { isActive } from './accuracy';
import { GnssParser } from './index';
import { CONSTELLATIONS } from './state';

export const toConstellationView = (
  parser: GnssParser,
  name: Constellation,
): ConstellationView => {
  const system = parser.getConstellation(name);
  return {
    name,
    satellitesUsed: [...system.satellitesUsed],
    satellites: [...system.satellitesInfo.values()]
      .map(satellite => ({ ...satellite }))
      .sort((a, b) => a.prn - b.prn),
    pdop: system.pdop,
    hdop: system.hdop,
    vdop: system.vdop,
    latitude: system.latitude,
    longitude: system.longitude,
    altitude: system.altitude,
    accuracy: system.accuracy,
    active: isActive(system),
  };
};

export const toStateView = (parser: GnssParser): GlobalStateView => {
  const state = parser.getState();
  return {
    time: state.time,
    date: state.date,
    status: state.status,
    latitude: state.latitude,
    longitude: state.longitude,
    altitude: state.altitude,
    geoidSeparation: state.geoidSeparation,
    hdop: state.hdop,
    fixQuality: state.fixQuality,
    numSatellites: state.numSatellites,
    speedKnots: state.speedKnots,
    trackAngle: state.trackAngle,
    fusedAccuracy: parser.getFusedAccuracy(),
    fusedPosition: state.fusedPosition,
    constellations: CONSTELLATIONS.map(name => toConstellationView(parser, name)),
  };
};
