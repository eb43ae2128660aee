import { Constellation, SentenceDecoder } from '../../types/gnss';
import {
  parseCoordinate,
  parseInteger,
  parseNumber,
  parseText,
  stripChecksum,
} from '../nmea';
import { applyPosition, CONSTELLATIONS } from './state';

// GSA: 12 PRN slots, then PDOP, HDOP, VDOP
const GSA_FIRST_PRN_FIELD = 3;
const GSA_LAST_PRN_FIELD = 14;
const GSA_DOP_COUNT = 3;

// GSV: satellite blocks of 4 fields start after the header
const GSV_FIRST_SATELLITE_FIELD = 4;
const GSV_BLOCK_SIZE = 4;

const PRN_RANGES: [Constellation, number, number][] = [
  [Constellation.GPS, 1, 32],
  [Constellation.GLONASS, 65, 96],
  [Constellation.BEIDOU, 201, 236],
  [Constellation.GALILEO, 301, 336],
];

export const classifyPrn = (prn: number): Constellation | undefined => {
  const range = PRN_RANGES.find(([, min, max]) => prn >= min && prn <= max);
  return range ? range[0] : undefined;
};

/**
 * GGA: time, position, fix quality, satellites used, HDOP, altitude
 */
export const decodeGGA: SentenceDecoder = (state, fields) => {
  const latitude = parseCoordinate(fields[2], fields[3]);
  const longitude = parseCoordinate(fields[4], fields[5]);
  const altitude = parseNumber(fields[9]);

  state.time = parseText(fields[1]);
  state.latitude = latitude;
  state.longitude = longitude;
  state.fixQuality = parseInteger(fields[6]);
  state.numSatellites = parseInteger(fields[7]);
  state.hdop = parseNumber(fields[8]);
  state.altitude = altitude;
  state.geoidSeparation = parseNumber(fields[11]);

  for (const name of CONSTELLATIONS) {
    applyPosition(
      state.constellations[name],
      { latitude, longitude, altitude },
      true,
    );
  }
};

/**
 * RMC: time, status, position, speed over ground, track angle, date
 */
export const decodeRMC: SentenceDecoder = (state, fields) => {
  const latitude = parseCoordinate(fields[3], fields[4]);
  const longitude = parseCoordinate(fields[5], fields[6]);

  state.time = parseText(fields[1]);
  state.status = parseText(fields[2]);
  state.latitude = latitude;
  state.longitude = longitude;
  state.speedKnots = parseNumber(fields[7]);
  state.trackAngle = parseNumber(fields[8]);
  state.date = parseText(fields[9]);

  for (const name of CONSTELLATIONS) {
    applyPosition(state.constellations[name], { latitude, longitude }, false);
  }
};

export const decodeVTG: SentenceDecoder = (state, fields) => {
  state.speedKnots = parseNumber(fields[5]);
};

export const decodeGLL: SentenceDecoder = (state, fields, constellation) => {
  const latitude = parseCoordinate(fields[1], fields[2]);
  const longitude = parseCoordinate(fields[3], fields[4]);

  state.latitude = latitude;
  state.longitude = longitude;

  if (constellation) {
    applyPosition(
      state.constellations[constellation],
      { latitude, longitude },
      false,
    );
  }
};

const readDops = (fields: string[]): number[] => {
  const dops: number[] = [];
  for (let i = GSA_LAST_PRN_FIELD + 1; i < fields.length; i++) {
    const value = parseNumber(stripChecksum(fields[i]));
    if (value !== undefined) {
      dops.push(value);
      if (dops.length === GSA_DOP_COUNT) {
        break;
      }
    }
  }
  return dops;
};

/**
 * GSA carries satellites of every constellation the receiver combines.
 * Each PRN goes to the constellation owning its range; the DOP triple is only
 * written to constellations that got at least one PRN from this sentence.
 */
export const decodeGSA: SentenceDecoder = (state, fields) => {
  const updated = new Set<Constellation>();

  for (let i = GSA_FIRST_PRN_FIELD; i <= GSA_LAST_PRN_FIELD; i++) {
    const prn = parseInteger(fields[i]);
    if (prn === undefined) {
      continue;
    }
    const constellation = classifyPrn(prn);
    if (constellation) {
      state.constellations[constellation].satellitesUsed.push(prn);
      updated.add(constellation);
    }
  }

  const [pdop, hdop, vdop] = readDops(fields);
  updated.forEach(name => {
    const system = state.constellations[name];
    system.pdop = pdop;
    system.hdop = hdop;
    system.vdop = vdop;
  });
};

export const decodeGSV: SentenceDecoder = (state, fields, constellation) => {
  if (!constellation) {
    return;
  }
  const system = state.constellations[constellation];

  for (
    let i = GSV_FIRST_SATELLITE_FIELD;
    i + GSV_BLOCK_SIZE - 1 < fields.length;
    i += GSV_BLOCK_SIZE
  ) {
    const prn = parseInteger(fields[i]);
    if (prn === undefined) {
      continue;
    }
    system.satellitesInfo.set(prn, {
      prn,
      elevation: parseInteger(fields[i + 1]),
      azimuth: parseInteger(fields[i + 2]),
      snr: parseInteger(stripChecksum(fields[i + 3])),
    });
  }
};
