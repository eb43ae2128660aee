import { Constellation } from '../../../src/types/gnss';
import { GnssParser } from '../../../src/util/gnss';
import { combineAccuracies, isActive } from '../../../src/util/gnss/accuracy';
import { GGA, GPS_GSV } from '../../fixtures/nmea';

describe('Accuracy model', () => {
  let gnss: GnssParser;

  beforeEach(() => {
    gnss = new GnssParser();
  });

  it('should start with the default nominal accuracies', () => {
    expect(gnss.getConstellationAccuracy('GPS')).toBe(2.0);
    expect(gnss.getConstellationAccuracy('GLONASS')).toBe(4.0);
    expect(gnss.getConstellationAccuracy('GALILEO')).toBe(3.0);
    expect(gnss.getConstellationAccuracy('BEIDOU')).toBe(3.0);
  });

  it('should combine accuracies as root sum of squares', () => {
    expect(combineAccuracies([2.0, 4.0, 3.0, 3.0])).toBeCloseTo(1.3675, 4);
    expect(combineAccuracies([3.0])).toBeCloseTo(3.0, 10);
  });

  it('should fall back to the RSS of all constellations when none is active', () => {
    expect(gnss.getFusedAccuracy()).toBeCloseTo(1.37, 2);
  });

  it('should only count active constellations', () => {
    gnss.feed(GPS_GSV);
    expect(isActive(gnss.getConstellation(Constellation.GPS))).toBe(false);

    gnss.feed(GGA);
    expect(isActive(gnss.getConstellation(Constellation.GPS))).toBe(true);
    expect(gnss.getFusedAccuracy()).toBe(2.0);
  });

  it('should reject unknown constellations and invalid values', () => {
    expect(gnss.setConstellationAccuracy('QZSS', 1.0)).toBe(false);
    expect(gnss.getConstellationAccuracy('QZSS')).toBeUndefined();
    expect(gnss.setConstellationAccuracy('GPS', 0)).toBe(false);
    expect(gnss.setConstellationAccuracy('GPS', NaN)).toBe(false);
    expect(gnss.getConstellationAccuracy('GPS')).toBe(2.0);
  });

  it('should use updated nominal accuracies', () => {
    for (const name of ['GPS', 'GLONASS', 'GALILEO', 'BEIDOU']) {
      expect(gnss.setConstellationAccuracy(name, 3.0)).toBe(true);
    }
    expect(gnss.getFusedAccuracy()).toBeCloseTo(1.5, 10);
  });

  it('should use an explicit override only while nothing is active', () => {
    expect(gnss.setFusedAccuracy(2.5)).toBe(true);
    expect(gnss.getFusedAccuracy()).toBe(2.5);

    gnss.feed(GPS_GSV);
    gnss.feed(GGA);
    expect(gnss.getFusedAccuracy()).toBe(2.0);
  });

  it('should reject a non positive override', () => {
    expect(gnss.setFusedAccuracy(-1)).toBe(false);
    expect(gnss.getFusedAccuracy()).toBeCloseTo(1.37, 2);
  });

  it('should keep configured accuracies across a reset', () => {
    gnss.setConstellationAccuracy('GALILEO', 1.0);
    gnss.setFusedAccuracy(0.8);
    gnss.feed(GPS_GSV);
    gnss.reset();

    expect(gnss.getConstellation(Constellation.GPS).satellitesInfo.size).toBe(0);
    expect(gnss.getConstellationAccuracy('GALILEO')).toBe(1.0);
    expect(gnss.getFusedAccuracy()).toBe(0.8);
  });
});
