import {
  parseCoordinate,
  parseInteger,
  parseNumber,
  parseText,
  splitSentence,
  stripChecksum,
} from '../../src/util/nmea';

describe('NMEA field parsing', () => {
  describe('parseCoordinate', () => {
    it('should convert a latitude to decimal degrees', () => {
      expect(parseCoordinate('4807.038', 'N')).toBeCloseTo(48.1173, 4);
    });

    it('should convert a longitude to decimal degrees', () => {
      expect(parseCoordinate('01131.000', 'E')).toBeCloseTo(11.5167, 4);
    });

    it('should negate southern and western hemispheres', () => {
      expect(parseCoordinate('4807.038', 'S')).toBeCloseTo(-48.1173, 4);
      expect(parseCoordinate('01131.000', 'W')).toBeCloseTo(-11.5167, 4);
    });

    it('should return undefined when the hemisphere is missing', () => {
      expect(parseCoordinate('4807.038', undefined)).toBeUndefined();
      expect(parseCoordinate('4807.038', '')).toBeUndefined();
    });

    it('should return undefined when the value is missing or not a number', () => {
      expect(parseCoordinate(undefined, 'N')).toBeUndefined();
      expect(parseCoordinate('', 'N')).toBeUndefined();
      expect(parseCoordinate('48O7.038', 'N')).toBeUndefined();
      expect(parseCoordinate('0x12C', 'N')).toBeUndefined();
    });
  });

  describe('parseNumber', () => {
    it('should keep zero distinct from empty', () => {
      expect(parseNumber('0')).toBe(0);
      expect(parseNumber('')).toBeUndefined();
      expect(parseNumber(undefined)).toBeUndefined();
    });

    it('should parse reals and reject garbage', () => {
      expect(parseNumber('545.4')).toBe(545.4);
      expect(parseNumber('M')).toBeUndefined();
    });

    it('should accept signed and bare fractional decimals', () => {
      expect(parseNumber('-12.5')).toBe(-12.5);
      expect(parseNumber('+3')).toBe(3);
      expect(parseNumber('.5')).toBe(0.5);
      expect(parseNumber('7.')).toBe(7);
    });

    it('should reject numbers outside the decimal field grammar', () => {
      expect(parseNumber('0x10')).toBeUndefined();
      expect(parseNumber('0b11')).toBeUndefined();
      expect(parseNumber('1e3')).toBeUndefined();
      expect(parseNumber(' 1.5 ')).toBeUndefined();
      expect(parseNumber('Infinity')).toBeUndefined();
      expect(parseNumber('.')).toBeUndefined();
    });
  });

  describe('parseInteger', () => {
    it('should parse zero padded integers', () => {
      expect(parseInteger('08')).toBe(8);
      expect(parseInteger('301')).toBe(301);
    });

    it('should reject reals and empty fields', () => {
      expect(parseInteger('1.5')).toBeUndefined();
      expect(parseInteger('')).toBeUndefined();
      expect(parseInteger('39*7C')).toBeUndefined();
    });
  });

  it('should strip the checksum from the last field', () => {
    expect(stripChecksum('39*7C')).toBe('39');
    expect(stripChecksum('*61')).toBe('');
    expect(stripChecksum('2.1')).toBe('2.1');
  });

  it('should treat empty text fields as unset', () => {
    expect(parseText('123519')).toBe('123519');
    expect(parseText('230394*6A')).toBe('230394');
    expect(parseText('')).toBeUndefined();
    expect(parseText(undefined)).toBeUndefined();
  });

  it('should strip a single leading $ before splitting', () => {
    expect(splitSentence('$GNVTG,054.7,T')).toEqual(['GNVTG', '054.7', 'T']);
    expect(splitSentence('GNVTG,054.7')).toEqual(['GNVTG', '054.7']);
    expect(splitSentence('$$GNVTG')).toEqual(['$GNVTG']);
  });
});
