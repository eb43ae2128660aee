export const SENTENCE_START = '$';
export const CHECKSUM_DELIMITER = '*';

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)$/;

export const splitSentence = (line: string): string[] => {
  const sentence = line.startsWith(SENTENCE_START) ? line.slice(1) : line;
  return sentence.split(',');
};

export const stripChecksum = (field: string): string => {
  const index = field.indexOf(CHECKSUM_DELIMITER);
  return index === -1 ? field : field.slice(0, index);
};

/**
 * Strict real number parsing for a single NMEA field.
 * Only plain decimals are accepted (no hex, exponent or padding); anything
 * else, empty included, is `undefined`, never 0.
 */
export const parseNumber = (field?: string): number | undefined => {
  if (field === undefined || !DECIMAL.test(field)) {
    return undefined;
  }
  return Number(field);
};

export const parseInteger = (field?: string): number | undefined => {
  if (field === undefined || !/^\d+$/.test(field)) {
    return undefined;
  }
  return parseInt(field, 10);
};

export const parseText = (field?: string): string | undefined => {
  const text = field === undefined ? '' : stripChecksum(field);
  return text ? text : undefined;
};

/**
 * Converts a `DDMM.mmmm` (latitude) or `DDDMM.mmmm` (longitude) field plus its
 * hemisphere letter into signed decimal degrees.
 *
 * @example
 * parseCoordinate('4807.038', 'N'); // 48.1173
 * parseCoordinate('01131.000', 'W'); // -11.516667
 */
export const parseCoordinate = (
  value?: string,
  hemisphere?: string,
): number | undefined => {
  const raw = parseNumber(value);
  if (raw === undefined || !hemisphere) {
    return undefined;
  }
  const degrees = Math.floor(raw / 100);
  const minutes = raw % 100;
  const decimal = degrees + minutes / 60;
  return hemisphere === 'S' || hemisphere === 'W' ? -decimal : decimal;
};
