import { Constellation, GlobalState, SentenceDecoder } from '../../types/gnss';
import { splitSentence } from '../nmea';
import {
  decodeGGA,
  decodeGLL,
  decodeGSA,
  decodeGSV,
  decodeRMC,
  decodeVTG,
} from './decoders';

export const SENTENCE_ID_LENGTH = 5;

interface SentenceHandler {
  decode: SentenceDecoder;
  constellation?: Constellation;
}

// GGA, RMC, VTG and GSA come from the combined (GN) talker,
// GSV and GLL are reported per constellation
export const SENTENCE_HANDLERS: Record<string, SentenceHandler> = {
  GNGGA: { decode: decodeGGA },
  GNRMC: { decode: decodeRMC },
  GNVTG: { decode: decodeVTG },
  GNGSA: { decode: decodeGSA },
  GPGSV: { decode: decodeGSV, constellation: Constellation.GPS },
  GLGSV: { decode: decodeGSV, constellation: Constellation.GLONASS },
  GAGSV: { decode: decodeGSV, constellation: Constellation.GALILEO },
  BDGSV: { decode: decodeGSV, constellation: Constellation.BEIDOU },
  GPGLL: { decode: decodeGLL, constellation: Constellation.GPS },
  GLGLL: { decode: decodeGLL, constellation: Constellation.GLONASS },
  GAGLL: { decode: decodeGLL, constellation: Constellation.GALILEO },
  BDGLL: { decode: decodeGLL, constellation: Constellation.BEIDOU },
};

export const getSentenceId = (fields: string[]): string | undefined => {
  const first = fields[0];
  if (!first || first.length < SENTENCE_ID_LENGTH) {
    return undefined;
  }
  return first.slice(0, SENTENCE_ID_LENGTH);
};

/**
 * Decodes one sentence into the state.
 * Returns false when the sentence was not recognised and was dropped.
 */
export const routeSentence = (state: GlobalState, line: string): boolean => {
  const fields = splitSentence(line);
  const id = getSentenceId(fields);
  if (!id || !Object.prototype.hasOwnProperty.call(SENTENCE_HANDLERS, id)) {
    return false;
  }
  const { decode, constellation } = SENTENCE_HANDLERS[id];
  decode(state, fields, constellation);
  return true;
};
