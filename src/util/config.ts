import {
  DEFAULT_FUSION_INTERVAL,
  DEFAULT_SOURCE_COMMAND,
  DEFAULT_SOURCE_RESTART_DELAY,
} from '../config';
import { FusionConfig } from '../types';
import { isRecord } from './index';
import { GnssParser } from './gnss';
import { CONSTELLATIONS, DEFAULT_ACCURACY, isConstellation } from './gnss/state';

const config: FusionConfig = {
  mode: 'advanced',
  fusionInterval: DEFAULT_FUSION_INTERVAL,
  accuracies: { ...DEFAULT_ACCURACY },
  sourceCommand: DEFAULT_SOURCE_COMMAND,
  sourceRestartDelay: DEFAULT_SOURCE_RESTART_DELAY,
};

let currentConfig: FusionConfig = getDefaultConfig();

export function getDefaultConfig(): FusionConfig {
  return { ...config, accuracies: { ...config.accuracies } };
}

export const getConfig = (): FusionConfig => {
  return currentConfig;
};

const isPositiveNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value) && value > 0;

const isValidAccuracies = (value: unknown): boolean => {
  if (!isRecord(value)) {
    return false;
  }
  return Object.entries(value).every(
    ([name, meters]) => isConstellation(name) && isPositiveNumber(meters),
  );
};

export const isValidConfig = (_config: unknown): _config is FusionConfig => {
  return (
    isRecord(_config) &&
    (_config.mode === 'simple' || _config.mode === 'advanced') &&
    isPositiveNumber(_config.fusionInterval) &&
    isValidAccuracies(_config.accuracies) &&
    (_config.fusedAccuracy === undefined ||
      isPositiveNumber(_config.fusedAccuracy)) &&
    typeof _config.sourceCommand === 'string' &&
    isPositiveNumber(_config.sourceRestartDelay)
  );
};

/**
 * Pushes the configured accuracies into the parser.
 */
export const applyConfig = (parser: GnssParser, _config: FusionConfig) => {
  for (const name of CONSTELLATIONS) {
    const meters = _config.accuracies[name];
    if (meters !== undefined) {
      parser.setConstellationAccuracy(name, meters);
    }
  }
  if (_config.fusedAccuracy !== undefined) {
    parser.setFusedAccuracy(_config.fusedAccuracy);
  } else {
    parser.clearFusedAccuracy();
  }
};

/**
 * Replaces the current config and returns the one it replaced.
 */
export const setConfig = (
  parser: GnssParser,
  _config: FusionConfig,
): FusionConfig => {
  const previous = currentConfig;
  currentConfig = {
    ..._config,
    accuracies: { ...DEFAULT_ACCURACY, ..._config.accuracies },
  };
  applyConfig(parser, currentConfig);
  return previous;
};
