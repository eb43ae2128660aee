import { FUSION_CONFIG_PATH } from '../config';
import { readFile } from 'fs/promises';
import { jsonrepair } from 'jsonrepair';
import { IService } from '../types';
import { fileExists, isRecord } from '../util';
import { getDefaultConfig, isValidConfig, setConfig } from '../util/config';
import { gnss } from '../util/gnss';

export const loadFusionConfig = async (path: string) => {
  const defaultConfig = getDefaultConfig();
  const exists = await fileExists(path);
  if (!exists) {
    console.log('Fusion config is not set yet, using defaults');
    return defaultConfig;
  }
  try {
    const data = await readFile(path);
    const configJSON: unknown = JSON.parse(jsonrepair(data.toString()));
    const merged = isRecord(configJSON)
      ? { ...defaultConfig, ...configJSON }
      : configJSON;
    if (isValidConfig(merged)) {
      return merged;
    }
    console.log('Fusion config is invalid, using defaults');
  } catch (e: unknown) {
    console.log('Error parsing fusion config', e);
  }
  return defaultConfig;
};

export const LoadFusionConfigService: IService = {
  execute: async () => {
    const config = await loadFusionConfig(FUSION_CONFIG_PATH);
    setConfig(gnss, config);
    console.log(`Fusion config loaded, mode: ${config.mode}`);
  },
};
