import { Constellation, FusionMode } from './gnss';

export interface IService {
  execute: () => void | Promise<void>;
  interval?: number;
  delay?: number;
}

export interface FusionConfig {
  mode: FusionMode;
  fusionInterval: number; // ms
  accuracies: Partial<Record<Constellation, number>>;
  fusedAccuracy?: number;
  sourceCommand: string;
  sourceRestartDelay: number; // ms
}
