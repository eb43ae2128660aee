import {
  Constellation,
  ConstellationSnapshot,
  FusedPosition,
  FusionMode,
  GlobalState,
  GlobalStateSnapshot,
} from '../../types/gnss';
import {
  clearFusedAccuracy,
  getConstellationAccuracy,
  getFusedAccuracy,
  setConstellationAccuracy,
  setFusedAccuracy,
} from './accuracy';
import { fuseAdvanced, fuseSimple } from './fusion';
import { routeSentence } from './sentences';
import { CONSTELLATIONS, createGlobalState, DEFAULT_ACCURACY } from './state';

/**
 * Multi-constellation NMEA decoder.
 *
 * Sentences are fed one at a time and update the global and per-constellation
 * state. The fused position only changes when `fuseSimple`/`fuseAdvanced`
 * is called.
 *
 * @example
 * const gnss = new GnssParser();
 * gnss.feed('$GNGGA,123519,4807.038,N,01131.000,E,1,08,0.9,545.4,M,46.9,M,,*47');
 * gnss.fuseSimple();
 * const fused = gnss.getFusedPosition();
 */
export class GnssParser {
  private state: GlobalState = createGlobalState();

  feed(line: string): boolean {
    return routeSentence(this.state, line);
  }

  fuseSimple(): FusedPosition | undefined {
    this.state.fusedPosition = fuseSimple(this.state);
    return this.state.fusedPosition;
  }

  fuseAdvanced(): FusedPosition | undefined {
    this.state.fusedPosition = fuseAdvanced(this.state);
    return this.state.fusedPosition;
  }

  fuse(mode: FusionMode): FusedPosition | undefined {
    return mode === 'advanced' ? this.fuseAdvanced() : this.fuseSimple();
  }

  getState(): GlobalStateSnapshot {
    return this.state;
  }

  getConstellation(name: Constellation): ConstellationSnapshot {
    return this.state.constellations[name];
  }

  getFusedPosition(): FusedPosition | undefined {
    return this.state.fusedPosition;
  }

  getConstellationAccuracy(name: string): number | undefined {
    return getConstellationAccuracy(this.state, name);
  }

  setConstellationAccuracy(name: string, meters: number): boolean {
    return setConstellationAccuracy(this.state, name, meters);
  }

  getFusedAccuracy(): number {
    return getFusedAccuracy(this.state);
  }

  setFusedAccuracy(meters: number): boolean {
    return setFusedAccuracy(this.state, meters);
  }

  clearFusedAccuracy() {
    clearFusedAccuracy(this.state);
  }

  // Drops decoded data, keeps configured accuracies
  reset() {
    const accuracies = { ...DEFAULT_ACCURACY };
    for (const name of CONSTELLATIONS) {
      accuracies[name] = this.state.constellations[name].accuracy;
    }
    const fusedAccuracy = this.state.fusedAccuracy;
    this.state = createGlobalState(accuracies);
    this.state.fusedAccuracy = fusedAccuracy;
  }
}

export const gnss = new GnssParser();
