import { spawn } from 'child_process';
import { createInterface } from 'readline';
import { IService } from '../types';
import { splitCommand } from '../util';
import { getConfig } from '../util/config';
import { gnss, GnssParser } from '../util/gnss';
import { SENTENCE_START } from '../util/nmea';

let stopSource: (() => void) | null = null;
let restartTimer: NodeJS.Timeout | null = null;
let isStopped = true;
let restartNow = false;

/**
 * Feeds one line of receiver output. Anything that is not a sentence
 * (gpsd JSON, partial lines) is skipped.
 */
export const handleNmeaLine = (parser: GnssParser, line: string): boolean => {
  const sentence = line.trim();
  if (!sentence.startsWith(SENTENCE_START)) {
    return false;
  }
  return parser.feed(sentence);
};

const scheduleRestart = (delay: number) => {
  if (isStopped || restartTimer) {
    return;
  }
  restartTimer = setTimeout(() => {
    restartTimer = null;
    startSource();
  }, delay);
};

const startSource = () => {
  const { sourceCommand } = getConfig();
  const [cmd, ...args] = splitCommand(sourceCommand);
  if (!cmd) {
    console.log('NMEA source command is not configured');
    return;
  }

  console.log(`Starting NMEA source: ${sourceCommand}`);
  const proc = spawn(cmd, args, { stdio: ['ignore', 'pipe', 'pipe'] });
  const lines = createInterface({ input: proc.stdout });

  lines.on('line', (line: string) => {
    handleNmeaLine(gnss, line);
  });
  proc.stderr.setEncoding('utf8');
  proc.stderr.on('data', (data: string) => {
    console.error('NMEA source:', data.trim());
  });
  proc.on('error', (err: Error) => {
    console.error('NMEA source error:', err.message);
  });
  proc.on('close', (code: number | null) => {
    console.log(`NMEA source exited with code ${code}`);
    lines.close();
    stopSource = null;
    // delay is read on exit so config updates apply to the next restart
    const delay = restartNow ? 0 : getConfig().sourceRestartDelay;
    restartNow = false;
    scheduleRestart(delay);
  });

  stopSource = () => {
    proc.kill('SIGTERM');
  };
};

/**
 * Replaces the running source with one started from the current config.
 * Returns false when the stream is not running.
 */
export const restartNmeaStream = (): boolean => {
  if (isStopped) {
    return false;
  }
  if (stopSource) {
    restartNow = true;
    stopSource();
    return true;
  }
  if (restartTimer) {
    clearTimeout(restartTimer);
    restartTimer = null;
  }
  startSource();
  return true;
};

export const stopNmeaStream = () => {
  isStopped = true;
  if (restartTimer) {
    clearTimeout(restartTimer);
    restartTimer = null;
  }
  if (stopSource) {
    stopSource();
    stopSource = null;
  }
};

export const NmeaStreamService: IService = {
  execute: () => {
    isStopped = false;
    if (!stopSource) {
      startSource();
    }
  },
  delay: 1000,
};
