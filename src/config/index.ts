export const PORT = Number(process.env.PORT) || 5000;

export const FUSION_CONFIG_PATH =
  process.env.GNSS_FUSION_CONFIG || '/mnt/data/gnss_fusion_config.json';

// Raw NMEA from gpsd
export const DEFAULT_SOURCE_COMMAND = 'gpspipe -r';

export const DEFAULT_FUSION_INTERVAL = 1000;
export const DEFAULT_SOURCE_RESTART_DELAY = 5000;
export const SHUTDOWN_TIMEOUT = 5000;
