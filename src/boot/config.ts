import { SENSOR_RANGES } from '@core/sensor-range';
import { MAX_PRECIPITATION_DELTA_MM } from '@core/precipitation';

import type { IrrigationAppConstants, IrrigationUserConfig, ZoneConfig } from '$types/config';

// ─────────────────────────────────────────────────────────────
// USER CONFIGURATION
//   Defaults for everything a user might tune. The JSON config
//   file and environment variables override these at boot.
// ─────────────────────────────────────────────────────────────

export const USER_CONFIG: Readonly<IrrigationUserConfig> = {
  // LATITUDE / LONGITUDE
  //   Role: Site position in decimal degrees; latitude drives extraterrestrial radiation.
  //   Critical: LATITUDE -90..90, LONGITUDE -180..180.
  //   Recommended: At least two decimals; 0.01° is ~1 km.
  LATITUDE: 0,
  LONGITUDE: 0,

  // ELEVATION_M
  //   Role: Site elevation in metres; used for pressure when no barometer is configured.
  //   Critical: -500..9000 m.
  //   Recommended: Within -100..4000 m; outside that FAO-56 pressure estimates degrade.
  ELEVATION_M: 0,

  // TIMEZONE
  //   Role: IANA timezone defining local calendar days for the ET cycle.
  //   Critical: Must be known to the runtime (e.g. "Europe/Berlin").
  //   Recommended: The timezone of the garden, not of the server.
  TIMEZONE: 'UTC',

  // SENSOR_ENTITIES
  //   Role: Entity ids of the weather sensors pushed by the host platform.
  //   Critical: temperature, humidity and precipitation are required and must differ.
  //   Recommended: Add wind and solar to unlock Penman-Monteith.
  SENSOR_ENTITIES: {
    temperature: 'sensor.outdoor_temperature',
    humidity: 'sensor.outdoor_humidity',
    precipitation: 'sensor.rain_total',
  },

  // ZONES
  //   Role: Irrigation zones, one valve and one balance each.
  //   Critical: At least one; ids and valve entities unique.
  //   Recommended: Fields left out of the JSON file take ZONE_DEFAULTS.
  ZONES: [],

  // ET_CRON
  //   Role: When the daily ET cycle runs, in TIMEZONE. It always processes the previous local day.
  //   Critical: Valid node-cron expression.
  //   Recommended: "0 0 * * *" (local midnight).
  ET_CRON: '0 0 * * *',

  // ET_CATCH_UP_ON_BOOT
  //   Role: Run the cycle for the previous day at startup.
  //   Critical: Boolean only.
  //   Recommended: true; the once-per-day guard makes a repeat a no-op.
  ET_CATCH_UP_ON_BOOT: true,

  // OVERRIDE_RESETS_ET_GUARD
  //   Role: Whether a manual balance override clears the last-ET date,
  //     letting the same day's ET apply again afterwards.
  //   Critical: Boolean only.
  //   Recommended: false; an override is taken as the state after today's ET.
  OVERRIDE_RESETS_ET_GUARD: false,

  // STATE_FILE
  //   Role: JSON file holding balances, ET guards and runtime tracking across restarts.
  //   Critical: Non-empty path; the directory is created if missing.
  //   Recommended: A persistent volume, not /tmp.
  STATE_FILE: 'data/state.json',

  // HTTP_PORT
  //   Role: Port of the HTTP API.
  //   Critical: Integer 1..65535.
  //   Recommended: 8080 behind a reverse proxy.
  HTTP_PORT: 8080,

  // API_TOKEN
  //   Role: Shared secret for /api routes (Bearer or raw Authorization header).
  //   Critical: None; an empty token makes every /api request fail with 500.
  //   Recommended: Set through the environment, never in the JSON file.
  API_TOKEN: '',

  // SLACK_ENABLED
  //   Role: Master switch for Slack notifications.
  //   Critical: Boolean only.
  //   Recommended: Enabled automatically when SLACK_WEBHOOK_URL is set in the environment.
  SLACK_ENABLED: false,

  // SLACK_LOG_LEVEL
  //   Role: Minimum log severity sent to Slack (0=DEBUG..3=CRITICAL).
  //   Critical: Must be one of the LOG_LEVELS values.
  //   Recommended: 2 (WARNING); skipped days and anomalies without per-sample noise.
  SLACK_LOG_LEVEL: 2,

  // SLACK_WEBHOOK_URL
  //   Role: Incoming webhook URL.
  //   Critical: Required when SLACK_ENABLED is true.
  //   Recommended: Set through the environment.
  SLACK_WEBHOOK_URL: '',

  // SLACK_BUFFER_SIZE
  //   Role: Failed Slack messages kept for retry.
  //   Critical: 1..100.
  //   Recommended: 10–20.
  SLACK_BUFFER_SIZE: 10,

  // SLACK_RETRY_DELAY_SEC
  //   Role: Initial retry delay; doubles per attempt up to 60 s.
  //   Critical: 1..3600 s.
  //   Recommended: 5–300 s.
  SLACK_RETRY_DELAY_SEC: 10,

  // CONSOLE_ENABLED
  //   Role: Master switch for console logging.
  //   Critical: Boolean only.
  //   Recommended: true.
  CONSOLE_ENABLED: true,

  // CONSOLE_LOG_LEVEL
  //   Role: Minimum log severity written to the console.
  //   Critical: Must be one of the LOG_LEVELS values.
  //   Recommended: 1 (INFO).
  CONSOLE_LOG_LEVEL: 0,

  // CONSOLE_BUFFER_SIZE
  //   Role: Maximum number of queued console messages.
  //   Critical: 1..1000.
  //   Recommended: 100–200.
  CONSOLE_BUFFER_SIZE: 150,

  // CONSOLE_INTERVAL_MS
  //   Role: Interval between console drains.
  //   Critical: 1..10000 ms.
  //   Recommended: 50–100 ms.
  CONSOLE_INTERVAL_MS: 50,

  // GLOBAL_LOG_LEVEL
  //   Role: Master log verbosity (0=DEBUG..3=CRITICAL); LOG_LEVEL in the environment.
  //   Critical: Must match one of the LOG_LEVELS values.
  //   Recommended: 1 (INFO); 0 (DEBUG) logs every accepted sample.
  GLOBAL_LOG_LEVEL: 1,

  // GLOBAL_LOG_AUTO_DEMOTE_HOURS
  //   Role: Hours of uptime after which INFO messages are suppressed.
  //   Critical: 0..168 h; 0 disables demotion.
  //   Recommended: 0 for a long-running service.
  GLOBAL_LOG_AUTO_DEMOTE_HOURS: 0,
};

// ─────────────────────────────────────────────────────────────
// ZONE DEFAULTS
//   Applied to every zone field the JSON file leaves out.
// ─────────────────────────────────────────────────────────────

export const ZONE_DEFAULTS: Readonly<Omit<ZoneConfig, 'id' | 'name' | 'valveEntity'>> = {
  // precipitationRate: sprinkler delivery in mm/h (0.1..200).
  precipitationRate: 10,
  // cropCoefficient: Kc multiplier on ET₀ (0.4..2.0); 1.0 is cool-season turf.
  cropCoefficient: 1.0,
  // minRuntimeSec / maxRuntimeSec: limits on a recommended run.
  minRuntimeSec: 60,
  maxRuntimeSec: 3600,
  // minimumIntervalSec: rest after the valve closes before the zone may run again.
  minimumIntervalSec: 3600,
};

// ─────────────────────────────────────────────────────────────
// APPLICATION CONSTANTS
//   Internal engine constants that should rarely change.
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS: Readonly<IrrigationAppConstants> = {
  // LOG_LEVELS
  //   Role: Canonical mapping of log level names to numeric codes.
  //   Critical: Values must be distinct.
  //   Recommended: DEBUG=0, INFO=1, WARNING=2, CRITICAL=3.
  LOG_LEVELS: {
    DEBUG: 0,
    INFO: 1,
    WARNING: 2,
    CRITICAL: 3,
  },

  // SENSOR_RANGES
  //   Role: Inclusive plausibility bounds per sensor kind; values outside are discarded.
  //   Critical: Shared by the live and the history path.
  //   Recommended: Do not widen; a sample outside these is a sensor fault.
  SENSOR_RANGES: SENSOR_RANGES,

  // MAX_PRECIPITATION_DELTA_MM
  //   Role: Largest counter increase between two readings accepted as rain.
  //   Critical: Larger jumps are discarded and re-anchor the baseline.
  //   Recommended: 200 mm.
  MAX_PRECIPITATION_DELTA_MM: MAX_PRECIPITATION_DELTA_MM,

  // BALANCE_OVERRIDE_MIN_MM / BALANCE_OVERRIDE_MAX_MM
  //   Role: Bounds of a manual balance override through the API.
  //   Critical: The ledger itself accepts any finite value.
  //   Recommended: -200..200 mm.
  BALANCE_OVERRIDE_MIN_MM: -200,
  BALANCE_OVERRIDE_MAX_MM: 200,

  // ET_RECORD_RETENTION_DAYS
  //   Role: Days of applied ET kept per zone for forced recomputes.
  //   Critical: A forced recompute older than this stacks instead of replacing.
  //   Recommended: 30.
  ET_RECORD_RETENTION_DAYS: 30,

  // HISTORY_RETENTION_SEC
  //   Role: Trailing window of raw samples kept for the daily cycle.
  //   Critical: Must exceed one day plus the cron delay.
  //   Recommended: 48 h.
  HISTORY_RETENTION_SEC: 172800,

  // SLACK_MAX_RETRIES
  //   Role: Delivery attempts before a Slack message is dropped.
  //   Recommended: 5.
  SLACK_MAX_RETRIES: 5,
};
