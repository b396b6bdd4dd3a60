/**
 * Engine and CLI configuration schema
 * CLI values are stored in ~/.config/focus-analytics/config.json
 */
export interface EngineConfig {
  /**
   * Seconds between focus samples of the active session
   * @default 10
   */
  sampleIntervalSeconds?: number;

  /**
   * Pauses shorter than this are discarded instead of recorded
   * @default 10
   */
  minPauseSeconds?: number;

  /**
   * Seconds without activity before an inactivity interruption is recorded
   * @default 180
   */
  inactivityThresholdSeconds?: number;

  /**
   * Seconds between inactivity watchdog checks
   * @default 30
   */
  watchdogIntervalSeconds?: number;

  /**
   * Finalized sessions kept in memory and in the snapshot
   * @default 1000
   */
  maxSessionHistory?: number;

  /**
   * Per-session interruption summaries kept for pattern mining
   * @default 100
   */
  interruptionHistoryCap?: number;

  /**
   * Environment records kept for insights and the heatmap
   * @default 1000
   */
  environmentRecordCap?: number;

  /**
   * Values kept per hour/weekday/month performance bucket
   * @default 100
   */
  bucketCap?: number;

  /**
   * Productivity trend points kept
   * @default 30
   */
  trendPointCap?: number;

  /**
   * Trailing window used for session pattern mining
   * @default 7
   */
  patternWindowDays?: number;

  /**
   * Planned work duration used when a supplied one is unusable
   * @default 25
   */
  defaultWorkMinutes?: number;

  /**
   * Planned break duration used when a supplied one is unusable
   * @default 5
   */
  defaultBreakMinutes?: number;

  /**
   * Default age limit for `focus cleanup`
   * @default 90
   */
  retentionDays?: number;

  /**
   * Default output format for the report command
   * @default "terminal"
   */
  reportFormat?: 'terminal' | 'json';
}

export type ResolvedConfig = Required<EngineConfig>;

export const DEFAULT_CONFIG: ResolvedConfig = {
  sampleIntervalSeconds: 10,
  minPauseSeconds: 10,
  inactivityThresholdSeconds: 180,
  watchdogIntervalSeconds: 30,
  maxSessionHistory: 1000,
  interruptionHistoryCap: 100,
  environmentRecordCap: 1000,
  bucketCap: 100,
  trendPointCap: 30,
  patternWindowDays: 7,
  defaultWorkMinutes: 25,
  defaultBreakMinutes: 5,
  retentionDays: 90,
  reportFormat: 'terminal',
};

export const VALID_CONFIG_KEYS = [
  'sampleIntervalSeconds',
  'minPauseSeconds',
  'inactivityThresholdSeconds',
  'watchdogIntervalSeconds',
  'maxSessionHistory',
  'interruptionHistoryCap',
  'environmentRecordCap',
  'bucketCap',
  'trendPointCap',
  'patternWindowDays',
  'defaultWorkMinutes',
  'defaultBreakMinutes',
  'retentionDays',
  'reportFormat',
] as const;

export type ConfigKey = typeof VALID_CONFIG_KEYS[number];

export type NumericConfigKey = Exclude<ConfigKey, 'reportFormat'>;
