/**
 * GuardConfiguration Interface
 *
 * Tunables for the idle-aware threat engine. Durations are milliseconds and
 * rates are bytes per second.
 */

export interface GuardConfiguration {
  /** Interval between evaluation ticks */
  tickIntervalMs: number;

  /** Idle detection */
  idle: {
    /** Time without interaction before the device may count as idle */
    thresholdMs: number;
    /** CPU percentage below which the device looks quiet */
    cpuPercent: number;
    /** Network rate (either direction) below which the device looks quiet */
    networkBytesPerSecond: number;
  };

  /** Baseline learning */
  baseline: {
    /** Samples averaged with a plain running mean before switching to EMA */
    coldStartSamples: number;
    /** EMA smoothing factor, in (0, 1] */
    smoothing: number;
    /** How far above baseline a rate must be to count as sustained */
    multiplier: number;
  };

  levels: {
    /** Minimum dwell time between accepted level changes */
    changeCooldownMs: number;
  };

  alerts: {
    /** Window in which a second incident of the same type is dropped */
    incidentDedupMs: number;
    /** Window in which a repeated notification for the same alert is dropped */
    notificationCooldownMs: number;
  };

  activity: {
    maxEntries: number;
  };

  /** Trailing window for hourly byte totals */
  rollingWindowMs: number;
}
