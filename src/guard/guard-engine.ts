/**
 * Guard Engine
 *
 * Wires the idle detector, baseline learner, threat scoring, level state
 * machine, incident registry and alert gate into one tick-driven pipeline.
 *
 * Each tick runs synchronously: read latest metrics -> idle check -> baseline
 * update (quiet idle only) -> score -> level hysteresis -> incidents and
 * notifications. Only the tick mutates engine state; readers get the last
 * published snapshot via `getSnapshot()` or the `snapshot` event.
 */

import { EventEmitter } from 'node:events';
import { createSubsystemLogger } from '../logging/subsystem.js';
import {
  createDefaultGuardConfiguration,
  validateGuardConfiguration,
  type GuardConfigurationOverrides,
} from './configuration.js';
import { IdleDetector } from './idle-detector/index.js';
import { BaselineLearner } from './baseline-learner/index.js';
import { RollingWindowTotals } from './rolling-window/index.js';
import { resolveThresholds, type ThresholdStore } from './thresholds/index.js';
import { LatestSampleCache, type MetricSource } from './metrics/index.js';
import { scoreThreat } from './threat-scoring/index.js';
import { LevelStateMachine, levelForScore } from './level-state/index.js';
import { IncidentRegistry, type IncidentSink } from './incidents/index.js';
import { AlertGate, type NotificationRequest, type Notifier } from './alert-gate/index.js';
import { IntervalScheduler, type ScheduledTask, type Scheduler } from './scheduling/index.js';
import {
  INCIDENT_SEVERITY_RANK,
  type ActivityEntry,
  type BaselineEstimate,
  type GuardConfiguration,
  type Incident,
  type MetricSnapshot,
  type RollingTotals,
  type ThreatAssessment,
  type ThreatFactor,
  type ThreatLevel,
  type ThresholdMap,
} from './types/index.js';

export interface GuardEngineOptions {
  metricSource: MetricSource;
  thresholdStore: ThresholdStore;
  notifier?: Notifier;
  incidentSink?: IncidentSink;
  /** Milliseconds since epoch; defaults to `Date.now` */
  clock?: () => number;
  scheduler?: Scheduler;
  config?: GuardConfigurationOverrides;
}

/** What the engine publishes after every tick */
export interface GuardSnapshot {
  timestamp: number;
  currentScore: number;
  currentLevel: ThreatLevel;
  /** Level the score maps to before hysteresis */
  proposedLevel: ThreatLevel;
  isIdle: boolean;
  idleDurationSeconds: number;
  factors: ThreatFactor[];
  metrics: MetricSnapshot;
  rollingTotals: RollingTotals;
  hourlyUploadMB: number;
  hourlyDownloadMB: number;
  baseline: BaselineEstimate;
  recentActivity: ActivityEntry[];
  openIncidents: number;
}

export interface SessionSummary {
  startedAt: number;
  endedAt?: number;
  ticks: number;
  idleTicks: number;
  peakScore: number;
  averageIdleScore: number;
  incidentCount: number;
  /** Any incident of high or critical severity */
  hasAnomalies: boolean;
}

export class GuardEngine extends EventEmitter {
  private readonly logger = createSubsystemLogger('guard/engine');
  private readonly config: GuardConfiguration;
  private readonly metricSource: MetricSource;
  private readonly thresholdStore: ThresholdStore;
  private readonly clock: () => number;
  private readonly scheduler: Scheduler;

  private readonly sampleCache = new LatestSampleCache();
  private readonly baseline: BaselineLearner;
  private readonly incidents: IncidentRegistry;
  private readonly gate: AlertGate;
  private idleDetector: IdleDetector;
  private rollingWindow: RollingWindowTotals;
  private levels: LevelStateMachine;
  private lastThresholds: ThresholdMap = resolveThresholds([]);

  private task?: ScheduledTask;
  private ticking = false;
  private snapshot: GuardSnapshot;
  private session: SessionSummary;
  private idleScoreSum = 0;

  constructor(options: GuardEngineOptions) {
    super();

    this.config = createDefaultGuardConfiguration(options.config);
    const errors = validateGuardConfiguration(this.config);
    if (errors.length > 0) {
      throw new Error(`Invalid guard configuration: ${errors.join('; ')}`);
    }

    this.metricSource = options.metricSource;
    this.thresholdStore = options.thresholdStore;
    this.clock = options.clock ?? Date.now;
    this.scheduler = options.scheduler ?? new IntervalScheduler();

    const now = this.clock();
    this.baseline = new BaselineLearner(this.config.baseline);
    this.incidents = new IncidentRegistry(this.config.alerts.incidentDedupMs, options.incidentSink);
    this.gate = new AlertGate(
      {
        notificationCooldownMs: this.config.alerts.notificationCooldownMs,
        maxActivityEntries: this.config.activity.maxEntries,
      },
      options.notifier,
    );
    this.idleDetector = new IdleDetector(this.config.idle, now);
    this.rollingWindow = new RollingWindowTotals(this.config.rollingWindowMs);
    this.levels = new LevelStateMachine(this.config.levels.changeCooldownMs, now);
    this.session = this.createSession(now);
    this.snapshot = this.buildSnapshot(now, this.sampleCache.snapshot(now), { uploadBytes: 0, downloadBytes: 0 }, false);

    this.gate.on('notification', (request: NotificationRequest) => this.emit('notification', request));
    this.incidents.on('incidentOpened', (incident: Incident) => this.handleIncidentOpened(incident));
    this.incidents.on('incidentClosed', (incident: Incident) => this.emit('incidentClosed', incident));

    this.logger.info('Guard engine initialized', {
      tickIntervalMs: this.config.tickIntervalMs,
      idle: this.config.idle,
      baseline: this.config.baseline,
      levels: this.config.levels,
      alerts: this.config.alerts,
    });
  }

  /**
   * Starts a monitoring session. Calling it again while running does nothing.
   */
  start(): void {
    if (this.task) {
      return;
    }

    const now = this.clock();
    // Starting monitoring is itself an interaction
    this.idleDetector = new IdleDetector(this.config.idle, now);
    this.rollingWindow = new RollingWindowTotals(this.config.rollingWindowMs);
    this.levels = new LevelStateMachine(this.config.levels.changeCooldownMs, now);
    this.session = this.createSession(now);
    this.idleScoreSum = 0;

    this.task = this.scheduler.schedule(this.config.tickIntervalMs, () => {
      this.tick();
    });

    this.gate.addActivity({
      type: 'monitoringStarted',
      title: 'Monitoring Started',
      description: 'Background activity is now being monitored',
      level: 'normal',
      timestamp: now,
    });
    this.logger.info('Monitoring started', { intervalMs: this.config.tickIntervalMs });
    this.emit('monitoringStarted', { at: now, intervalMs: this.config.tickIntervalMs });

    this.tick(now);
  }

  /**
   * Cancels the recurring tick. Safe to call repeatedly.
   */
  stop(): void {
    if (!this.task) {
      return;
    }

    this.task.cancel();
    this.task = undefined;

    const now = this.clock();
    this.session.endedAt = now;
    this.gate.addActivity({
      type: 'monitoringStopped',
      title: 'Monitoring Stopped',
      description: 'Background activity monitoring has been paused',
      level: 'normal',
      timestamp: now,
    });
    this.logger.info('Monitoring stopped', { ...this.getSessionSummary() });
    this.emit('monitoringStopped', this.getSessionSummary());
  }

  isMonitoring(): boolean {
    return this.task !== undefined;
  }

  /**
   * Marks the device as in use right now. Takes effect immediately.
   */
  recordInteraction(at: number = this.clock()): void {
    const wasIdle = this.idleDetector.isIdle();
    this.idleDetector.recordInteraction(at);
    if (wasIdle) {
      this.snapshot = {
        ...this.snapshot,
        isIdle: false,
        idleDurationSeconds: 0,
        currentScore: 0,
        factors: [],
        proposedLevel: levelForScore(0),
      };
      this.emit('idleChanged', { idle: false, at });
    }
  }

  /**
   * Runs one evaluation pipeline and publishes its snapshot. A tick requested
   * while another is running is skipped.
   */
  tick(now: number = this.clock()): GuardSnapshot {
    if (this.ticking) {
      return this.snapshot;
    }
    this.ticking = true;

    try {
      this.sampleCache.update(this.readMetrics());
      const metrics = this.sampleCache.snapshot(now);

      this.rollingWindow.record(
        now,
        this.sampleCache.knownValue('cumulativeUploadBytes'),
        this.sampleCache.knownValue('cumulativeDownloadBytes'),
      );
      const rollingTotals = this.rollingWindow.getTotals(now);

      const wasIdle = this.idleDetector.isIdle();
      const isIdle = this.idleDetector.evaluate(
        now,
        metrics.cpuUsagePercent,
        metrics.uploadBytesPerSecond,
        metrics.downloadBytesPerSecond,
      );
      if (isIdle !== wasIdle) {
        this.emit('idleChanged', { idle: isIdle, at: now });
      }

      if (isIdle && this.idleDetector.isQuiet(
        metrics.cpuUsagePercent,
        metrics.uploadBytesPerSecond,
        metrics.downloadBytesPerSecond,
      )) {
        this.baseline.observe(metrics.uploadBytesPerSecond, metrics.downloadBytesPerSecond, metrics.cpuUsagePercent);
      }

      const assessment = scoreThreat({
        snapshot: metrics,
        isIdle,
        baseline: this.baseline.getEstimate(),
        thresholds: this.readThresholds(),
        rollingTotals,
        baselineMultiplier: this.config.baseline.multiplier,
      });

      const update = this.levels.update(assessment.score, now);
      if (update.changed) {
        const decision = this.gate.onLevelChange({
          from: update.previousLevel,
          to: update.level,
          score: assessment.score,
          factors: assessment.factors,
          at: now,
        });
        this.emit('levelChanged', { from: update.previousLevel, to: update.level, score: assessment.score, decision });
      }

      this.incidents.evaluate(assessment.factors, { snapshot: metrics, score: assessment.score, rollingTotals }, now);

      this.recordSessionTick(isIdle, assessment.score);
      this.snapshot = this.buildSnapshot(now, metrics, rollingTotals, isIdle, assessment, update.proposedLevel);

      this.emit('snapshot', this.snapshot);
    } catch (error) {
      this.logger.error('Evaluation tick failed', { error: String(error) });
      this.emit('monitoringError', error);
    } finally {
      this.ticking = false;
    }

    return this.snapshot;
  }

  getSnapshot(): GuardSnapshot {
    return this.snapshot;
  }

  getRecentActivity(): ActivityEntry[] {
    return this.gate.getRecentActivity();
  }

  getBaseline(): BaselineEstimate {
    return this.baseline.getEstimate();
  }

  getIncidents(limit?: number): Incident[] {
    return this.incidents.getRecentIncidents(limit);
  }

  getOpenIncidents(): Incident[] {
    return this.incidents.getOpenIncidents();
  }

  acknowledgeIncident(id: string): Incident | undefined {
    return this.incidents.acknowledge(id);
  }

  resolveIncident(id: string): Incident | undefined {
    return this.incidents.resolve(id, this.clock());
  }

  getSessionSummary(): SessionSummary {
    return { ...this.session };
  }

  getConfiguration(): GuardConfiguration {
    return createDefaultGuardConfiguration(this.config);
  }

  private readMetrics(): ReturnType<MetricSource['read']> {
    try {
      return this.metricSource.read();
    } catch (error) {
      this.logger.warn('Metric source unavailable, keeping last known values', { error: String(error) });
      return {};
    }
  }

  private readThresholds(): ThresholdMap {
    try {
      this.lastThresholds = resolveThresholds(this.thresholdStore.getThresholds());
    } catch (error) {
      this.logger.warn('Threshold store unavailable, using previous thresholds', { error: String(error) });
    }
    return this.lastThresholds;
  }

  private handleIncidentOpened(incident: Incident): void {
    this.session.incidentCount += 1;
    if (INCIDENT_SEVERITY_RANK[incident.severity] >= INCIDENT_SEVERITY_RANK.high) {
      this.session.hasAnomalies = true;
    }
    this.gate.addActivity({
      type: 'incident',
      title: incident.title,
      description: incident.details.join(', '),
      level: this.levels.getLevel(),
      timestamp: incident.openedAt,
    });
    this.emit('incidentOpened', incident);
  }

  private createSession(startedAt: number): SessionSummary {
    return {
      startedAt,
      ticks: 0,
      idleTicks: 0,
      peakScore: 0,
      averageIdleScore: 0,
      incidentCount: 0,
      hasAnomalies: false,
    };
  }

  private recordSessionTick(isIdle: boolean, score: number): void {
    this.session.ticks += 1;
    this.session.peakScore = Math.max(this.session.peakScore, score);
    if (isIdle) {
      this.session.idleTicks += 1;
      this.idleScoreSum += score;
      this.session.averageIdleScore = this.idleScoreSum / this.session.idleTicks;
    }
  }

  private buildSnapshot(
    now: number,
    metrics: MetricSnapshot,
    rollingTotals: RollingTotals,
    isIdle: boolean,
    assessment?: ThreatAssessment,
    proposedLevel: ThreatLevel = this.levels.getLevel(),
  ): GuardSnapshot {
    return {
      timestamp: now,
      currentScore: assessment?.score ?? 0,
      currentLevel: this.levels.getLevel(),
      proposedLevel,
      isIdle,
      idleDurationSeconds: this.idleDetector.getIdleDurationSeconds(now),
      factors: assessment ? [...assessment.factors] : [],
      metrics,
      rollingTotals: { ...rollingTotals },
      hourlyUploadMB: assessment?.totalUploadMB ?? 0,
      hourlyDownloadMB: assessment?.totalDownloadMB ?? 0,
      baseline: this.baseline.getEstimate(),
      recentActivity: this.gate.getRecentActivity(),
      openIncidents: this.incidents.getOpenIncidents().length,
    };
  }
}
