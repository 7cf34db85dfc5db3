/**
 * Incident Registry
 *
 * Opens an incident when a qualifying factor fires during idle, closes it
 * when the condition clears, and keeps duplicates out: a type with an open
 * incident, or one recorded within the dedup window, is not recorded again.
 * Every created or changed incident is handed to the persistence sink.
 */

import { EventEmitter } from 'node:events';
import { randomUUID } from 'node:crypto';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { fireAndForget } from '../fire-and-forget.js';
import {
  INCIDENT_TYPES,
  type FactorName,
  type Incident,
  type IncidentType,
  type MetricSnapshot,
  type RollingTotals,
  type ThreatFactor,
} from '../types/index.js';

/** Durable storage collaborator for incidents */
export interface IncidentSink {
  record(incident: Incident): void | Promise<void>;
  update(incident: Incident): void | Promise<void>;
}

export interface IncidentContext {
  snapshot: MetricSnapshot;
  score: number;
  rollingTotals: RollingTotals;
}

export interface IncidentEvaluation {
  opened: Incident[];
  closed: Incident[];
}

const FACTOR_INCIDENT_TYPES: Partial<Record<FactorName, IncidentType>> = {
  surveillancePattern: 'screenSurveillance',
  totalUpload: 'dataExfiltration',
  sustainedUpload: 'dataExfiltration',
  idleCpu: 'cpuAnomaly',
  batteryDrain: 'batteryAnomaly',
  thermal: 'thermalAnomaly',
};

/** Factor count at which a tick also counts as a multi-factor alert */
export const MULTI_FACTOR_MIN_FACTORS = 3;

/**
 * Incident types the given factors qualify for, without duplicates
 */
export function incidentTypesForFactors(factors: readonly ThreatFactor[]): IncidentType[] {
  const types = new Set<IncidentType>();
  for (const factor of factors) {
    const type = FACTOR_INCIDENT_TYPES[factor.name];
    if (type) {
      types.add(type);
    }
  }
  if (factors.length >= MULTI_FACTOR_MIN_FACTORS) {
    types.add('multiFactorAlert');
  }
  return [...types];
}

export class IncidentRegistry extends EventEmitter {
  private readonly logger = createSubsystemLogger('guard/incidents');
  private readonly dedupMs: number;
  private readonly sink?: IncidentSink;
  private readonly maxRecent: number;
  private open = new Map<IncidentType, Incident>();
  private recent: Incident[] = [];
  private lastRecordedAt = new Map<IncidentType, number>();

  constructor(dedupMs: number, sink?: IncidentSink, maxRecent = 200) {
    super();
    this.dedupMs = dedupMs;
    this.sink = sink;
    this.maxRecent = maxRecent;
  }

  /**
   * Opens incidents for newly qualifying types and resolves open incidents
   * whose condition no longer holds
   */
  evaluate(factors: readonly ThreatFactor[], context: IncidentContext, now: number): IncidentEvaluation {
    const qualifying = incidentTypesForFactors(factors);
    const opened: Incident[] = [];
    const closed: Incident[] = [];

    for (const type of qualifying) {
      if (this.open.has(type)) {
        continue;
      }
      const last = this.lastRecordedAt.get(type);
      if (last !== undefined && now - last < this.dedupMs) {
        this.logger.debug('Duplicate incident suppressed', { type, sinceLastMs: now - last });
        continue;
      }
      opened.push(this.openIncident(type, factors, context, now));
    }

    for (const [type, incident] of this.open) {
      if (!qualifying.includes(type)) {
        this.close(incident, now, 'condition cleared');
        closed.push(incident);
      }
    }

    return { opened, closed };
  }

  acknowledge(id: string): Incident | undefined {
    const incident = this.find(id);
    if (!incident || incident.acknowledged) {
      return incident;
    }
    incident.acknowledged = true;
    this.logger.info('Incident acknowledged', { id, type: incident.type });
    this.persist(incident, 'update');
    return incident;
  }

  resolve(id: string, now: number): Incident | undefined {
    const incident = this.find(id);
    if (!incident || incident.resolved) {
      return incident;
    }
    this.close(incident, now, 'resolved externally');
    return incident;
  }

  getOpenIncidents(): Incident[] {
    return [...this.open.values()];
  }

  /**
   * Most recent first
   */
  getRecentIncidents(limit = this.maxRecent): Incident[] {
    return this.recent.slice(0, limit);
  }

  getIncidentsBetween(from: number, to: number): Incident[] {
    return this.recent.filter((incident) => incident.openedAt >= from && incident.openedAt <= to);
  }

  private openIncident(
    type: IncidentType,
    factors: readonly ThreatFactor[],
    context: IncidentContext,
    now: number,
  ): Incident {
    const { title, severity } = INCIDENT_TYPES[type];
    const { snapshot } = context;
    const incident: Incident = {
      id: randomUUID(),
      type,
      severity,
      title,
      openedAt: now,
      metrics: {
        uploadBytesPerSecond: snapshot.uploadBytesPerSecond,
        downloadBytesPerSecond: snapshot.downloadBytesPerSecond,
        cpuUsagePercent: snapshot.cpuUsagePercent,
        batteryDrainPerHourPercent: snapshot.batteryDrainPerHourPercent,
        thermalLevel: snapshot.thermalLevel,
        threatScore: context.score,
        hourlyUploadBytes: context.rollingTotals.uploadBytes,
        hourlyDownloadBytes: context.rollingTotals.downloadBytes,
      },
      summary: title,
      details: factors.map((factor) => factor.reason),
      acknowledged: false,
      resolved: false,
    };

    this.open.set(type, incident);
    this.lastRecordedAt.set(type, now);
    this.recent.unshift(incident);
    if (this.recent.length > this.maxRecent) {
      this.recent.length = this.maxRecent;
    }

    this.logger.warn('Incident opened', { id: incident.id, type, severity, score: context.score });
    this.persist(incident, 'record');
    this.emit('incidentOpened', incident);
    return incident;
  }

  private close(incident: Incident, now: number, reason: string): void {
    incident.resolved = true;
    incident.closedAt = now;
    this.open.delete(incident.type);

    this.logger.info('Incident resolved', {
      id: incident.id,
      type: incident.type,
      reason,
      durationMs: now - incident.openedAt,
    });
    this.persist(incident, 'update');
    this.emit('incidentClosed', incident);
  }

  private find(id: string): Incident | undefined {
    const matches = (incident: Incident): boolean => incident.id === id;
    return this.recent.find(matches) ?? [...this.open.values()].find(matches);
  }

  private persist(incident: Incident, operation: 'record' | 'update'): void {
    const sink = this.sink;
    if (!sink) {
      return;
    }
    const copy: Incident = { ...incident, metrics: { ...incident.metrics }, details: [...incident.details] };
    fireAndForget(this.logger, 'Incident sink failed', { id: incident.id, operation }, () =>
      operation === 'record' ? sink.record(copy) : sink.update(copy),
    );
  }
}
