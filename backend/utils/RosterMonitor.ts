import { Request } from 'express';
import { LogLevel, parseLogLevel } from '../config/server';

/**
 * Roster operation types for monitoring
 */
export enum OperationType {
  ACTIVITY_LISTING = 'ACTIVITY_LISTING',
  ENROLLMENT = 'ENROLLMENT',
  WITHDRAWAL = 'WITHDRAWAL',
  HTTP_REQUEST = 'HTTP_REQUEST',
  PERFORMANCE_ISSUE = 'PERFORMANCE_ISSUE'
}

export type OperationResult = 'success' | 'failure' | 'warning';
export type EventSeverity = 'low' | 'medium' | 'high';

/**
 * Monitoring event interface
 */
export interface MonitoringEvent {
  id: string;
  type: OperationType;
  timestamp: Date;
  activityName?: string;
  action: string;
  result: OperationResult;
  duration?: number;
  metadata?: Record<string, unknown>;
  ipAddress?: string;
  requestId?: string;
  severity: EventSeverity;
}

export interface MonitoringStatistics {
  totalEvents: number;
  eventsByType: Record<string, number>;
  eventsByResult: Record<string, number>;
  performanceIssues: number;
  recentEvents: MonitoringEvent[];
}

const MAX_EVENTS = 10000;
const DEFAULT_SLOW_THRESHOLD_MS = 1000;

/**
 * Roster monitoring and logging utility
 */
export class RosterMonitor {
  private static instance: RosterMonitor;
  private events: MonitoringEvent[] = [];
  private slowThresholdMs = DEFAULT_SLOW_THRESHOLD_MS;
  private logLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

  private constructor() {}

  public static getInstance(): RosterMonitor {
    if (!RosterMonitor.instance) {
      RosterMonitor.instance = new RosterMonitor();
    }
    return RosterMonitor.instance;
  }

  public setSlowThreshold(ms: number): void {
    this.slowThresholdMs = ms;
  }

  public setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  /**
   * Log a roster operation
   */
  public logOperation(
    type: OperationType,
    action: string,
    result: OperationResult,
    req?: Request,
    metadata?: Record<string, unknown>
  ): string {
    const eventId = this.generateEventId();
    const duration = metadata?.duration;
    const activityName = metadata?.activityName;

    const event: MonitoringEvent = {
      id: eventId,
      type,
      timestamp: new Date(),
      activityName: typeof activityName === 'string' ? activityName : undefined,
      action,
      result,
      duration: typeof duration === 'number' ? duration : undefined,
      metadata,
      ipAddress: req?.ip,
      requestId: this.getRequestId(req),
      severity: this.determineSeverity(type, result)
    };

    this.events.push(event);

    if (this.events.length > MAX_EVENTS) {
      this.events = this.events.slice(-MAX_EVENTS);
    }

    this.logToConsole(event);

    return eventId;
  }

  /**
   * Log an operation that took `duration` ms, flagging it when slower than the threshold
   */
  public logTimedOperation(
    type: OperationType,
    action: string,
    result: OperationResult,
    duration: number,
    req?: Request,
    metadata?: Record<string, unknown>
  ): string {
    const eventId = this.logOperation(type, action, result, req, {
      ...metadata,
      duration
    });

    if (duration > this.slowThresholdMs) {
      this.logPerformanceIssue(action, duration, this.slowThresholdMs, req);
    }

    return eventId;
  }

  /**
   * Log performance issues
   */
  public logPerformanceIssue(
    operation: string,
    duration: number,
    threshold: number,
    req?: Request
  ): void {
    this.logOperation(
      OperationType.PERFORMANCE_ISSUE,
      `Slow operation: ${operation}`,
      'warning',
      req,
      { operation, duration, threshold }
    );
  }

  /**
   * Get monitoring statistics
   */
  public getStatistics(activityName?: string, hours: number = 24): MonitoringStatistics {
    const cutoffTime = new Date(Date.now() - hours * 60 * 60 * 1000);

    const filteredEvents = this.events.filter(event =>
      event.timestamp >= cutoffTime &&
      (!activityName || event.activityName === activityName)
    );

    const eventsByType: Record<string, number> = {};
    const eventsByResult: Record<string, number> = {};
    let performanceIssues = 0;

    filteredEvents.forEach(event => {
      eventsByType[event.type] = (eventsByType[event.type] || 0) + 1;
      eventsByResult[event.result] = (eventsByResult[event.result] || 0) + 1;

      if (event.type === OperationType.PERFORMANCE_ISSUE) {
        performanceIssues++;
      }
    });

    return {
      totalEvents: filteredEvents.length,
      eventsByType,
      eventsByResult,
      performanceIssues,
      recentEvents: filteredEvents.slice(-20)
    };
  }

  private determineSeverity(type: OperationType, result: OperationResult): EventSeverity {
    if (result === 'failure') {
      return type === OperationType.HTTP_REQUEST ? 'high' : 'medium';
    }
    if (result === 'warning') {
      return 'medium';
    }
    return 'low';
  }

  private logToConsole(event: MonitoringEvent): void {
    if (this.logLevel === 'silent') return;

    const emoji = this.getEmojiForEvent(event);
    const severity = event.severity.toUpperCase();
    const log = event.result === 'warning' ? console.warn : console.log;

    log(`${emoji} [${severity}] ${event.type}: ${event.action}`);
    if (event.activityName) log(`   Activity: ${event.activityName}`);
    if (event.duration !== undefined) log(`   Duration: ${event.duration}ms`);
    log(`   Result: ${event.result}`);
    log(`   Timestamp: ${event.timestamp.toISOString()}`);
    if (this.logLevel === 'debug' && event.metadata && Object.keys(event.metadata).length > 0) {
      log('   Metadata:', event.metadata);
    }
    log('---');
  }

  private getEmojiForEvent(event: MonitoringEvent): string {
    if (event.result === 'failure') return '❌';
    if (event.result === 'warning') return '⚠️';

    switch (event.type) {
      case OperationType.ENROLLMENT: return '✅';
      case OperationType.WITHDRAWAL: return '👋';
      case OperationType.ACTIVITY_LISTING: return '📋';
      default: return '📝';
    }
  }

  private generateEventId(): string {
    return `evt_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
  }

  private getRequestId(req?: Request): string | undefined {
    const header = req?.headers['x-request-id'];
    return typeof header === 'string' ? header : undefined;
  }

  /**
   * Clear all monitoring data (for testing)
   */
  public clearAll(): void {
    this.events = [];
    this.slowThresholdMs = DEFAULT_SLOW_THRESHOLD_MS;
  }
}

export default RosterMonitor;
