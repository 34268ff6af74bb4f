/**
 * Kind of reference work a recompute session covers.
 */
export type RecomputeKind = "primary" | "multiReference" | "glitchReferences";

/**
 * Metrics for a single reference orbit computation.
 */
export interface OrbitMetrics {
  orbitIndex: number;
  computeTime: number; // milliseconds
  orbitLength: number;
}

/**
 * Metrics for a complete recompute session.
 */
export interface RecomputeSessionMetrics {
  sessionId: string;
  kind: RecomputeKind;
  startTime: number;
  endTime: number;
  duration: number; // milliseconds
  totalOrbits: number;
  completedOrbits: number;
  totalOrbitPoints: number;
  pointsPerSecond: number;
  averageOrbitTime: number;
}

interface RecomputeSession {
  sessionId: string;
  kind: RecomputeKind;
  startTime: number;
  totalOrbits: number;
  orbitMetrics: OrbitMetrics[];
}

/**
 * Performance monitor for reference orbit recomputes.
 *
 * Usage:
 * ```typescript
 * const monitor = new PerformanceMonitor();
 * const sessionId = monitor.startRecompute("multiReference", 9);
 *
 * // For each orbit:
 * monitor.recordOrbit(sessionId, index, computeTime, orbit.length);
 *
 * const metrics = monitor.endRecompute(sessionId);
 * ```
 */
export class PerformanceMonitor {
  private activeSessions = new Map<string, RecomputeSession>();
  private completedSessions: RecomputeSessionMetrics[] = [];
  private maxHistorySize = 50;

  /**
   * Starts a new recompute session.
   *
   * @param totalOrbits - Number of orbits the session will compute
   * @returns Session ID for tracking
   */
  startRecompute(kind: RecomputeKind, totalOrbits: number): string {
    const sessionId = `recompute-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;

    this.activeSessions.set(sessionId, {
      sessionId,
      kind,
      startTime: performance.now(),
      totalOrbits,
      orbitMetrics: [],
    });

    return sessionId;
  }

  recordOrbit(sessionId: string, orbitIndex: number, computeTime: number, orbitLength: number): void {
    const session = this.activeSessions.get(sessionId);
    if (!session) {
      console.warn(`PerformanceMonitor: Unknown session ${sessionId}`);
      return;
    }

    session.orbitMetrics.push({ orbitIndex, computeTime, orbitLength });
  }

  /**
   * Ends a recompute session and calculates final metrics.
   */
  endRecompute(sessionId: string): RecomputeSessionMetrics {
    const session = this.activeSessions.get(sessionId);
    if (!session) {
      throw new Error(`PerformanceMonitor: Unknown session ${sessionId}`);
    }

    const endTime = performance.now();
    const duration = endTime - session.startTime;
    const completedOrbits = session.orbitMetrics.length;
    const totalOrbitPoints = session.orbitMetrics.reduce((sum, m) => sum + m.orbitLength, 0);
    const averageOrbitTime =
      completedOrbits > 0 ? session.orbitMetrics.reduce((sum, m) => sum + m.computeTime, 0) / completedOrbits : 0;
    const pointsPerSecond = duration > 0 ? (totalOrbitPoints / duration) * 1000 : 0;

    const metrics: RecomputeSessionMetrics = {
      sessionId,
      kind: session.kind,
      startTime: session.startTime,
      endTime,
      duration,
      totalOrbits: session.totalOrbits,
      completedOrbits,
      totalOrbitPoints,
      pointsPerSecond,
      averageOrbitTime,
    };

    this.completedSessions.push(metrics);
    if (this.completedSessions.length > this.maxHistorySize) {
      this.completedSessions.shift();
    }

    this.activeSessions.delete(sessionId);

    return metrics;
  }

  /**
   * Progress of an active session, 0-100, or null if the session is unknown.
   */
  getProgress(sessionId: string): number | null {
    const session = this.activeSessions.get(sessionId);
    if (!session) {
      return null;
    }

    return session.totalOrbits > 0 ? (session.orbitMetrics.length / session.totalOrbits) * 100 : 0;
  }

  getLastMetrics(): RecomputeSessionMetrics | null {
    if (this.completedSessions.length === 0) {
      return null;
    }
    return this.completedSessions[this.completedSessions.length - 1];
  }

  /**
   * Summary statistics across all completed recomputes.
   */
  getStats(): {
    totalRecomputes: number;
    averageDuration: number;
    averagePointsPerSecond: number;
    averageOrbitsPerRecompute: number;
  } {
    const count = this.completedSessions.length;
    if (count === 0) {
      return {
        totalRecomputes: 0,
        averageDuration: 0,
        averagePointsPerSecond: 0,
        averageOrbitsPerRecompute: 0,
      };
    }

    const totalDuration = this.completedSessions.reduce((sum, m) => sum + m.duration, 0);
    const totalPointsPerSecond = this.completedSessions.reduce((sum, m) => sum + m.pointsPerSecond, 0);
    const totalOrbits = this.completedSessions.reduce((sum, m) => sum + m.completedOrbits, 0);

    return {
      totalRecomputes: count,
      averageDuration: totalDuration / count,
      averagePointsPerSecond: totalPointsPerSecond / count,
      averageOrbitsPerRecompute: totalOrbits / count,
    };
  }

  getHistory(): RecomputeSessionMetrics[] {
    return [...this.completedSessions];
  }

  clearHistory(): void {
    this.completedSessions = [];
  }

  /**
   * Sets the maximum number of sessions to keep in history.
   */
  setMaxHistorySize(size: number): void {
    this.maxHistorySize = size;
    while (this.completedSessions.length > this.maxHistorySize) {
      this.completedSessions.shift();
    }
  }
}
