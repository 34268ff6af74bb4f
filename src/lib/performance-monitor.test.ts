import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { PerformanceMonitor } from "./performance-monitor";

describe("PerformanceMonitor", () => {
  let monitor: PerformanceMonitor;

  beforeEach(() => {
    monitor = new PerformanceMonitor();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("tracks progress of an active recompute", () => {
    const sessionId = monitor.startRecompute("multiReference", 4);

    expect(monitor.getProgress(sessionId)).toBe(0);
    monitor.recordOrbit(sessionId, 0, 2, 100);
    expect(monitor.getProgress(sessionId)).toBe(25);
  });

  it("summarizes a finished recompute", () => {
    const sessionId = monitor.startRecompute("multiReference", 2);
    monitor.recordOrbit(sessionId, 0, 4, 300);
    monitor.recordOrbit(sessionId, 1, 6, 100);

    const metrics = monitor.endRecompute(sessionId);

    expect(metrics.kind).toBe("multiReference");
    expect(metrics.totalOrbits).toBe(2);
    expect(metrics.completedOrbits).toBe(2);
    expect(metrics.totalOrbitPoints).toBe(400);
    expect(metrics.averageOrbitTime).toBe(5);
    expect(metrics.duration).toBeGreaterThanOrEqual(0);
    expect(monitor.getProgress(sessionId)).toBeNull();
    expect(monitor.getLastMetrics()).toEqual(metrics);
  });

  it("throws when ending an unknown session", () => {
    expect(() => monitor.endRecompute("missing")).toThrow("PerformanceMonitor: Unknown session missing");
  });

  it("warns and ignores orbits recorded against an unknown session", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    monitor.recordOrbit("missing", 0, 1, 1);

    expect(warn).toHaveBeenCalledWith("PerformanceMonitor: Unknown session missing");
  });

  it("averages across completed recomputes", () => {
    for (const orbits of [1, 3]) {
      const sessionId = monitor.startRecompute("primary", orbits);
      for (let i = 0; i < orbits; i++) {
        monitor.recordOrbit(sessionId, i, 1, 10);
      }
      monitor.endRecompute(sessionId);
    }

    const stats = monitor.getStats();
    expect(stats.totalRecomputes).toBe(2);
    expect(stats.averageOrbitsPerRecompute).toBe(2);
  });

  it("returns empty statistics before any recompute", () => {
    expect(monitor.getStats()).toEqual({
      totalRecomputes: 0,
      averageDuration: 0,
      averagePointsPerSecond: 0,
      averageOrbitsPerRecompute: 0,
    });
    expect(monitor.getLastMetrics()).toBeNull();
  });

  it("bounds the history", () => {
    for (let i = 0; i < 5; i++) {
      monitor.endRecompute(monitor.startRecompute("glitchReferences", 0));
    }

    monitor.setMaxHistorySize(3);
    expect(monitor.getHistory()).toHaveLength(3);

    monitor.clearHistory();
    expect(monitor.getHistory()).toHaveLength(0);
  });
});
