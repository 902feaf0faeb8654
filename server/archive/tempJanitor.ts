import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";

import { errnoCode } from "../errors.js";
import type { ArtifactLeases } from "./leases.js";

/** Starts a repeating timer and returns the function that stops it. */
export type ScheduleFn = (handler: () => void, intervalMs: number) => () => void;

export interface TempJanitorOptions {
  tmpDirectory: string;
  intervalMs: number;
  /** Files younger than this survive a sweep. 0 reclaims everything on every cycle. */
  minRetentionMs: number;
  leases: ArtifactLeases;
  now?: () => number;
  schedule?: ScheduleFn;
}

export interface SweepReport {
  removed: string[];
  skipped: string[];
  failed: string[];
}

export interface TempJanitor {
  sweep(): Promise<SweepReport>;
  start(): Promise<SweepReport>;
  dispose(): void;
}

const defaultSchedule: ScheduleFn = (handler, intervalMs) => {
  const timer = setInterval(handler, intervalMs);
  timer.unref();
  return () => clearInterval(timer);
};

function emptyReport(): SweepReport {
  return { removed: [], skipped: [], failed: [] };
}

export function createTempJanitor(options: TempJanitorOptions): TempJanitor {
  const now = options.now ?? Date.now;
  const schedule = options.schedule ?? defaultSchedule;
  let stopTimer: (() => void) | null = null;
  let sweeping: Promise<SweepReport> | null = null;

  async function isOldEnough(filePath: string): Promise<boolean> {
    if (options.minRetentionMs <= 0) {
      return true;
    }
    const stats = await fs.stat(filePath);
    return now() - stats.mtimeMs >= options.minRetentionMs;
  }

  async function runSweep(): Promise<SweepReport> {
    const report = emptyReport();
    if (options.leases.hasPendingBuilds) {
      // zip stages its output next to the artifact, so nothing is touched mid-build.
      console.log("[janitor] archive build in progress, skipping sweep");
      return report;
    }

    let entries: Dirent[];
    try {
      entries = await fs.readdir(options.tmpDirectory, { withFileTypes: true });
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        return report;
      }
      console.error("[janitor] cannot read temp directory", error);
      return report;
    }

    for (const entry of entries) {
      if (!entry.isFile()) {
        continue;
      }

      const filePath = path.join(options.tmpDirectory, entry.name);
      try {
        if (options.leases.isLeased(filePath) || !(await isOldEnough(filePath))) {
          report.skipped.push(entry.name);
          continue;
        }
        await fs.rm(filePath, { force: true });
        report.removed.push(entry.name);
      } catch (error) {
        report.failed.push(entry.name);
        console.error(`[janitor] failed to remove ${entry.name}`, error);
      }
    }

    if (report.removed.length > 0 || report.failed.length > 0) {
      console.log(
        `[janitor] removed ${report.removed.length}, skipped ${report.skipped.length}, failed ${report.failed.length}`
      );
    }
    return report;
  }

  function sweep(): Promise<SweepReport> {
    if (!sweeping) {
      sweeping = runSweep().finally(() => {
        sweeping = null;
      });
    }
    return sweeping;
  }

  return {
    sweep,
    async start() {
      const report = await sweep();
      if (!stopTimer) {
        stopTimer = schedule(() => {
          void sweep();
        }, options.intervalMs);
      }
      return report;
    },
    dispose() {
      if (!stopTimer) {
        return;
      }
      stopTimer();
      stopTimer = null;
    }
  };
}
