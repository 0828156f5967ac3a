import cron from "node-cron";
import type { ScanConfig } from "@shared/schema";
import type { IStorage } from "../../storage";
import { type Clock, addMinutes } from "../../lib/clock";
import { errorMessage } from "../../lib/log";
import type { DispatchOutcome, TaskDispatcher } from "../dispatch/task-dispatcher";

export interface ScheduledJob {
  configId: string;
  intervalMinutes: number;
  nextRunAt: Date;
}

export interface ScanSchedulerOptions {
  cronExpression: string;
}

export type TriggerOutcome =
  | { skipped: true; configId: string; reason: "not_found" | "inactive" }
  | { skipped: false; configId: string; dispatch: DispatchOutcome; nextRunAt: Date };

export function isSchedulable(config: Pick<ScanConfig, "isActive" | "isRecurring">): boolean {
  return config.isActive && config.isRecurring;
}

/**
 * Keeps one job per active recurring scan configuration and fires the ones that
 * are due from a single cron tick. Removing a job only stops future runs;
 * work already handed to agents is left alone.
 */
export class ScanScheduler {
  private jobs = new Map<string, ScheduledJob>();
  private task: ReturnType<typeof cron.schedule> | null = null;
  private tick: Promise<TriggerOutcome[]> | null = null;

  constructor(
    private readonly storage: IStorage,
    private readonly dispatcher: TaskDispatcher,
    private readonly options: ScanSchedulerOptions,
    private readonly clock: Clock,
  ) {}

  /**
   * Loads every active recurring configuration. A configuration without a
   * next run, or whose next run passed while we were down, is due at once.
   */
  async init(): Promise<number> {
    const configs = await this.storage.getScanConfigs({ active: true, recurring: true });
    for (const config of configs) {
      this.schedule(config.id, config.intervalMinutes, config.nextRunAt ?? this.clock());
    }
    console.log(`[Scheduler] Loaded ${configs.length} recurring scan(s)`);
    return configs.length;
  }

  start(): void {
    if (this.task) {
      console.log("[Scheduler] Scheduler already running");
      return;
    }

    this.task = cron.schedule(this.options.cronExpression, async () => {
      await this.runDueJobs();
    });

    console.log(`[Scheduler] Scan scheduler started (${this.options.cronExpression})`);
  }

  async shutdown(): Promise<void> {
    if (this.task) {
      this.task.stop();
      this.task = null;
    }
    if (this.tick) {
      await this.tick;
    }
    console.log("[Scheduler] Scan scheduler stopped");
  }

  /**
   * Adds or replaces the job for a configuration.
   */
  schedule(configId: string, intervalMinutes: number, nextRunAt?: Date): ScheduledJob {
    const job: ScheduledJob = {
      configId,
      intervalMinutes,
      nextRunAt: nextRunAt ?? addMinutes(this.clock(), intervalMinutes),
    };
    this.jobs.set(configId, job);
    return job;
  }

  unschedule(configId: string): boolean {
    return this.jobs.delete(configId);
  }

  /**
   * Brings the job in line with a configuration after it was edited.
   */
  sync(config: ScanConfig): ScheduledJob | null {
    if (!isSchedulable(config)) {
      if (this.unschedule(config.id)) {
        console.log(`[Scheduler] Unscheduled scan ${config.id}`);
      }
      return null;
    }

    const existing = this.jobs.get(config.id);
    if (existing && existing.intervalMinutes === config.intervalMinutes) {
      return existing;
    }
    const job = this.schedule(config.id, config.intervalMinutes);
    console.log(`[Scheduler] Scan ${config.id} every ${config.intervalMinutes}m, next run ${job.nextRunAt.toISOString()}`);
    return job;
  }

  getJob(configId: string): ScheduledJob | undefined {
    return this.jobs.get(configId);
  }

  getJobs(): ScheduledJob[] {
    return Array.from(this.jobs.values());
  }

  /**
   * Fires every due job. A tick that is still running when the next one
   * arrives is shared instead of started twice.
   */
  runDueJobs(): Promise<TriggerOutcome[]> {
    if (this.tick) return this.tick;

    this.tick = this.processDueJobs().finally(() => {
      this.tick = null;
    });
    return this.tick;
  }

  private async processDueJobs(): Promise<TriggerOutcome[]> {
    const now = this.clock();
    const due = this.getJobs().filter((job) => job.nextRunAt <= now);
    if (due.length === 0) return [];

    console.log(`[Scheduler] Found ${due.length} due scan(s)`);

    const outcomes: TriggerOutcome[] = [];
    for (const job of due) {
      try {
        outcomes.push(await this.trigger(job.configId));
      } catch (error) {
        console.error(`[Scheduler] Error processing scan ${job.configId}:`, errorMessage(error));
      }
    }
    return outcomes;
  }

  /**
   * Runs one configuration now. A configuration that vanished or was
   * deactivated is dropped from the schedule without error. Otherwise the
   * schedule advances whatever the dispatch outcome; there is no early retry.
   */
  async trigger(configId: string): Promise<TriggerOutcome> {
    const config = await this.storage.getScanConfig(configId);
    if (!config || !config.isActive) {
      this.unschedule(configId);
      console.log(`[Scheduler] Skipping scan ${configId}: ${config ? "inactive" : "not found"}`);
      return { skipped: true, configId, reason: config ? "inactive" : "not_found" };
    }

    console.log(`[Scheduler] Processing scheduled scan: ${config.name} (${config.id})`);

    let dispatch: DispatchOutcome;
    try {
      dispatch = await this.dispatcher.dispatch(config);
    } catch (error) {
      console.error(`[Scheduler] Dispatch of scan ${config.id} threw:`, errorMessage(error));
      dispatch = { ok: false, scanConfigId: config.id, reason: "dispatch_failed", message: errorMessage(error) };
    }

    const now = this.clock();
    const nextRunAt = addMinutes(now, config.intervalMinutes);
    await this.storage.updateScanConfig(config.id, { lastRunAt: now, nextRunAt });

    if (isSchedulable(config)) {
      this.schedule(config.id, config.intervalMinutes, nextRunAt);
    } else {
      this.unschedule(config.id);
    }

    console.log(`[Scheduler] Scan ${config.id} ${dispatch.ok ? "dispatched" : `not dispatched (${dispatch.reason})`}, next run: ${nextRunAt.toISOString()}`);
    return { skipped: false, configId, dispatch, nextRunAt };
  }
}
