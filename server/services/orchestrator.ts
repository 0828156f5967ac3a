import type { ScanConfig } from "@shared/schema";
import type { IStorage } from "../storage";
import type { AppConfig } from "../lib/environment";
import { type Clock, systemClock } from "../lib/clock";
import { UnknownScanConfigError } from "../lib/errors";
import { AgentRegistry } from "./agents/agent-registry";
import { HeartbeatMonitor } from "./agents/heartbeat-monitor";
import type { AgentClient } from "./agents/agent-client";
import { DeltaComparator } from "./delta/delta-comparator";
import { ResultAggregator } from "./results/result-aggregator";
import { type DispatchOutcome, TaskDispatcher } from "./dispatch/task-dispatcher";
import { ScanScheduler } from "./scheduler/scan-scheduler";

export type OrchestratorConfig = Pick<
  AppConfig,
  | "heartbeatTimeoutMs"
  | "heartbeatSweepMs"
  | "dispatchTimeoutMs"
  | "submissionBaseTimeoutMs"
  | "submissionPerTargetMs"
  | "submissionMaxTimeoutMs"
  | "schedulerCron"
>;

export interface OrchestratorDeps {
  config: OrchestratorConfig;
  storage: IStorage;
  agentClient: AgentClient;
  clock?: Clock;
}

/**
 * Service context for the scan engine. Built once at start-up and handed to
 * whatever needs it; nothing here is reachable through module state.
 */
export class ScanOrchestrator {
  readonly storage: IStorage;
  readonly clock: Clock;
  readonly registry: AgentRegistry;
  readonly heartbeatMonitor: HeartbeatMonitor;
  readonly comparator: DeltaComparator;
  readonly aggregator: ResultAggregator;
  readonly dispatcher: TaskDispatcher;
  readonly scheduler: ScanScheduler;

  private started = false;

  constructor({ config, storage, agentClient, clock = systemClock }: OrchestratorDeps) {
    this.storage = storage;
    this.clock = clock;

    this.registry = new AgentRegistry(storage, { heartbeatTimeoutMs: config.heartbeatTimeoutMs }, clock);
    this.heartbeatMonitor = new HeartbeatMonitor(
      this.registry,
      { timeoutMs: config.heartbeatTimeoutMs, sweepIntervalMs: config.heartbeatSweepMs },
      clock,
    );
    this.comparator = new DeltaComparator(storage, clock);
    this.aggregator = new ResultAggregator(
      storage,
      this.registry,
      this.comparator,
      {
        baseTimeoutMs: config.submissionBaseTimeoutMs,
        perTargetMs: config.submissionPerTargetMs,
        maxTimeoutMs: config.submissionMaxTimeoutMs,
      },
      clock,
    );
    this.dispatcher = new TaskDispatcher(
      storage,
      this.registry,
      this.aggregator,
      agentClient,
      { dispatchTimeoutMs: config.dispatchTimeoutMs },
      clock,
    );
    this.scheduler = new ScanScheduler(storage, this.dispatcher, { cronExpression: config.schedulerCron }, clock);
  }

  async init(): Promise<void> {
    await this.scheduler.init();
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.heartbeatMonitor.start();
    this.scheduler.start();
  }

  async shutdown(): Promise<void> {
    this.started = false;
    await Promise.all([this.heartbeatMonitor.stop(), this.scheduler.shutdown()]);
  }

  /**
   * Operator-initiated run. Dispatches regardless of the recurring flag and
   * records the run time; a recurring configuration's next run moves on too.
   */
  async executeNow(configId: string): Promise<DispatchOutcome> {
    const config = await this.getScanConfig(configId);
    const outcome = await this.dispatcher.dispatch(config);

    const now = this.clock();
    const updated = await this.storage.updateScanConfig(config.id, { lastRunAt: now });
    if (updated && updated.isActive && updated.isRecurring) {
      const job = this.scheduler.schedule(updated.id, updated.intervalMinutes);
      await this.storage.updateScanConfig(updated.id, { nextRunAt: job.nextRunAt });
    }
    return outcome;
  }

  async getScanConfig(configId: string): Promise<ScanConfig> {
    const config = await this.storage.getScanConfig(configId);
    if (!config) throw new UnknownScanConfigError(configId);
    return config;
  }
}
