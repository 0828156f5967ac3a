import type { Agent } from "@shared/schema";
import type { Clock } from "../../lib/clock";
import { errorMessage } from "../../lib/log";
import type { AgentRegistry } from "./agent-registry";

export interface HeartbeatMonitorOptions {
  timeoutMs: number; // no heartbeat for this long = offline
  sweepIntervalMs: number;
}

export class HeartbeatMonitor {
  private intervalId: NodeJS.Timeout | null = null;
  private inFlight: Promise<Agent[]> | null = null;

  constructor(
    private readonly registry: AgentRegistry,
    private readonly options: HeartbeatMonitorOptions,
    private readonly clock: Clock,
  ) {}

  start(): void {
    if (this.intervalId) return;

    this.intervalId = setInterval(() => {
      this.sweep().catch((err) => {
        console.error("[HeartbeatMonitor] Sweep failed:", errorMessage(err));
      });
    }, this.options.sweepIntervalMs);
    this.intervalId.unref();

    console.log(
      `[HeartbeatMonitor] Sweeping every ${Math.round(this.options.sweepIntervalMs / 1000)}s ` +
      `(timeout ${Math.round(this.options.timeoutMs / 1000)}s)`
    );
  }

  async stop(): Promise<void> {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
    if (this.inFlight) {
      await this.inFlight.catch(() => []);
    }
  }

  /**
   * Demotes agents whose last heartbeat expired. Overlapping calls share one
   * sweep.
   */
  sweep(): Promise<Agent[]> {
    if (this.inFlight) return this.inFlight;

    const cutoff = new Date(this.clock().getTime() - this.options.timeoutMs);
    this.inFlight = this.registry
      .demoteStale(cutoff)
      .then((demoted) => {
        for (const agent of demoted) {
          const lastSeen = agent.lastHeartbeat ? agent.lastHeartbeat.toISOString() : "never";
          console.warn(`[HeartbeatMonitor] Agent ${agent.id} demoted to offline (last heartbeat ${lastSeen})`);
        }
        return demoted;
      })
      .finally(() => {
        this.inFlight = null;
      });
    return this.inFlight;
  }
}
