import type { Agent, HostObservation, ResultSubmission, WorkOrder } from "@shared/schema";
import type { Clock } from "../lib/clock";
import { AgentUnreachableError } from "../lib/errors";
import { MemStorage } from "../mem-storage";
import type { AgentClient } from "../services/agents/agent-client";
import { ScanOrchestrator, type OrchestratorConfig } from "../services/orchestrator";

export const HEARTBEAT_INTERVAL_MS = 60_000;

export const testConfig: OrchestratorConfig = {
  heartbeatTimeoutMs: 3 * HEARTBEAT_INTERVAL_MS,
  heartbeatSweepMs: HEARTBEAT_INTERVAL_MS,
  dispatchTimeoutMs: 1000,
  submissionBaseTimeoutMs: 5000,
  submissionPerTargetMs: 50,
  submissionMaxTimeoutMs: 60_000,
  schedulerCron: "* * * * *",
};

export class TestClock {
  private current: Date;

  constructor(start = "2026-01-05T10:00:00.000Z") {
    this.current = new Date(start);
  }

  readonly now: Clock = () => new Date(this.current.getTime());

  advance(ms: number): Date {
    this.current = new Date(this.current.getTime() + ms);
    return this.now();
  }
}

export class FakeAgentClient implements AgentClient {
  readonly orders: Array<{ agentId: string; order: WorkOrder }> = [];
  readonly unreachable = new Set<string>();
  // Runs after the agent received its order but before the acknowledgement returns
  beforeAcknowledge: ((agent: Agent, order: WorkOrder) => Promise<void>) | null = null;

  async sendWorkOrder(agent: Agent, order: WorkOrder): Promise<void> {
    if (this.unreachable.has(agent.id)) {
      throw new AgentUnreachableError(agent.id, "connect ECONNREFUSED");
    }
    this.orders.push({ agentId: agent.id, order });
    if (this.beforeAcknowledge) {
      await this.beforeAcknowledge(agent, order);
    }
  }

  orderFor(agentId: string): WorkOrder {
    const found = this.orders.find((o) => o.agentId === agentId);
    if (!found) throw new Error(`no work order sent to ${agentId}`);
    return found.order;
  }
}

export function createTestOrchestrator() {
  const storage = new MemStorage();
  const clock = new TestClock();
  const client = new FakeAgentClient();
  const orchestrator = new ScanOrchestrator({
    config: testConfig,
    storage,
    agentClient: client,
    clock: clock.now,
  });
  return { orchestrator, storage, clock, client };
}

/**
 * Registers, approves and heartbeats an agent so it is online and eligible.
 */
export async function bringOnline(
  orchestrator: ScanOrchestrator,
  agentId: string,
  ownedRange: string,
  address = "192.168.50.10",
): Promise<Agent> {
  const registration = { agentId, hostname: `${agentId}.lab`, address, port: 8443, ownedRange };
  await orchestrator.registry.recordHeartbeat(registration);
  await orchestrator.registry.approve(agentId);
  const outcome = await orchestrator.registry.recordHeartbeat(registration);
  return outcome.agent;
}

export function upHost(openPorts: number[], details: HostObservation["portDetails"] = {}, hostname = ""): HostObservation {
  return { hostname, state: "up", openPorts, portDetails: details };
}

export function submission(
  order: WorkOrder,
  agentId: string,
  hosts: Record<string, HostObservation>,
  status: ResultSubmission["status"] = "completed",
): ResultSubmission {
  return { resultId: order.result_id, taskId: order.task_id, agentId, status, hosts };
}
