import {
  type Agent,
  type AgentState,
  agentTransitions,
  isAllowedTransition,
  liveAgentStates,
} from "@shared/schema";
import type { IStorage } from "../../storage";
import type { Clock } from "../../lib/clock";
import { IllegalTransitionError, UnknownAgentError } from "../../lib/errors";
import { tryParseAddressRange, rangeContains } from "../../lib/ip-range";
import { KeyedMutex } from "../../lib/keyed-mutex";

/**
 * Agent Registry
 * Owns agent identity, address-range ownership, approval and liveness state.
 * Overlapping owned ranges are accepted as declared; the dispatcher resolves
 * overlap first-wins.
 */

export interface AgentRegistration {
  agentId: string;
  hostname?: string;
  address: string;
  port: number;
  ownedRange: string;
}

export type HeartbeatOutcome =
  | { approved: true; agent: Agent }
  | { approved: false; pollAgain: true; agent: Agent };

export interface AgentRegistryOptions {
  heartbeatTimeoutMs: number;
}

export function isApproved(agent: Pick<Agent, "state" | "approvedAt">): boolean {
  return agent.state !== "pending_approval" && agent.approvedAt !== null;
}

export function isLive(agent: Pick<Agent, "state">): boolean {
  return liveAgentStates.some((state) => state === agent.state);
}

export class AgentRegistry {
  // Every write to one agent's row runs under its key and starts from a fresh read
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly storage: IStorage,
    private readonly options: AgentRegistryOptions,
    private readonly clock: Clock,
  ) {}

  async getAgent(agentId: string): Promise<Agent> {
    const agent = await this.storage.getAgent(agentId);
    if (!agent) throw new UnknownAgentError(agentId);
    return agent;
  }

  async listAgents(): Promise<Agent[]> {
    return this.storage.getAgents();
  }

  /**
   * Idempotent upsert of an agent's contact details. New identities start in
   * pending_approval; the lifecycle state of a known agent is left alone.
   */
  async registerOrUpdate(registration: AgentRegistration): Promise<Agent> {
    return this.locks.run(registration.agentId, () => this.upsert(registration));
  }

  /**
   * Records a liveness signal. Unapproved agents are tracked but stay pending;
   * an approved offline agent comes back online. Any other state is kept.
   */
  async recordHeartbeat(registration: AgentRegistration): Promise<HeartbeatOutcome> {
    return this.locks.run(registration.agentId, async () => {
      const agent = await this.upsert(registration);
      const now = this.clock();

      if (!isApproved(agent)) {
        const touched = await this.storage.updateAgent(agent.id, { lastHeartbeat: now, updatedAt: now });
        return { approved: false, pollAgain: true, agent: touched ?? agent };
      }

      if (agent.state === "offline") {
        const updated = await this.transition(agent, "online", { lastHeartbeat: now });
        console.log(`[AgentRegistry] Agent ${agent.id} is back online`);
        return { approved: true, agent: updated };
      }

      const touched = await this.storage.updateAgent(agent.id, { lastHeartbeat: now, updatedAt: now });
      return { approved: true, agent: touched ?? agent };
    });
  }

  async approve(agentId: string): Promise<Agent> {
    return this.locks.run(agentId, async () => {
      const agent = await this.getAgent(agentId);
      if (isApproved(agent)) return agent;

      const approved = await this.transition(agent, "offline", { approvedAt: this.clock() });
      console.log(`[AgentRegistry] Agent ${agentId} approved`);
      return approved;
    });
  }

  /**
   * Withdraws approval. The agent drops out of every live state at once and
   * its heartbeats are answered with "pending" until it is approved again.
   */
  async revoke(agentId: string): Promise<Agent> {
    return this.locks.run(agentId, async () => {
      const agent = await this.getAgent(agentId);
      if (agent.state === "pending_approval" && agent.approvedAt === null) return agent;

      const revoked = await this.transition(agent, "pending_approval", { approvedAt: null });
      console.log(`[AgentRegistry] Agent ${agentId} revoked (was ${agent.state})`);
      return revoked;
    });
  }

  /**
   * Approved, live agents with a fresh heartbeat whose owned range covers at
   * least one of the given targets, in registration order.
   */
  async eligibleAgents(targets: readonly string[]): Promise<Agent[]> {
    const cutoff = this.clock().getTime() - this.options.heartbeatTimeoutMs;
    const agents = await this.storage.getAgents();

    return agents.filter((agent) => {
      if (!isApproved(agent) || !isLive(agent)) return false;
      if (!agent.lastHeartbeat || agent.lastHeartbeat.getTime() < cutoff) return false;
      const owned = tryParseAddressRange(agent.ownedRange);
      return owned !== null && targets.some((target) => rangeContains(owned, target));
    });
  }

  async markScanning(agentId: string): Promise<void> {
    await this.locks.run(agentId, async () => {
      const agent = await this.storage.getAgent(agentId);
      if (agent?.state === "online") {
        await this.transition(agent, "scanning");
      }
    });
  }

  async markIdle(agentId: string): Promise<void> {
    await this.locks.run(agentId, async () => {
      const agent = await this.storage.getAgent(agentId);
      if (agent?.state === "scanning") {
        await this.transition(agent, "online");
      }
    });
  }

  /**
   * Moves every live agent whose last heartbeat is older than the cutoff to
   * offline. Agents already offline or pending are untouched, and an agent
   * whose heartbeat lands while the sweep runs is re-checked and kept.
   */
  async demoteStale(cutoff: Date): Promise<Agent[]> {
    const agents = await this.storage.getAgents();
    const demoted: Agent[] = [];

    for (const candidate of agents) {
      if (!isStale(candidate, cutoff)) continue;

      const agent = await this.locks.run(candidate.id, async () => {
        const current = await this.storage.getAgent(candidate.id);
        if (!current || !isStale(current, cutoff)) return null;
        return this.transition(current, "offline");
      });
      if (agent) demoted.push(agent);
    }
    return demoted;
  }

  private async upsert(registration: AgentRegistration): Promise<Agent> {
    const existing = await this.storage.getAgent(registration.agentId);
    const now = this.clock();

    if (!existing) {
      const agent = await this.storage.createAgent({
        id: registration.agentId,
        hostname: registration.hostname || null,
        address: registration.address,
        port: registration.port,
        ownedRange: registration.ownedRange,
        state: "pending_approval",
        createdAt: now,
        updatedAt: now,
      });
      console.log(`[AgentRegistry] New agent ${agent.id} at ${agent.address}:${agent.port} awaiting approval`);
      return agent;
    }

    const updated = await this.storage.updateAgent(existing.id, {
      hostname: registration.hostname || existing.hostname,
      address: registration.address,
      port: registration.port,
      ownedRange: registration.ownedRange,
      updatedAt: now,
    });
    return updated ?? existing;
  }

  private async transition(agent: Agent, to: AgentState, extra: Partial<Agent> = {}): Promise<Agent> {
    if (!isAllowedTransition<AgentState>(agentTransitions, agent.state, to)) {
      throw new IllegalTransitionError("Agent", agent.id, agent.state, to);
    }
    const updated = await this.storage.updateAgent(agent.id, { ...extra, state: to, updatedAt: this.clock() });
    if (!updated) throw new UnknownAgentError(agent.id);
    return updated;
  }
}

function isStale(agent: Agent, cutoff: Date): boolean {
  return isLive(agent) && (!agent.lastHeartbeat || agent.lastHeartbeat < cutoff);
}
