import type { Agent, ResultCoverage, ScanConfig, WorkOrder } from "@shared/schema";
import type { IStorage } from "../../storage";
import type { Clock } from "../../lib/clock";
import { InvalidTargetError } from "../../lib/errors";
import { errorMessage } from "../../lib/log";
import { compareAddresses, rangeContains, resolveTargets, tryParseAddressRange } from "../../lib/ip-range";
import type { AgentClient } from "../agents/agent-client";
import type { AgentRegistry } from "../agents/agent-registry";
import type { ResultAggregator } from "../results/result-aggregator";

export interface Assignment {
  agentId: string;
  targets: string[];
}

export interface AssignmentPlan {
  assignments: Assignment[];
  unassigned: string[];
}

export type DispatchFailureReason = "invalid_target" | "no_eligible_agents" | "dispatch_failed";

export type DispatchOutcome =
  | {
      ok: true;
      scanConfigId: string;
      resultId: string;
      groupId: string;
      dispatchedTasks: number;
      failedTasks: number;
      coverage: ResultCoverage;
      unassignedTargets: string[];
    }
  | {
      ok: false;
      scanConfigId: string;
      reason: DispatchFailureReason;
      message: string;
    };

/**
 * Greedy first-wins assignment. Agents are visited in the given order and each
 * takes the still-unassigned targets inside its owned range, so no target is
 * handed out twice and an agent never receives a target outside its range.
 * Where ranges overlap the earlier agent wins; that is an ordering rule, not
 * a judgement about which agent is better placed.
 */
export function planAssignments(targets: readonly string[], agents: readonly Agent[]): AssignmentPlan {
  const remaining = new Set(targets);
  const assignments: Assignment[] = [];

  for (const agent of agents) {
    if (remaining.size === 0) break;
    const owned = tryParseAddressRange(agent.ownedRange);
    if (!owned) continue;

    const mine = targets.filter((target) => remaining.has(target) && rangeContains(owned, target));
    if (mine.length === 0) continue;

    for (const target of mine) remaining.delete(target);
    assignments.push({ agentId: agent.id, targets: mine });
  }

  return {
    assignments,
    unassigned: targets.filter((target) => remaining.has(target)),
  };
}

export interface TaskDispatcherOptions {
  dispatchTimeoutMs: number;
}

export class TaskDispatcher {
  constructor(
    private readonly storage: IStorage,
    private readonly registry: AgentRegistry,
    private readonly aggregator: ResultAggregator,
    private readonly agentClient: AgentClient,
    private readonly options: TaskDispatcherOptions,
    private readonly clock: Clock,
  ) {}

  async dispatch(config: ScanConfig): Promise<DispatchOutcome> {
    let targets: string[];
    try {
      targets = resolveTargets(config.target);
    } catch (error) {
      if (!(error instanceof InvalidTargetError)) throw error;
      console.warn(`[Dispatcher] Scan ${config.id}: ${error.message}`);
      return { ok: false, scanConfigId: config.id, reason: "invalid_target", message: error.message };
    }

    const eligible = await this.registry.eligibleAgents(targets);
    if (eligible.length === 0) {
      const message = `No eligible agents cover ${config.target}`;
      console.warn(`[Dispatcher] Scan ${config.id}: ${message}`);
      return { ok: false, scanConfigId: config.id, reason: "no_eligible_agents", message };
    }

    const plan = planAssignments(targets, eligible);
    const agentsById = new Map(eligible.map((agent) => [agent.id, agent]));

    // Records exist before any agent is contacted so early submissions have somewhere to land
    const execution = await this.storage.createExecution({
      scanConfigId: config.id,
      ports: config.ports,
      scanArguments: config.scanArguments,
      requestedTargets: targets,
      unassignedTargets: plan.unassigned,
      coverage: plan.unassigned.length === 0 ? "full" : "partial",
      assignments: plan.assignments,
      createdAt: this.clock(),
    });

    console.log(
      `[Dispatcher] Scan ${config.id}: ${targets.length} target(s) over ${execution.tasks.length} agent(s), ` +
      `${plan.unassigned.length} unassigned (result ${execution.result.id})`
    );

    const attempts = await Promise.all(execution.tasks.map(async (task) => {
      const agent = agentsById.get(task.agentId);
      const order: WorkOrder = {
        scan_id: config.id,
        task_id: task.id,
        result_id: execution.result.id,
        targets: task.targets,
        ports: task.ports,
        scan_arguments: task.scanArguments,
      };

      try {
        if (!agent) throw new Error(`agent ${task.agentId} missing from eligible set`);
        await this.agentClient.sendWorkOrder(agent, order, this.options.dispatchTimeoutMs);
        return { task, error: null };
      } catch (error) {
        console.warn(`[Dispatcher] ${errorMessage(error)}; task ${task.id} targets stay unassigned`);
        return { task, error: errorMessage(error) };
      }
    }));

    const reached = attempts.filter((a) => a.error === null);
    const unreached = attempts.flatMap((a) => (a.error === null ? [] : [{ task: a.task, error: a.error }]));

    if (reached.length === 0) {
      await this.storage.deleteExecution(execution.groupId);
      const message = `None of ${attempts.length} agent(s) accepted the work order`;
      console.error(`[Dispatcher] Scan ${config.id}: ${message}, execution rolled back`);
      return { ok: false, scanConfigId: config.id, reason: "dispatch_failed", message };
    }

    const unassignedTargets = [...plan.unassigned, ...unreached.flatMap((u) => u.task.targets)].sort(compareAddresses);
    const coverage: ResultCoverage = unassignedTargets.length === 0 ? "full" : "partial";

    await this.aggregator.recordDispatchOutcome(execution.result.id, {
      acknowledged: reached.map((a) => ({ taskId: a.task.id, agentId: a.task.agentId })),
      failed: unreached.map((u) => ({ taskId: u.task.id, error: u.error })),
      unassignedTargets,
      coverage,
    });

    return {
      ok: true,
      scanConfigId: config.id,
      resultId: execution.result.id,
      groupId: execution.groupId,
      dispatchedTasks: reached.length,
      failedTasks: unreached.length,
      coverage,
      unassignedTargets,
    };
  }
}
