import {
  type AggregatedResult,
  type HostMap,
  type HostObservation,
  type HostResult,
  type ResultCoverage,
  type ResultStatus,
  type ResultSubmission,
  type ScanTask,
  type TaskStatus,
  isAllowedTransition,
  resultTransitions,
  taskTransitions,
  terminalTaskStatuses,
} from "@shared/schema";
import type { IStorage } from "../../storage";
import type { Clock } from "../../lib/clock";
import { KeyedMutex } from "../../lib/keyed-mutex";
import { errorMessage } from "../../lib/log";
import {
  ResultFinalizedError,
  SubmissionTimeoutError,
  TaskOwnershipError,
  UnknownResultError,
  UnknownTaskError,
} from "../../lib/errors";
import type { AgentRegistry } from "../agents/agent-registry";
import type { DeltaComparator } from "../delta/delta-comparator";

// ========== PURE MERGE & DERIVATION ==========

export interface ResultCounters {
  totalTargets: number;
  completedTargets: number;
  failedTargets: number;
  totalOpenPorts: number;
}

/**
 * Folds one submission's observations into the accumulated host map.
 * Hostname and state take the latest provided value, open ports are unioned
 * and port details are overwritten key by key. The input map is not modified.
 */
export function mergeHostMaps(existing: HostMap, observations: Record<string, HostObservation>): HostMap {
  const merged: HostMap = { ...existing };

  for (const [address, observation] of Object.entries(observations)) {
    const previous: HostResult = merged[address] ?? {
      hostname: "",
      state: "unknown",
      openPorts: [],
      portDetails: {},
    };

    const openPorts = Array.from(new Set([...previous.openPorts, ...observation.openPorts])).sort((a, b) => a - b);

    merged[address] = {
      hostname: observation.hostname ?? previous.hostname,
      state: observation.state ?? previous.state,
      openPorts,
      portDetails: { ...previous.portDetails, ...observation.portDetails },
    };
  }

  return merged;
}

export function computeCounters(hosts: HostMap): ResultCounters {
  const entries = Object.values(hosts);
  return {
    totalTargets: entries.length,
    completedTargets: entries.filter((h) => h.state === "up" || h.state === "down").length,
    failedTargets: entries.filter((h) => h.state === "error").length,
    totalOpenPorts: entries.reduce((sum, h) => sum + h.openPorts.length, 0),
  };
}

export function isTaskSettled(status: TaskStatus): boolean {
  return terminalTaskStatuses.some((terminal) => terminal === status);
}

/**
 * Overall status from the sibling task statuses. Once one task failed and
 * another completed the result is partial for good; a result whose tasks all
 * completed is still partial when part of the target set went unassigned.
 */
export function deriveResultStatus(statuses: readonly TaskStatus[], coverage: ResultCoverage): ResultStatus {
  if (statuses.length === 0) return "pending";

  const completed = statuses.filter((s) => s === "completed").length;
  const failed = statuses.filter((s) => s === "failed").length;

  if (completed > 0 && failed > 0) return "partial";
  if (completed + failed < statuses.length) return "pending";
  if (failed === statuses.length) return "failed";
  return coverage === "full" ? "completed" : "partial";
}

// ========== AGGREGATOR ==========

export interface ResultAggregatorOptions {
  baseTimeoutMs: number;
  perTargetMs: number;
  maxTimeoutMs: number;
}

export interface SubmissionSummary extends ResultCounters {
  resultId: string;
  taskId: string;
  status: ResultStatus;
  contributingAgents: string[];
  finalized: boolean;
}

export interface DispatchAcknowledgements {
  acknowledged: Array<{ taskId: string; agentId: string }>;
  failed: Array<{ taskId: string; error: string }>;
  unassignedTargets: string[];
  coverage: ResultCoverage;
}

export class ResultAggregator {
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly storage: IStorage,
    private readonly registry: AgentRegistry,
    private readonly comparator: DeltaComparator,
    private readonly options: ResultAggregatorOptions,
    private readonly clock: Clock,
  ) {}

  /**
   * Processing allowance for a submission, growing with the number of
   * reported hosts up to a hard ceiling.
   */
  submissionTimeoutMs(hostCount: number): number {
    return Math.min(this.options.maxTimeoutMs, this.options.baseTimeoutMs + this.options.perTargetMs * hostCount);
  }

  async submit(submission: ResultSubmission): Promise<SubmissionSummary> {
    const timeoutMs = this.submissionTimeoutMs(Object.keys(submission.hosts).length);

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new SubmissionTimeoutError(submission.resultId, timeoutMs)), timeoutMs);
    });

    try {
      return await Promise.race([
        this.locks.run(submission.resultId, () => this.merge(submission)),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Applies the dispatcher's view of which agents accepted their work order,
   * then re-derives the result status. Runs under the result lock because a
   * fast agent may already have submitted.
   */
  async recordDispatchOutcome(resultId: string, outcome: DispatchAcknowledgements): Promise<AggregatedResult> {
    return this.locks.run(resultId, async () => {
      const result = await this.storage.getResult(resultId);
      if (!result) throw new UnknownResultError(resultId);
      // Every agent already reported back; a finalized result is never written again
      if (result.finalizedAt) return result;
      const now = this.clock();

      for (const { taskId, agentId } of outcome.acknowledged) {
        const task = await this.storage.getTask(taskId);
        if (task?.status !== "pending") continue;
        await this.storage.updateTask(taskId, { status: "assigned", assignedAt: now });
        await this.registry.markScanning(agentId);
      }

      for (const { taskId, error } of outcome.failed) {
        const task = await this.storage.getTask(taskId);
        if (!task || !isAllowedTransition<TaskStatus>(taskTransitions, task.status, "failed")) continue;
        await this.storage.updateTask(taskId, { status: "failed", error, completedAt: now });
      }

      return this.settle(result, {
        coverage: outcome.coverage,
        unassignedTargets: outcome.unassignedTargets,
      });
    });
  }

  private async merge(submission: ResultSubmission): Promise<SubmissionSummary> {
    const result = await this.storage.getResult(submission.resultId);
    if (!result) {
      console.warn(`[Aggregator] Submission for unknown result ${submission.resultId} from ${submission.agentId}`);
      throw new UnknownResultError(submission.resultId);
    }
    if (result.finalizedAt) {
      throw new ResultFinalizedError(result.id);
    }

    const task = await this.storage.getTask(submission.taskId);
    if (!task || task.resultId !== result.id) {
      throw new UnknownTaskError(submission.taskId, result.id);
    }
    if (task.agentId !== submission.agentId) {
      throw new TaskOwnershipError(task.id, submission.agentId);
    }

    const hosts = mergeHostMaps(result.hosts, submission.hosts);
    const contributingAgents = result.contributingAgents.includes(submission.agentId)
      ? result.contributingAgents
      : [...result.contributingAgents, submission.agentId];

    const settledTask = await this.applyTaskOutcome(task, submission);

    const updated = await this.settle(result, {
      hosts,
      ...computeCounters(hosts),
      contributingAgents,
      startedAt: result.startedAt ?? this.clock(),
    });

    if (settledTask && (await this.storage.countAssignedTasks(task.agentId)) === 0) {
      await this.registry.markIdle(task.agentId);
    }

    return {
      resultId: updated.id,
      taskId: task.id,
      status: updated.status,
      totalTargets: updated.totalTargets,
      completedTargets: updated.completedTargets,
      failedTargets: updated.failedTargets,
      totalOpenPorts: updated.totalOpenPorts,
      contributingAgents: updated.contributingAgents,
      finalized: updated.finalizedAt !== null,
    };
  }

  private async applyTaskOutcome(task: ScanTask, submission: ResultSubmission): Promise<boolean> {
    const to = submission.status;
    if (task.status === to) return true;

    if (!isAllowedTransition<TaskStatus>(taskTransitions, task.status, to)) {
      console.warn(`[Aggregator] Ignoring ${task.status} -> ${to} for task ${task.id}`);
      return isTaskSettled(task.status);
    }

    await this.storage.updateTask(task.id, {
      status: to,
      completedAt: this.clock(),
      error: to === "failed" ? submission.error ?? "Agent reported failure" : null,
    });
    return true;
  }

  /**
   * Writes the given changes together with the status derived from the
   * current sibling tasks. Finalizes the result the first time every task is
   * settled and hands it to the delta comparator.
   */
  private async settle(result: AggregatedResult, changes: Partial<AggregatedResult>): Promise<AggregatedResult> {
    const tasks = await this.storage.getTasksByGroup(result.groupId);
    const coverage = changes.coverage ?? result.coverage;
    const derived = deriveResultStatus(tasks.map((t) => t.status), coverage);

    let status = result.status;
    if (isAllowedTransition<ResultStatus>(resultTransitions, result.status, derived)) {
      status = derived;
    } else {
      console.warn(`[Aggregator] Result ${result.id} cannot move ${result.status} -> ${derived}, keeping ${result.status}`);
    }

    const now = this.clock();
    const finalizing = result.finalizedAt === null && tasks.length > 0 && tasks.every((t) => isTaskSettled(t.status));

    const updated = await this.storage.updateResult(result.id, {
      ...changes,
      status,
      updatedAt: now,
      ...(finalizing ? { finalizedAt: now } : {}),
    });
    if (!updated) throw new UnknownResultError(result.id);

    if (finalizing) {
      console.log(
        `[Aggregator] Result ${updated.id} finalized as ${updated.status} ` +
        `(${updated.completedTargets}/${updated.totalTargets} targets, ${updated.totalOpenPorts} open ports)`
      );
      try {
        await this.comparator.generateForResult(updated);
      } catch (error) {
        console.error(`[Aggregator] Delta generation failed for result ${updated.id}:`, errorMessage(error));
      }
    }

    return updated;
  }
}
