import type {
  Agent,
  InsertAgent,
  ScanConfig,
  InsertScanConfig,
  ScanTask,
  AggregatedResult,
  DeltaReport,
  ResultStatus,
  TaskStatus,
} from "@shared/schema";
import { randomUUID } from "crypto";
import {
  type IStorage,
  type Page,
  type ResultQuery,
  type DeltaReportQuery,
  type ScanConfigFilter,
  type NewExecution,
  type Execution,
  type NewDeltaReport,
  emptyTaskCounts,
  emptyResultCounts,
} from "./storage";

interface Stored<T> {
  seq: number;
  row: T;
}

function byCreatedDesc<T extends { createdAt: Date }>(a: Stored<T>, b: Stored<T>): number {
  return b.row.createdAt.getTime() - a.row.createdAt.getTime() || b.seq - a.seq;
}

function byCreatedAsc<T extends { createdAt: Date }>(a: Stored<T>, b: Stored<T>): number {
  return -byCreatedDesc(a, b);
}

function page<T>(rows: T[], limit: number, offset: number): Page<T> {
  return { rows: rows.slice(offset, offset + limit), total: rows.length };
}

/**
 * In-process storage used when no DATABASE_URL is configured and by the test
 * suite. Rows are copied on the way in and out so callers never share state
 * with the store.
 */
export class MemStorage implements IStorage {
  private seq = 0;
  private agents = new Map<string, Stored<Agent>>();
  private scanConfigs = new Map<string, Stored<ScanConfig>>();
  private tasks = new Map<string, Stored<ScanTask>>();
  private results = new Map<string, Stored<AggregatedResult>>();
  private deltaReports = new Map<string, Stored<DeltaReport>>();

  private put<T>(table: Map<string, Stored<T>>, id: string, row: T): T {
    const existing = table.get(id);
    table.set(id, { seq: existing?.seq ?? ++this.seq, row: structuredClone(row) });
    return structuredClone(row);
  }

  private read<T>(table: Map<string, Stored<T>>, id: string): T | undefined {
    const stored = table.get(id);
    return stored ? structuredClone(stored.row) : undefined;
  }

  private select<T extends { createdAt: Date }>(
    table: Map<string, Stored<T>>,
    predicate: (row: T) => boolean,
    order: (a: Stored<T>, b: Stored<T>) => number,
  ): T[] {
    return Array.from(table.values())
      .filter((stored) => predicate(stored.row))
      .sort(order)
      .map((stored) => structuredClone(stored.row));
  }

  // Agent operations
  async getAgent(id: string): Promise<Agent | undefined> {
    return this.read(this.agents, id);
  }

  async getAgents(): Promise<Agent[]> {
    return this.select(this.agents, () => true, (a, b) =>
      a.row.createdAt.getTime() - b.row.createdAt.getTime() || a.row.id.localeCompare(b.row.id));
  }

  async createAgent(data: InsertAgent): Promise<Agent> {
    const now = new Date();
    const agent: Agent = {
      id: data.id,
      hostname: data.hostname ?? null,
      address: data.address,
      port: data.port,
      ownedRange: data.ownedRange ?? "",
      state: data.state ?? "pending_approval",
      lastHeartbeat: data.lastHeartbeat ?? null,
      approvedAt: data.approvedAt ?? null,
      createdAt: data.createdAt ?? now,
      updatedAt: data.updatedAt ?? now,
    };
    return this.put(this.agents, agent.id, agent);
  }

  async updateAgent(id: string, updates: Partial<Agent>): Promise<Agent | undefined> {
    const agent = this.read(this.agents, id);
    if (!agent) return undefined;
    return this.put(this.agents, id, { ...agent, ...updates, id, updatedAt: updates.updatedAt ?? new Date() });
  }

  // Scan configuration operations
  async createScanConfig(data: InsertScanConfig & { nextRunAt?: Date | null }): Promise<ScanConfig> {
    const now = new Date();
    const config: ScanConfig = {
      id: `scan-${randomUUID().slice(0, 8)}`,
      name: data.name,
      description: data.description ?? null,
      target: data.target,
      ports: data.ports ?? "1-1000",
      scanArguments: data.scanArguments ?? "-sV",
      intervalMinutes: data.intervalMinutes ?? 60,
      isActive: data.isActive ?? true,
      isRecurring: data.isRecurring ?? false,
      lastRunAt: null,
      nextRunAt: data.nextRunAt ?? null,
      createdAt: now,
      updatedAt: now,
    };
    return this.put(this.scanConfigs, config.id, config);
  }

  async getScanConfig(id: string): Promise<ScanConfig | undefined> {
    return this.read(this.scanConfigs, id);
  }

  async getScanConfigs(filter: ScanConfigFilter = {}): Promise<ScanConfig[]> {
    return this.select(
      this.scanConfigs,
      (config) =>
        (filter.active === undefined || config.isActive === filter.active) &&
        (filter.recurring === undefined || config.isRecurring === filter.recurring),
      byCreatedDesc,
    );
  }

  async updateScanConfig(id: string, updates: Partial<ScanConfig>): Promise<ScanConfig | undefined> {
    const config = this.read(this.scanConfigs, id);
    if (!config) return undefined;
    return this.put(this.scanConfigs, id, { ...config, ...updates, id, updatedAt: new Date() });
  }

  // Execution operations
  async createExecution(execution: NewExecution): Promise<Execution> {
    const groupId = `grp-${randomUUID().slice(0, 8)}`;
    const resultId = `res-${randomUUID().slice(0, 8)}`;

    const result: AggregatedResult = {
      id: resultId,
      scanConfigId: execution.scanConfigId,
      groupId,
      status: "pending",
      coverage: execution.coverage,
      requestedTargets: execution.requestedTargets,
      unassignedTargets: execution.unassignedTargets,
      hosts: {},
      totalTargets: 0,
      completedTargets: 0,
      failedTargets: 0,
      totalOpenPorts: 0,
      contributingAgents: [],
      startedAt: null,
      finalizedAt: null,
      createdAt: execution.createdAt,
      updatedAt: execution.createdAt,
    };
    this.put(this.results, resultId, result);

    const tasks = execution.assignments.map((assignment) => {
      const id = `task-${randomUUID().slice(0, 8)}`;
      const task: ScanTask = {
        id,
        groupId,
        scanConfigId: execution.scanConfigId,
        resultId,
        agentId: assignment.agentId,
        targets: assignment.targets,
        ports: execution.ports,
        scanArguments: execution.scanArguments,
        status: "pending",
        error: null,
        createdAt: execution.createdAt,
        assignedAt: null,
        completedAt: null,
      };
      return this.put(this.tasks, id, task);
    });

    return { groupId, result, tasks };
  }

  async deleteExecution(groupId: string): Promise<void> {
    for (const [id, stored] of this.tasks) {
      if (stored.row.groupId === groupId) this.tasks.delete(id);
    }
    for (const [id, stored] of this.results) {
      if (stored.row.groupId === groupId) this.results.delete(id);
    }
  }

  // Task operations
  async getTask(id: string): Promise<ScanTask | undefined> {
    return this.read(this.tasks, id);
  }

  async getTasksByGroup(groupId: string): Promise<ScanTask[]> {
    return this.select(this.tasks, (task) => task.groupId === groupId, byCreatedAsc);
  }

  async getTasksByAgent(agentId: string, limit?: number): Promise<ScanTask[]> {
    const tasks = this.select(this.tasks, (task) => task.agentId === agentId, byCreatedDesc);
    return limit === undefined ? tasks : tasks.slice(0, limit);
  }

  async updateTask(id: string, updates: Partial<ScanTask>): Promise<ScanTask | undefined> {
    const task = this.read(this.tasks, id);
    if (!task) return undefined;
    return this.put(this.tasks, id, { ...task, ...updates, id });
  }

  async countAssignedTasks(agentId: string): Promise<number> {
    let total = 0;
    for (const { row } of this.tasks.values()) {
      if (row.agentId === agentId && row.status === "assigned") total++;
    }
    return total;
  }

  async countTasksByStatus(since?: Date): Promise<Record<TaskStatus, number>> {
    const counts = emptyTaskCounts();
    for (const { row } of this.tasks.values()) {
      if (!since || row.createdAt >= since) counts[row.status]++;
    }
    return counts;
  }

  // Aggregated result operations
  async getResult(id: string): Promise<AggregatedResult | undefined> {
    return this.read(this.results, id);
  }

  async updateResult(id: string, updates: Partial<AggregatedResult>): Promise<AggregatedResult | undefined> {
    const result = this.read(this.results, id);
    if (!result) return undefined;
    return this.put(this.results, id, { ...result, ...updates, id });
  }

  async getResultsForScanConfig(scanConfigId: string, query: ResultQuery): Promise<Page<AggregatedResult>> {
    const rows = this.select(
      this.results,
      (result) => result.scanConfigId === scanConfigId && (!query.status || result.status === query.status),
      byCreatedDesc,
    );
    return page(rows, query.limit, query.offset);
  }

  // Strictly earlier: a run created in the same instant is never its sibling's baseline
  async getPreviousTerminalResult(current: AggregatedResult): Promise<AggregatedResult | undefined> {
    const [previous] = this.select(
      this.results,
      (row) =>
        row.scanConfigId === current.scanConfigId &&
        row.id !== current.id &&
        row.finalizedAt !== null &&
        (row.status === "completed" || row.status === "partial") &&
        row.createdAt < current.createdAt,
      byCreatedDesc,
    );
    return previous;
  }

  async countResultsByStatus(since?: Date, scanConfigId?: string): Promise<Record<ResultStatus, number>> {
    const counts = emptyResultCounts();
    for (const { row } of this.results.values()) {
      if (since && row.createdAt < since) continue;
      if (scanConfigId && row.scanConfigId !== scanConfigId) continue;
      counts[row.status]++;
    }
    return counts;
  }

  // Delta report operations
  async createDeltaReport(data: NewDeltaReport): Promise<DeltaReport> {
    const existing = await this.getDeltaReportForPair(data.baselineResultId, data.currentResultId);
    if (existing) return existing;

    const report: DeltaReport = {
      id: `delta-${randomUUID().slice(0, 8)}`,
      scanConfigId: data.scanConfigId,
      baselineResultId: data.baselineResultId,
      currentResultId: data.currentResultId,
      newHostsCount: data.newHostsCount ?? 0,
      removedHostsCount: data.removedHostsCount ?? 0,
      newPortsCount: data.newPortsCount ?? 0,
      closedPortsCount: data.closedPortsCount ?? 0,
      changedServicesCount: data.changedServicesCount ?? 0,
      summary: data.summary,
      payload: data.payload,
      createdAt: data.createdAt ?? new Date(),
    };
    return this.put(this.deltaReports, report.id, report);
  }

  async getDeltaReport(id: string): Promise<DeltaReport | undefined> {
    return this.read(this.deltaReports, id);
  }

  async getDeltaReportForPair(baselineResultId: string, currentResultId: string): Promise<DeltaReport | undefined> {
    const [report] = this.select(
      this.deltaReports,
      (r) => r.baselineResultId === baselineResultId && r.currentResultId === currentResultId,
      byCreatedDesc,
    );
    return report;
  }

  async getDeltaReports(scanConfigId: string, query: DeltaReportQuery): Promise<Page<DeltaReport>> {
    const rows = this.select(
      this.deltaReports,
      (r) =>
        r.scanConfigId === scanConfigId &&
        (!query.onlyChanges ||
          r.newHostsCount + r.removedHostsCount + r.newPortsCount + r.closedPortsCount + r.changedServicesCount > 0) &&
        (!query.from || r.createdAt >= query.from) &&
        (!query.to || r.createdAt <= query.to),
      byCreatedDesc,
    );
    return page(rows, query.limit, query.offset);
  }

  async getLatestDeltaReport(scanConfigId: string): Promise<DeltaReport | undefined> {
    const [report] = this.select(this.deltaReports, (r) => r.scanConfigId === scanConfigId, byCreatedDesc);
    return report;
  }
}
