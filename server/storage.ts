import {
  type Agent,
  type InsertAgent,
  type ScanConfig,
  type InsertScanConfig,
  type ScanTask,
  type AggregatedResult,
  type DeltaReport,
  type InsertDeltaReport,
  type ResultStatus,
  type ResultCoverage,
  type TaskStatus,
  agents,
  scanConfigs,
  scanTasks,
  aggregatedResults,
  deltaReports,
} from "@shared/schema";
import { randomUUID } from "crypto";
import { eq, ne, desc, asc, and, or, gt, gte, lt, lte, inArray, isNotNull, sql } from "drizzle-orm";
import type { Database } from "./db";

export interface Page<T> {
  rows: T[];
  total: number;
}

export interface ResultQuery {
  status?: ResultStatus;
  limit: number;
  offset: number;
}

export interface DeltaReportQuery {
  onlyChanges?: boolean;
  from?: Date;
  to?: Date;
  limit: number;
  offset: number;
}

export interface ScanConfigFilter {
  active?: boolean;
  recurring?: boolean;
}

export interface NewExecution {
  scanConfigId: string;
  ports: string;
  scanArguments: string;
  requestedTargets: string[];
  unassignedTargets: string[];
  coverage: ResultCoverage;
  assignments: Array<{ agentId: string; targets: string[] }>;
  createdAt: Date;
}

export interface Execution {
  groupId: string;
  result: AggregatedResult;
  tasks: ScanTask[];
}

export type NewDeltaReport = Omit<InsertDeltaReport, "id">;

export interface IStorage {
  // Agent operations
  getAgent(id: string): Promise<Agent | undefined>;
  getAgents(): Promise<Agent[]>; // registration order
  createAgent(data: InsertAgent): Promise<Agent>;
  updateAgent(id: string, updates: Partial<Agent>): Promise<Agent | undefined>;

  // Scan configuration operations
  createScanConfig(data: InsertScanConfig & { nextRunAt?: Date | null }): Promise<ScanConfig>;
  getScanConfig(id: string): Promise<ScanConfig | undefined>;
  getScanConfigs(filter?: ScanConfigFilter): Promise<ScanConfig[]>;
  updateScanConfig(id: string, updates: Partial<ScanConfig>): Promise<ScanConfig | undefined>;

  // Execution operations: a task group and its aggregated result are created and removed together
  createExecution(execution: NewExecution): Promise<Execution>;
  deleteExecution(groupId: string): Promise<void>;

  // Task operations
  getTask(id: string): Promise<ScanTask | undefined>;
  getTasksByGroup(groupId: string): Promise<ScanTask[]>;
  getTasksByAgent(agentId: string, limit?: number): Promise<ScanTask[]>;
  updateTask(id: string, updates: Partial<ScanTask>): Promise<ScanTask | undefined>;
  countAssignedTasks(agentId: string): Promise<number>;
  countTasksByStatus(since?: Date): Promise<Record<TaskStatus, number>>;

  // Aggregated result operations
  getResult(id: string): Promise<AggregatedResult | undefined>;
  updateResult(id: string, updates: Partial<AggregatedResult>): Promise<AggregatedResult | undefined>;
  getResultsForScanConfig(scanConfigId: string, query: ResultQuery): Promise<Page<AggregatedResult>>;
  getPreviousTerminalResult(current: AggregatedResult): Promise<AggregatedResult | undefined>;
  countResultsByStatus(since?: Date, scanConfigId?: string): Promise<Record<ResultStatus, number>>;

  // Delta report operations
  createDeltaReport(data: NewDeltaReport): Promise<DeltaReport>;
  getDeltaReport(id: string): Promise<DeltaReport | undefined>;
  getDeltaReportForPair(baselineResultId: string, currentResultId: string): Promise<DeltaReport | undefined>;
  getDeltaReports(scanConfigId: string, query: DeltaReportQuery): Promise<Page<DeltaReport>>;
  getLatestDeltaReport(scanConfigId: string): Promise<DeltaReport | undefined>;
}

export function emptyTaskCounts(): Record<TaskStatus, number> {
  return { pending: 0, assigned: 0, completed: 0, failed: 0 };
}

export function emptyResultCounts(): Record<ResultStatus, number> {
  return { pending: 0, partial: 0, completed: 0, failed: 0 };
}

export class DatabaseStorage implements IStorage {
  constructor(private readonly db: Database) {}

  // Agent operations
  async getAgent(id: string): Promise<Agent | undefined> {
    const [agent] = await this.db.select().from(agents).where(eq(agents.id, id));
    return agent;
  }

  async getAgents(): Promise<Agent[]> {
    return this.db.select().from(agents).orderBy(asc(agents.createdAt), asc(agents.id));
  }

  async createAgent(data: InsertAgent): Promise<Agent> {
    const [agent] = await this.db.insert(agents).values(data).returning();
    return agent;
  }

  async updateAgent(id: string, updates: Partial<Agent>): Promise<Agent | undefined> {
    const [agent] = await this.db
      .update(agents)
      .set({ ...updates, updatedAt: updates.updatedAt ?? new Date() })
      .where(eq(agents.id, id))
      .returning();
    return agent;
  }

  // Scan configuration operations
  async createScanConfig(data: InsertScanConfig & { nextRunAt?: Date | null }): Promise<ScanConfig> {
    const id = `scan-${randomUUID().slice(0, 8)}`;
    const [config] = await this.db
      .insert(scanConfigs)
      .values({ ...data, id })
      .returning();
    return config;
  }

  async getScanConfig(id: string): Promise<ScanConfig | undefined> {
    const [config] = await this.db.select().from(scanConfigs).where(eq(scanConfigs.id, id));
    return config;
  }

  async getScanConfigs(filter: ScanConfigFilter = {}): Promise<ScanConfig[]> {
    return this.db
      .select()
      .from(scanConfigs)
      .where(and(
        filter.active === undefined ? undefined : eq(scanConfigs.isActive, filter.active),
        filter.recurring === undefined ? undefined : eq(scanConfigs.isRecurring, filter.recurring),
      ))
      .orderBy(desc(scanConfigs.createdAt));
  }

  async updateScanConfig(id: string, updates: Partial<ScanConfig>): Promise<ScanConfig | undefined> {
    const [config] = await this.db
      .update(scanConfigs)
      .set({ ...updates, updatedAt: new Date() })
      .where(eq(scanConfigs.id, id))
      .returning();
    return config;
  }

  // Execution operations
  async createExecution(execution: NewExecution): Promise<Execution> {
    const groupId = `grp-${randomUUID().slice(0, 8)}`;
    const resultId = `res-${randomUUID().slice(0, 8)}`;

    return this.db.transaction(async (tx) => {
      const [result] = await tx
        .insert(aggregatedResults)
        .values({
          id: resultId,
          scanConfigId: execution.scanConfigId,
          groupId,
          status: "pending",
          coverage: execution.coverage,
          requestedTargets: execution.requestedTargets,
          unassignedTargets: execution.unassignedTargets,
          hosts: {},
          contributingAgents: [],
          createdAt: execution.createdAt,
          updatedAt: execution.createdAt,
        })
        .returning();

      const tasks = execution.assignments.length === 0 ? [] : await tx
        .insert(scanTasks)
        .values(execution.assignments.map((assignment) => ({
          id: `task-${randomUUID().slice(0, 8)}`,
          groupId,
          scanConfigId: execution.scanConfigId,
          resultId,
          agentId: assignment.agentId,
          targets: assignment.targets,
          ports: execution.ports,
          scanArguments: execution.scanArguments,
          status: "pending" as const,
          createdAt: execution.createdAt,
        })))
        .returning();

      return { groupId, result, tasks };
    });
  }

  async deleteExecution(groupId: string): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx.delete(scanTasks).where(eq(scanTasks.groupId, groupId));
      await tx.delete(aggregatedResults).where(eq(aggregatedResults.groupId, groupId));
    });
  }

  // Task operations
  async getTask(id: string): Promise<ScanTask | undefined> {
    const [task] = await this.db.select().from(scanTasks).where(eq(scanTasks.id, id));
    return task;
  }

  async getTasksByGroup(groupId: string): Promise<ScanTask[]> {
    return this.db.select().from(scanTasks).where(eq(scanTasks.groupId, groupId)).orderBy(asc(scanTasks.createdAt));
  }

  async getTasksByAgent(agentId: string, limit?: number): Promise<ScanTask[]> {
    const query = this.db
      .select()
      .from(scanTasks)
      .where(eq(scanTasks.agentId, agentId))
      .orderBy(desc(scanTasks.createdAt));
    return limit === undefined ? query : query.limit(limit);
  }

  async updateTask(id: string, updates: Partial<ScanTask>): Promise<ScanTask | undefined> {
    const [task] = await this.db.update(scanTasks).set(updates).where(eq(scanTasks.id, id)).returning();
    return task;
  }

  async countAssignedTasks(agentId: string): Promise<number> {
    const [{ total }] = await this.db
      .select({ total: sql<number>`count(*)` })
      .from(scanTasks)
      .where(and(eq(scanTasks.agentId, agentId), eq(scanTasks.status, "assigned")));
    return Number(total);
  }

  async countTasksByStatus(since?: Date): Promise<Record<TaskStatus, number>> {
    const rows = await this.db
      .select({ status: scanTasks.status, count: sql<number>`count(*)` })
      .from(scanTasks)
      .where(since ? gte(scanTasks.createdAt, since) : undefined)
      .groupBy(scanTasks.status);

    const counts = emptyTaskCounts();
    for (const row of rows) counts[row.status] = Number(row.count);
    return counts;
  }

  // Aggregated result operations
  async getResult(id: string): Promise<AggregatedResult | undefined> {
    const [result] = await this.db.select().from(aggregatedResults).where(eq(aggregatedResults.id, id));
    return result;
  }

  async updateResult(id: string, updates: Partial<AggregatedResult>): Promise<AggregatedResult | undefined> {
    const [result] = await this.db
      .update(aggregatedResults)
      .set(updates)
      .where(eq(aggregatedResults.id, id))
      .returning();
    return result;
  }

  async getResultsForScanConfig(scanConfigId: string, query: ResultQuery): Promise<Page<AggregatedResult>> {
    const where = and(
      eq(aggregatedResults.scanConfigId, scanConfigId),
      query.status ? eq(aggregatedResults.status, query.status) : undefined,
    );

    const [rows, [{ total }]] = await Promise.all([
      this.db
        .select()
        .from(aggregatedResults)
        .where(where)
        .orderBy(desc(aggregatedResults.createdAt))
        .limit(query.limit)
        .offset(query.offset),
      this.db.select({ total: sql<number>`count(*)` }).from(aggregatedResults).where(where),
    ]);

    return { rows, total: Number(total) };
  }

  async getPreviousTerminalResult(current: AggregatedResult): Promise<AggregatedResult | undefined> {
    const [previous] = await this.db
      .select()
      .from(aggregatedResults)
      .where(and(
        eq(aggregatedResults.scanConfigId, current.scanConfigId),
        ne(aggregatedResults.id, current.id),
        isNotNull(aggregatedResults.finalizedAt),
        inArray(aggregatedResults.status, ["completed", "partial"]),
        lt(aggregatedResults.createdAt, current.createdAt),
      ))
      .orderBy(desc(aggregatedResults.createdAt), desc(aggregatedResults.id))
      .limit(1);
    return previous;
  }

  async countResultsByStatus(since?: Date, scanConfigId?: string): Promise<Record<ResultStatus, number>> {
    const rows = await this.db
      .select({ status: aggregatedResults.status, count: sql<number>`count(*)` })
      .from(aggregatedResults)
      .where(and(
        since ? gte(aggregatedResults.createdAt, since) : undefined,
        scanConfigId ? eq(aggregatedResults.scanConfigId, scanConfigId) : undefined,
      ))
      .groupBy(aggregatedResults.status);

    const counts = emptyResultCounts();
    for (const row of rows) counts[row.status] = Number(row.count);
    return counts;
  }

  // Delta report operations
  async createDeltaReport(data: NewDeltaReport): Promise<DeltaReport> {
    const id = `delta-${randomUUID().slice(0, 8)}`;
    const [report] = await this.db
      .insert(deltaReports)
      .values({ ...data, id })
      .onConflictDoNothing({ target: [deltaReports.baselineResultId, deltaReports.currentResultId] })
      .returning();
    if (report) return report;

    // Another writer stored this pair first
    const existing = await this.getDeltaReportForPair(data.baselineResultId, data.currentResultId);
    if (!existing) {
      throw new Error(`Delta report for ${data.baselineResultId} -> ${data.currentResultId} vanished after conflict`);
    }
    return existing;
  }

  async getDeltaReport(id: string): Promise<DeltaReport | undefined> {
    const [report] = await this.db.select().from(deltaReports).where(eq(deltaReports.id, id));
    return report;
  }

  async getDeltaReportForPair(baselineResultId: string, currentResultId: string): Promise<DeltaReport | undefined> {
    const [report] = await this.db
      .select()
      .from(deltaReports)
      .where(and(
        eq(deltaReports.baselineResultId, baselineResultId),
        eq(deltaReports.currentResultId, currentResultId),
      ));
    return report;
  }

  async getDeltaReports(scanConfigId: string, query: DeltaReportQuery): Promise<Page<DeltaReport>> {
    const where = and(
      eq(deltaReports.scanConfigId, scanConfigId),
      query.onlyChanges
        ? or(
            gt(deltaReports.newPortsCount, 0),
            gt(deltaReports.closedPortsCount, 0),
            gt(deltaReports.changedServicesCount, 0),
            gt(deltaReports.newHostsCount, 0),
            gt(deltaReports.removedHostsCount, 0),
          )
        : undefined,
      query.from ? gte(deltaReports.createdAt, query.from) : undefined,
      query.to ? lte(deltaReports.createdAt, query.to) : undefined,
    );

    const [rows, [{ total }]] = await Promise.all([
      this.db
        .select()
        .from(deltaReports)
        .where(where)
        .orderBy(desc(deltaReports.createdAt))
        .limit(query.limit)
        .offset(query.offset),
      this.db.select({ total: sql<number>`count(*)` }).from(deltaReports).where(where),
    ]);

    return { rows, total: Number(total) };
  }

  async getLatestDeltaReport(scanConfigId: string): Promise<DeltaReport | undefined> {
    const [report] = await this.db
      .select()
      .from(deltaReports)
      .where(eq(deltaReports.scanConfigId, scanConfigId))
      .orderBy(desc(deltaReports.createdAt))
      .limit(1);
    return report;
  }
}
