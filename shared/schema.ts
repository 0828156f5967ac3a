import { pgTable, text, varchar, boolean, integer, timestamp, jsonb, uniqueIndex } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// ========== STATUS VARIANTS & TRANSITIONS ==========

/**
 * Agent lifecycle. `pending_approval` is the only unapproved state; every other
 * state implies an operator approved the agent.
 */
export const agentStates = ["pending_approval", "offline", "online", "scanning"] as const;
export type AgentState = typeof agentStates[number];

// Self-transitions are always permitted and treated as no-ops
export const agentTransitions = {
  pending_approval: ["offline"],
  offline: ["online", "pending_approval"],
  online: ["scanning", "offline", "pending_approval"],
  scanning: ["online", "offline", "pending_approval"],
} as const satisfies Record<AgentState, readonly AgentState[]>;

export const liveAgentStates = ["online", "scanning"] as const satisfies readonly AgentState[];

export const taskStatuses = ["pending", "assigned", "completed", "failed"] as const;
export type TaskStatus = typeof taskStatuses[number];

export const taskTransitions = {
  pending: ["assigned", "completed", "failed"],
  assigned: ["completed", "failed"],
  completed: [],
  failed: [],
} as const satisfies Record<TaskStatus, readonly TaskStatus[]>;

export const terminalTaskStatuses = ["completed", "failed"] as const satisfies readonly TaskStatus[];

export const resultStatuses = ["pending", "partial", "completed", "failed"] as const;
export type ResultStatus = typeof resultStatuses[number];

export const resultTransitions = {
  pending: ["partial", "completed", "failed"],
  partial: [],
  completed: [],
  failed: [],
} as const satisfies Record<ResultStatus, readonly ResultStatus[]>;

export const resultCoverages = ["full", "partial"] as const;
export type ResultCoverage = typeof resultCoverages[number];

export const hostStates = ["up", "down", "error", "unknown"] as const;
export type HostState = typeof hostStates[number];

export function isAllowedTransition<S extends string>(
  table: Record<S, readonly S[]>,
  from: S,
  to: S
): boolean {
  return from === to || table[from].includes(to);
}

// ========== SCAN DATA ==========

export interface PortDetail {
  protocol: string;
  name: string;
  product: string;
  version: string;
  extraInfo: string;
}

export interface HostResult {
  hostname: string;
  state: HostState;
  openPorts: number[];
  portDetails: Record<string, PortDetail>;
}

export type HostMap = Record<string, HostResult>;

// Delta payload
export interface DeltaPortEntry {
  host: string;
  port: number;
  protocol: string;
  service: string;
  product: string;
  version: string;
  extraInfo: string;
}

export type ServiceFields = Pick<PortDetail, "name" | "product" | "version" | "extraInfo">;

export interface ChangedServiceEntry {
  host: string;
  port: number;
  protocol: string;
  changedFields: Array<keyof ServiceFields>;
  before: ServiceFields;
  after: ServiceFields;
}

export interface DeltaPayload {
  newHosts: string[];
  removedHosts: string[];
  newPorts: DeltaPortEntry[];
  closedPorts: DeltaPortEntry[];
  changedServices: ChangedServiceEntry[];
}

// ========== TABLES ==========

// Scanning agents - identity is the hardware address the agent reports
export const agents = pgTable("agents", {
  id: varchar("id").primaryKey(),
  hostname: varchar("hostname"),
  address: varchar("address").notNull(),
  port: integer("port").notNull(),
  ownedRange: text("owned_range").notNull().default(""),
  state: varchar("state").$type<AgentState>().notNull().default("pending_approval"),
  lastHeartbeat: timestamp("last_heartbeat"),
  approvedAt: timestamp("approved_at"),
  createdAt: timestamp("created_at").notNull().defaultNow(),
  updatedAt: timestamp("updated_at").notNull().defaultNow(),
});

export type Agent = typeof agents.$inferSelect;
export type InsertAgent = typeof agents.$inferInsert;

export const scanConfigs = pgTable("scan_configs", {
  id: varchar("id").primaryKey(),
  name: text("name").notNull(),
  description: text("description"),
  target: text("target").notNull(), // CIDR, address, dash range or comma list
  ports: varchar("ports").notNull().default("1-1000"),
  scanArguments: varchar("scan_arguments").notNull().default("-sV"),
  intervalMinutes: integer("interval_minutes").notNull().default(60),
  isActive: boolean("is_active").notNull().default(true),
  isRecurring: boolean("is_recurring").notNull().default(false),
  lastRunAt: timestamp("last_run_at"),
  nextRunAt: timestamp("next_run_at"),
  createdAt: timestamp("created_at").notNull().defaultNow(),
  updatedAt: timestamp("updated_at").notNull().defaultNow(),
});

export const insertScanConfigSchema = createInsertSchema(scanConfigs, {
  name: z.string().min(1).max(128),
  target: z.string().min(1).max(1024),
  ports: z.string().min(1).max(255),
  scanArguments: z.string().max(255),
  intervalMinutes: z.number().int().min(1).max(7 * 24 * 60),
}).omit({
  id: true,
  lastRunAt: true,
  nextRunAt: true,
  createdAt: true,
  updatedAt: true,
});

export const updateScanConfigSchema = insertScanConfigSchema.partial();

export type InsertScanConfig = z.infer<typeof insertScanConfigSchema>;
export type UpdateScanConfig = z.infer<typeof updateScanConfigSchema>;
export type ScanConfig = typeof scanConfigs.$inferSelect;

// One task per agent per execution; siblings share groupId
export const scanTasks = pgTable("scan_tasks", {
  id: varchar("id").primaryKey(),
  groupId: varchar("group_id").notNull(),
  scanConfigId: varchar("scan_config_id").notNull(),
  resultId: varchar("result_id").notNull(),
  agentId: varchar("agent_id").notNull(),
  targets: jsonb("targets").$type<string[]>().notNull(),
  ports: varchar("ports").notNull(),
  scanArguments: varchar("scan_arguments").notNull(),
  status: varchar("status").$type<TaskStatus>().notNull().default("pending"),
  error: text("error"),
  createdAt: timestamp("created_at").notNull().defaultNow(),
  assignedAt: timestamp("assigned_at"),
  completedAt: timestamp("completed_at"),
});

export type ScanTask = typeof scanTasks.$inferSelect;
export type InsertScanTask = typeof scanTasks.$inferInsert;

export const aggregatedResults = pgTable("aggregated_results", {
  id: varchar("id").primaryKey(),
  scanConfigId: varchar("scan_config_id").notNull(),
  groupId: varchar("group_id").notNull().unique(),
  status: varchar("status").$type<ResultStatus>().notNull().default("pending"),
  coverage: varchar("coverage").$type<ResultCoverage>().notNull().default("full"),
  requestedTargets: jsonb("requested_targets").$type<string[]>().notNull(),
  unassignedTargets: jsonb("unassigned_targets").$type<string[]>().notNull(),
  hosts: jsonb("hosts").$type<HostMap>().notNull(),
  totalTargets: integer("total_targets").notNull().default(0),
  completedTargets: integer("completed_targets").notNull().default(0),
  failedTargets: integer("failed_targets").notNull().default(0),
  totalOpenPorts: integer("total_open_ports").notNull().default(0),
  contributingAgents: jsonb("contributing_agents").$type<string[]>().notNull(),
  startedAt: timestamp("started_at"),
  finalizedAt: timestamp("finalized_at"), // set once, when the status becomes terminal
  createdAt: timestamp("created_at").notNull().defaultNow(),
  updatedAt: timestamp("updated_at").notNull().defaultNow(),
});

export type AggregatedResult = typeof aggregatedResults.$inferSelect;
export type InsertAggregatedResult = typeof aggregatedResults.$inferInsert;

export const deltaReports = pgTable("delta_reports", {
  id: varchar("id").primaryKey(),
  scanConfigId: varchar("scan_config_id").notNull(),
  baselineResultId: varchar("baseline_result_id").notNull(),
  currentResultId: varchar("current_result_id").notNull(),
  newHostsCount: integer("new_hosts_count").notNull().default(0),
  removedHostsCount: integer("removed_hosts_count").notNull().default(0),
  newPortsCount: integer("new_ports_count").notNull().default(0),
  closedPortsCount: integer("closed_ports_count").notNull().default(0),
  changedServicesCount: integer("changed_services_count").notNull().default(0),
  summary: text("summary").notNull(),
  payload: jsonb("payload").$type<DeltaPayload>().notNull(),
  createdAt: timestamp("created_at").notNull().defaultNow(),
}, (table) => ({
  pairIdx: uniqueIndex("delta_reports_pair_idx").on(table.baselineResultId, table.currentResultId),
}));

export type DeltaReport = typeof deltaReports.$inferSelect;
export type InsertDeltaReport = typeof deltaReports.$inferInsert;

// ========== WIRE PAYLOADS ==========

// Agent -> orchestrator registration / heartbeat
export const agentHeartbeatSchema = z.object({
  agent_id: z.string().min(1).max(64),
  hostname: z.string().max(255).default(""),
  address: z.string().min(1).max(45),
  port: z.coerce.number().int().min(1).max(65535),
  owned_range: z.string().max(1024).default(""),
});

export type AgentHeartbeatPayload = z.infer<typeof agentHeartbeatSchema>;

const portDetailSchema = z.object({
  protocol: z.string().default("tcp"),
  name: z.string().default(""),
  product: z.string().default(""),
  version: z.string().default(""),
  extrainfo: z.string().default(""),
}).transform((detail): PortDetail => ({
  protocol: detail.protocol,
  name: detail.name,
  product: detail.product,
  version: detail.version,
  extraInfo: detail.extrainfo,
}));

const hostObservationSchema = z.object({
  hostname: z.string().optional(),
  state: z.enum(hostStates).optional(),
  open_ports: z.array(z.coerce.number().int().min(0).max(65535)).default([]),
  port_details: z.record(z.string(), portDetailSchema).default({}),
}).transform((host): {
  hostname?: string;
  state?: HostState;
  openPorts: number[];
  portDetails: Record<string, PortDetail>;
} => ({
  hostname: host.hostname,
  state: host.state,
  openPorts: host.open_ports,
  portDetails: host.port_details,
}));

export type HostObservation = z.output<typeof hostObservationSchema>;

// Agent -> orchestrator result submission
export const resultSubmissionSchema = z.object({
  result_id: z.string().min(1),
  task_id: z.string().min(1),
  agent_id: z.string().min(1).optional(),
  status: z.enum(["completed", "failed"]),
  parsed_results: z.record(z.string(), hostObservationSchema).default({}),
  summary_stats: z.record(z.string(), z.unknown()).optional(),
  error: z.string().optional(),
});

export type ResultSubmissionPayload = z.infer<typeof resultSubmissionSchema>;

export interface ResultSubmission {
  resultId: string;
  taskId: string;
  agentId: string;
  status: "completed" | "failed";
  hosts: Record<string, HostObservation>;
  error?: string;
}

// Orchestrator -> agent work order
export interface WorkOrder {
  scan_id: string;
  task_id: string;
  result_id: string;
  targets: string[];
  ports: string;
  scan_arguments: string;
}
