import type { Express, Response } from "express";
import { z } from "zod";
import {
  type ScanConfig,
  agentHeartbeatSchema,
  agentStates,
  insertScanConfigSchema,
  resultStatuses,
  resultSubmissionSchema,
  updateScanConfigSchema,
} from "@shared/schema";
import type { ScanOrchestrator } from "./services/orchestrator";
import { isLive } from "./services/agents/agent-registry";
import { ScanFleetError, UnknownDeltaReportError, UnknownScanConfigError } from "./lib/errors";
import { resolveTargets } from "./lib/ip-range";

const RECENT_TASKS_LIMIT = 10;

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .optional()
  .transform((value) => value === "true" || value === "1");

const resultQuerySchema = z.object({
  status: z.enum(resultStatuses).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

const deltaQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  per_page: z.coerce.number().int().min(1).max(100).default(20),
  only_changes: booleanFlag,
  from: z.coerce.date().optional(),
  to: z.coerce.date().optional(),
});

const scheduleSchema = z.object({
  is_recurring: z.boolean().optional(),
  interval_minutes: z.number().int().min(1).max(7 * 24 * 60).optional(),
});

const statsQuerySchema = z.object({
  hours: z.coerce.number().int().min(1).max(24 * 365).default(24),
});

function handleRouteError(res: Response, error: unknown, fallback: string) {
  if (error instanceof ScanFleetError) {
    return res.status(error.status).json({ error: error.message });
  }
  console.error(`${fallback}:`, error);
  return res.status(500).json({ error: fallback });
}

export function registerRoutes(app: Express, orchestrator: ScanOrchestrator): void {
  const { storage, registry, aggregator, scheduler } = orchestrator;

  // Persists the scheduler's view of the next run after a schedule-relevant change
  async function syncSchedule(config: ScanConfig): Promise<ScanConfig> {
    const job = scheduler.sync(config);
    const nextRunAt = job?.nextRunAt ?? null;
    if (nextRunAt?.getTime() === config.nextRunAt?.getTime()) return config;
    return (await storage.updateScanConfig(config.id, { nextRunAt })) ?? config;
  }

  // ========== AGENT-FACING ENDPOINTS ==========

  // Registration doubles as heartbeat
  app.post("/api/agents/:agentId/heartbeat", async (req, res) => {
    try {
      const parsed = agentHeartbeatSchema.safeParse({ agent_id: req.params.agentId, ...req.body });
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid heartbeat payload", details: parsed.error.errors });
      }
      if (parsed.data.agent_id !== req.params.agentId) {
        return res.status(400).json({ error: "agent_id does not match the request path" });
      }

      const outcome = await registry.recordHeartbeat({
        agentId: parsed.data.agent_id,
        hostname: parsed.data.hostname,
        address: parsed.data.address,
        port: parsed.data.port,
        ownedRange: parsed.data.owned_range,
      });

      if (!outcome.approved) {
        return res.status(403).json({
          approved: false,
          poll_again: true,
          message: "Agent is pending approval",
        });
      }
      res.json({ approved: true, state: outcome.agent.state });
    } catch (error) {
      handleRouteError(res, error, "Failed to process heartbeat");
    }
  });

  app.post("/api/agents/:agentId/results", async (req, res) => {
    try {
      const parsed = resultSubmissionSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid result submission", details: parsed.error.errors });
      }
      const agentId = parsed.data.agent_id ?? req.params.agentId;
      if (agentId !== req.params.agentId) {
        return res.status(400).json({ error: "agent_id does not match the request path" });
      }

      const summary = await aggregator.submit({
        resultId: parsed.data.result_id,
        taskId: parsed.data.task_id,
        agentId,
        status: parsed.data.status,
        hosts: parsed.data.parsed_results,
        error: parsed.data.error,
      });
      res.json(summary);
    } catch (error) {
      handleRouteError(res, error, "Failed to process result submission");
    }
  });

  // ========== AGENT ADMINISTRATION ==========

  app.get("/api/agents", async (_req, res) => {
    try {
      const agents = await registry.listAgents();
      res.json(agents.map((agent) => ({ ...agent, live: isLive(agent) })));
    } catch (error) {
      handleRouteError(res, error, "Failed to fetch agents");
    }
  });

  app.get("/api/agents/:agentId", async (req, res) => {
    try {
      const agent = await registry.getAgent(req.params.agentId);
      const recentTasks = await storage.getTasksByAgent(agent.id, RECENT_TASKS_LIMIT);
      res.json({ ...agent, live: isLive(agent), recentTasks });
    } catch (error) {
      handleRouteError(res, error, "Failed to fetch agent");
    }
  });

  app.post("/api/agents/:agentId/approve", async (req, res) => {
    try {
      res.json(await registry.approve(req.params.agentId));
    } catch (error) {
      handleRouteError(res, error, "Failed to approve agent");
    }
  });

  app.post("/api/agents/:agentId/revoke", async (req, res) => {
    try {
      res.json(await registry.revoke(req.params.agentId));
    } catch (error) {
      handleRouteError(res, error, "Failed to revoke agent");
    }
  });

  // ========== SCAN CONFIGURATION ENDPOINTS ==========

  app.get("/api/scans", async (_req, res) => {
    try {
      res.json(await storage.getScanConfigs());
    } catch (error) {
      handleRouteError(res, error, "Failed to fetch scans");
    }
  });

  app.post("/api/scans", async (req, res) => {
    try {
      const parsed = insertScanConfigSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid request body", details: parsed.error.errors });
      }
      resolveTargets(parsed.data.target);

      const config = await storage.createScanConfig(parsed.data);
      console.log(`[Scans] Created scan ${config.id} (${config.name}) for ${config.target}`);
      res.status(201).json(await syncSchedule(config));
    } catch (error) {
      handleRouteError(res, error, "Failed to create scan");
    }
  });

  app.get("/api/scans/:id", async (req, res) => {
    try {
      const config = await orchestrator.getScanConfig(req.params.id);
      const [counts, latestDelta] = await Promise.all([
        storage.countResultsByStatus(undefined, config.id),
        storage.getLatestDeltaReport(config.id),
      ]);
      const resultCount = Object.values(counts).reduce((sum, n) => sum + n, 0);
      const successRate = resultCount === 0 ? 0 : Math.round((counts.completed / resultCount) * 1000) / 10;

      res.json({
        ...config,
        resultCount,
        resultsByStatus: counts,
        successRate,
        latestDelta: latestDelta ?? null,
      });
    } catch (error) {
      handleRouteError(res, error, "Failed to fetch scan");
    }
  });

  app.put("/api/scans/:id", async (req, res) => {
    try {
      const parsed = updateScanConfigSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid request body", details: parsed.error.errors });
      }
      if (parsed.data.target !== undefined) resolveTargets(parsed.data.target);

      const updated = await storage.updateScanConfig(req.params.id, parsed.data);
      if (!updated) throw new UnknownScanConfigError(req.params.id);
      res.json(await syncSchedule(updated));
    } catch (error) {
      handleRouteError(res, error, "Failed to update scan");
    }
  });

  // Deactivates; history is kept
  app.delete("/api/scans/:id", async (req, res) => {
    try {
      const updated = await storage.updateScanConfig(req.params.id, { isActive: false });
      if (!updated) throw new UnknownScanConfigError(req.params.id);
      res.json(await syncSchedule(updated));
    } catch (error) {
      handleRouteError(res, error, "Failed to delete scan");
    }
  });

  app.post("/api/scans/:id/toggle", async (req, res) => {
    try {
      const config = await orchestrator.getScanConfig(req.params.id);
      const updated = await storage.updateScanConfig(config.id, { isActive: !config.isActive });
      if (!updated) throw new UnknownScanConfigError(config.id);
      res.json(await syncSchedule(updated));
    } catch (error) {
      handleRouteError(res, error, "Failed to toggle scan");
    }
  });

  app.post("/api/scans/:id/schedule", async (req, res) => {
    try {
      const parsed = scheduleSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid schedule", details: parsed.error.errors });
      }

      const config = await orchestrator.getScanConfig(req.params.id);
      const updated = await storage.updateScanConfig(config.id, {
        isRecurring: parsed.data.is_recurring ?? config.isRecurring,
        intervalMinutes: parsed.data.interval_minutes ?? config.intervalMinutes,
      });
      if (!updated) throw new UnknownScanConfigError(config.id);
      res.json(await syncSchedule(updated));
    } catch (error) {
      handleRouteError(res, error, "Failed to schedule scan");
    }
  });

  app.post("/api/scans/:id/execute", async (req, res) => {
    try {
      const outcome = await orchestrator.executeNow(req.params.id);
      res.status(outcome.ok ? 202 : 409).json(outcome);
    } catch (error) {
      handleRouteError(res, error, "Failed to execute scan");
    }
  });

  app.get("/api/scans/:id/results", async (req, res) => {
    try {
      const parsed = resultQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid query", details: parsed.error.errors });
      }

      const config = await orchestrator.getScanConfig(req.params.id);
      const page = await storage.getResultsForScanConfig(config.id, parsed.data);
      res.json({ results: page.rows, total: page.total, limit: parsed.data.limit, offset: parsed.data.offset });
    } catch (error) {
      handleRouteError(res, error, "Failed to fetch scan results");
    }
  });

  app.get("/api/scans/:id/deltas", async (req, res) => {
    try {
      const parsed = deltaQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid query", details: parsed.error.errors });
      }

      const { page, per_page, only_changes, from, to } = parsed.data;
      const config = await orchestrator.getScanConfig(req.params.id);
      const reports = await storage.getDeltaReports(config.id, {
        onlyChanges: only_changes,
        from,
        to,
        limit: per_page,
        offset: (page - 1) * per_page,
      });
      res.json({ reports: reports.rows, total: reports.total, page, per_page });
    } catch (error) {
      handleRouteError(res, error, "Failed to fetch delta reports");
    }
  });

  app.get("/api/deltas/:reportId", async (req, res) => {
    try {
      const report = await storage.getDeltaReport(req.params.reportId);
      if (!report) throw new UnknownDeltaReportError(req.params.reportId);
      res.json(report);
    } catch (error) {
      handleRouteError(res, error, "Failed to fetch delta report");
    }
  });

  // ========== HEALTH & STATS ==========

  app.get("/api/health", async (_req, res) => {
    try {
      const [agents, tasks] = await Promise.all([registry.listAgents(), storage.countTasksByStatus()]);
      res.json({
        status: "ok",
        timestamp: orchestrator.clock().toISOString(),
        agents: { total: agents.length, live: agents.filter(isLive).length },
        tasks: { pending: tasks.pending, assigned: tasks.assigned },
        scheduledJobs: scheduler.getJobs().length,
      });
    } catch (error) {
      handleRouteError(res, error, "Health check failed");
    }
  });

  app.get("/api/stats", async (req, res) => {
    try {
      const parsed = statsQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ error: "Invalid query", details: parsed.error.errors });
      }

      const since = new Date(orchestrator.clock().getTime() - parsed.data.hours * 60 * 60 * 1000);
      const [agents, tasks, results] = await Promise.all([
        registry.listAgents(),
        storage.countTasksByStatus(since),
        storage.countResultsByStatus(since),
      ]);

      const agentsByState = Object.fromEntries(agentStates.map((state) => [state, 0]));
      for (const agent of agents) agentsByState[agent.state]++;

      res.json({
        windowHours: parsed.data.hours,
        since: since.toISOString(),
        agents: agentsByState,
        tasks,
        results,
      });
    } catch (error) {
      handleRouteError(res, error, "Failed to fetch stats");
    }
  });
}
