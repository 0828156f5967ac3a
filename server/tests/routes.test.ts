import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createServer, type Server } from "http";
import { createApp } from "../app";
import { bringOnline, createTestOrchestrator } from "./helpers";

const MINUTE = 60_000;

describe("HTTP API", () => {
  let ctx: ReturnType<typeof createTestOrchestrator>;
  let server: Server;
  let baseUrl: string;

  async function call(method: string, path: string, body?: unknown): Promise<{ status: number; body: unknown }> {
    const res = await fetch(`${baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { "Content-Type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    return { status: res.status, body: await res.json() };
  }

  async function onlyScanId(): Promise<string> {
    const [config] = await ctx.storage.getScanConfigs();
    if (!config) throw new Error("no scan configuration stored");
    return config.id;
  }

  beforeEach(async () => {
    ctx = createTestOrchestrator();
    server = createServer(createApp(ctx.orchestrator, { requestLogging: false }));
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("server has no port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  describe("agent endpoints", () => {
    const heartbeat = { hostname: "scanner-1", address: "192.168.50.10", port: 8443, owned_range: "10.0.0.0/24" };

    it("holds an unapproved agent at pending and admits it once approved", async () => {
      const pending = await call("POST", "/api/agents/agent-1/heartbeat", heartbeat);
      expect(pending).toEqual({
        status: 403,
        body: { approved: false, poll_again: true, message: "Agent is pending approval" },
      });

      const approved = await call("POST", "/api/agents/agent-1/approve");
      expect(approved.status).toBe(200);
      expect(approved.body).toMatchObject({ id: "agent-1", state: "offline", ownedRange: "10.0.0.0/24" });

      const online = await call("POST", "/api/agents/agent-1/heartbeat", heartbeat);
      expect(online).toEqual({ status: 200, body: { approved: true, state: "online" } });
    });

    it("rejects malformed heartbeats", async () => {
      const res = await call("POST", "/api/agents/agent-1/heartbeat", { ...heartbeat, port: 70000 });
      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ error: "Invalid heartbeat payload" });

      const mismatch = await call("POST", "/api/agents/agent-1/heartbeat", { ...heartbeat, agent_id: "agent-2" });
      expect(mismatch).toEqual({ status: 400, body: { error: "agent_id does not match the request path" } });
    });

    it("lists agents and shows one with its recent tasks", async () => {
      await bringOnline(ctx.orchestrator, "agent-1", "10.0.0.0/24");

      const list = await call("GET", "/api/agents");
      expect(list.status).toBe(200);
      expect(list.body).toMatchObject([{ id: "agent-1", state: "online", live: true }]);

      const detail = await call("GET", "/api/agents/agent-1");
      expect(detail.body).toMatchObject({ id: "agent-1", live: true, recentTasks: [] });

      const missing = await call("GET", "/api/agents/agent-9");
      expect(missing).toEqual({ status: 404, body: { error: "Agent agent-9 not found" } });
    });

    it("revokes an agent back to pending approval", async () => {
      await bringOnline(ctx.orchestrator, "agent-1", "10.0.0.0/24");

      const res = await call("POST", "/api/agents/agent-1/revoke");
      expect(res.body).toMatchObject({ id: "agent-1", state: "pending_approval", approvedAt: null });

      const hb = await call("POST", "/api/agents/agent-1/heartbeat", heartbeat);
      expect(hb.status).toBe(403);
    });
  });

  describe("result submission", () => {
    it("validates the payload", async () => {
      const res = await call("POST", "/api/agents/agent-1/results", { result_id: "res-1", status: "done" });
      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ error: "Invalid result submission" });
    });

    it("answers 404 for an unknown result", async () => {
      const res = await call("POST", "/api/agents/agent-1/results", {
        result_id: "res-nope",
        task_id: "task-nope",
        status: "completed",
      });
      expect(res).toEqual({ status: 404, body: { error: "Scan result res-nope not found" } });
    });

    it("refuses a submission whose agent differs from the path", async () => {
      const res = await call("POST", "/api/agents/agent-1/results", {
        result_id: "res-1",
        task_id: "task-1",
        agent_id: "agent-2",
        status: "completed",
      });
      expect(res).toEqual({ status: 400, body: { error: "agent_id does not match the request path" } });
    });

    it("answers 400 for malformed JSON", async () => {
      const res = await fetch(`${baseUrl}/api/agents/agent-1/results`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{\"result_id\":",
      });
      expect(res.status).toBe(400);
    });
  });

  describe("scan configurations", () => {
    it("creates a one-off scan without scheduling it", async () => {
      const res = await call("POST", "/api/scans", { name: "lab", target: "10.0.0.0/31", ports: "22,80,443" });

      expect(res.status).toBe(201);
      expect(res.body).toMatchObject({
        name: "lab",
        target: "10.0.0.0/31",
        ports: "22,80,443",
        scanArguments: "-sV",
        isActive: true,
        isRecurring: false,
        nextRunAt: null,
      });
      expect(ctx.orchestrator.scheduler.getJobs()).toEqual([]);
    });

    it("schedules a recurring scan on creation", async () => {
      const res = await call("POST", "/api/scans", {
        name: "hourly",
        target: "10.0.0.1",
        isRecurring: true,
        intervalMinutes: 15,
      });

      const nextRunAt = new Date(ctx.clock.now().getTime() + 15 * MINUTE);
      expect(res.body).toMatchObject({ isRecurring: true, nextRunAt: nextRunAt.toISOString() });
      expect(ctx.orchestrator.scheduler.getJob(await onlyScanId())?.nextRunAt).toEqual(nextRunAt);
    });

    it("rejects invalid bodies and unresolvable targets", async () => {
      const missingName = await call("POST", "/api/scans", { target: "10.0.0.1" });
      expect(missingName.status).toBe(400);
      expect(missingName.body).toMatchObject({ error: "Invalid request body" });

      const tooWide = await call("POST", "/api/scans", { name: "everything", target: "10.0.0.0/8" });
      expect(tooWide.status).toBe(400);
      expect(tooWide.body).toMatchObject({ error: expect.stringContaining("Invalid target specification") });
      expect(await ctx.storage.getScanConfigs()).toEqual([]);
    });

    it("updates, deactivates and toggles a scan", async () => {
      await call("POST", "/api/scans", { name: "lab", target: "10.0.0.1", isRecurring: true, intervalMinutes: 30 });
      const id = await onlyScanId();

      const invalid = await call("PUT", `/api/scans/${id}`, { intervalMinutes: 0 });
      expect(invalid.status).toBe(400);

      const renamed = await call("PUT", `/api/scans/${id}`, { name: "lab renamed" });
      expect(renamed.body).toMatchObject({ id, name: "lab renamed", intervalMinutes: 30 });

      const deleted = await call("DELETE", `/api/scans/${id}`);
      expect(deleted.body).toMatchObject({ id, isActive: false, nextRunAt: null });
      expect(ctx.orchestrator.scheduler.getJob(id)).toBeUndefined();

      const toggled = await call("POST", `/api/scans/${id}/toggle`);
      expect(toggled.body).toMatchObject({ id, isActive: true });
      expect(ctx.orchestrator.scheduler.getJob(id)).toBeDefined();

      const missing = await call("PUT", "/api/scans/scan-missing", { name: "x" });
      expect(missing).toEqual({ status: 404, body: { error: "Scan configuration scan-missing not found" } });
    });

    it("changes the recurrence of a scan", async () => {
      await call("POST", "/api/scans", { name: "lab", target: "10.0.0.1" });
      const id = await onlyScanId();

      const res = await call("POST", `/api/scans/${id}/schedule`, { is_recurring: true, interval_minutes: 45 });

      const nextRunAt = new Date(ctx.clock.now().getTime() + 45 * MINUTE);
      expect(res.body).toMatchObject({ isRecurring: true, intervalMinutes: 45, nextRunAt: nextRunAt.toISOString() });

      const bad = await call("POST", `/api/scans/${id}/schedule`, { interval_minutes: -5 });
      expect(bad.status).toBe(400);
    });

    it("answers 409 when a manual run finds no agents", async () => {
      await call("POST", "/api/scans", { name: "lab", target: "10.0.0.1" });
      const id = await onlyScanId();

      const res = await call("POST", `/api/scans/${id}/execute`);
      expect(res.status).toBe(409);
      expect(res.body).toMatchObject({ ok: false, reason: "no_eligible_agents" });

      const missing = await call("POST", "/api/scans/scan-missing/execute");
      expect(missing.status).toBe(404);
    });
  });

  describe("scan lifecycle", () => {
    it("executes, aggregates and compares two runs end to end", async () => {
      await bringOnline(ctx.orchestrator, "agent-1", "10.0.0.0/24");
      await call("POST", "/api/scans", { name: "lab", target: "10.0.0.0/31", ports: "22,80,443" });
      const id = await onlyScanId();

      const first = await call("POST", `/api/scans/${id}/execute`);
      expect(first.status).toBe(202);
      expect(first.body).toMatchObject({ ok: true, dispatchedTasks: 1, coverage: "full" });

      const order1 = ctx.client.orders[0].order;
      const summary = await call("POST", "/api/agents/agent-1/results", {
        result_id: order1.result_id,
        task_id: order1.task_id,
        status: "completed",
        parsed_results: {
          "10.0.0.0": {
            state: "up",
            open_ports: [22],
            port_details: { "22": { name: "ssh", product: "OpenSSH", version: "9.6p1" } },
          },
          "10.0.0.1": { state: "down", open_ports: [] },
        },
      });
      expect(summary).toEqual({
        status: 200,
        body: {
          resultId: order1.result_id,
          taskId: order1.task_id,
          status: "completed",
          totalTargets: 2,
          completedTargets: 2,
          failedTargets: 0,
          totalOpenPorts: 1,
          contributingAgents: ["agent-1"],
          finalized: true,
        },
      });

      const late = await call("POST", "/api/agents/agent-1/results", {
        result_id: order1.result_id,
        task_id: order1.task_id,
        status: "completed",
      });
      expect(late.status).toBe(409);

      ctx.clock.advance(MINUTE);
      const second = await call("POST", `/api/scans/${id}/execute`);
      expect(second.status).toBe(202);

      const order2 = ctx.client.orders[1].order;
      await call("POST", "/api/agents/agent-1/results", {
        result_id: order2.result_id,
        task_id: order2.task_id,
        status: "completed",
        parsed_results: {
          "10.0.0.0": { state: "up", open_ports: [22, 443] },
          "10.0.0.1": { state: "up", open_ports: [80] },
        },
      });

      const results = await call("GET", `/api/scans/${id}/results?limit=1`);
      expect(results.body).toMatchObject({ results: [{ id: order2.result_id, status: "completed" }], total: 2, limit: 1, offset: 0 });

      const deltas = await call("GET", `/api/scans/${id}/deltas`);
      expect(deltas.body).toMatchObject({
        reports: [{ baselineResultId: order1.result_id, currentResultId: order2.result_id }],
        total: 1,
        page: 1,
        per_page: 20,
      });

      const latest = await ctx.storage.getLatestDeltaReport(id);
      if (!latest) throw new Error("no delta report stored");
      const report = await call("GET", `/api/deltas/${latest.id}`);
      expect(report.body).toMatchObject({
        id: latest.id,
        newHostsCount: 1,
        newPortsCount: 2,
        closedPortsCount: 0,
        summary: "1 new host(s) detected. 2 port(s) opened.",
        payload: { newHosts: ["10.0.0.1"] },
      });

      const detail = await call("GET", `/api/scans/${id}`);
      expect(detail.body).toMatchObject({
        id,
        resultCount: 2,
        resultsByStatus: { pending: 0, partial: 0, completed: 2, failed: 0 },
        successRate: 100,
        latestDelta: { id: latest.id },
      });
    });

    it("answers 404 for an unknown delta report", async () => {
      const res = await call("GET", "/api/deltas/delta-missing");
      expect(res).toEqual({ status: 404, body: { error: "Delta report delta-missing not found" } });
    });

    it("validates delta queries", async () => {
      await call("POST", "/api/scans", { name: "lab", target: "10.0.0.1" });
      const id = await onlyScanId();

      const res = await call("GET", `/api/scans/${id}/deltas?per_page=500`);
      expect(res.status).toBe(400);
    });
  });

  describe("health and stats", () => {
    it("reports fleet health", async () => {
      await bringOnline(ctx.orchestrator, "agent-1", "10.0.0.0/24");

      const res = await call("GET", "/api/health");
      expect(res).toEqual({
        status: 200,
        body: {
          status: "ok",
          timestamp: ctx.clock.now().toISOString(),
          agents: { total: 1, live: 1 },
          tasks: { pending: 0, assigned: 0 },
          scheduledJobs: 0,
        },
      });
    });

    it("counts agents by state over a window", async () => {
      await bringOnline(ctx.orchestrator, "agent-1", "10.0.0.0/24");
      await ctx.orchestrator.registry.registerOrUpdate({
        agentId: "agent-2",
        address: "192.168.50.12",
        port: 8443,
        ownedRange: "10.0.1.0/24",
      });

      const res = await call("GET", "/api/stats?hours=6");
      expect(res.body).toMatchObject({
        windowHours: 6,
        agents: { pending_approval: 1, offline: 0, online: 1, scanning: 0 },
        tasks: { pending: 0, assigned: 0, completed: 0, failed: 0 },
        results: { pending: 0, partial: 0, completed: 0, failed: 0 },
      });

      const bad = await call("GET", "/api/stats?hours=abc");
      expect(bad.status).toBe(400);
    });
  });
});
