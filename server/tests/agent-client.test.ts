import { describe, it, expect, afterEach, vi } from "vitest";
import type { WorkOrder } from "@shared/schema";
import { HttpAgentClient, workOrderUrl } from "../services/agents/agent-client";
import { AgentUnreachableError } from "../lib/errors";
import { bringOnline, createTestOrchestrator } from "./helpers";

const order: WorkOrder = {
  scan_id: "scan-1",
  task_id: "task-1",
  result_id: "result-1",
  targets: ["10.0.0.1"],
  ports: "1-1000",
  scan_arguments: "-sV",
};

describe("workOrderUrl", () => {
  it("uses IPv4 addresses and hostnames as they are", () => {
    expect(workOrderUrl({ address: "192.168.50.10", port: 8443 })).toBe("http://192.168.50.10:8443/api/scan");
    expect(workOrderUrl({ address: "scanner-1.lab", port: 9000 })).toBe("http://scanner-1.lab:9000/api/scan");
  });

  it("brackets IPv6 addresses", () => {
    expect(workOrderUrl({ address: "fd00::5", port: 8443 })).toBe("http://[fd00::5]:8443/api/scan");
  });
});

describe("HttpAgentClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts the work order to an IPv6 agent", async () => {
    const { orchestrator } = createTestOrchestrator();
    const agent = await bringOnline(orchestrator, "agent-v6", "10.0.0.0/24", "fd00::5");
    const fetchMock = vi.fn().mockResolvedValue(new Response(null, { status: 202 }));
    vi.stubGlobal("fetch", fetchMock);

    await new HttpAgentClient().sendWorkOrder(agent, order, 1000);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe("http://[fd00::5]:8443/api/scan");
    expect(fetchMock.mock.calls[0][1]).toMatchObject({ method: "POST", body: JSON.stringify(order) });
  });

  it("treats a rejected order as unreachable", async () => {
    const { orchestrator } = createTestOrchestrator();
    const agent = await bringOnline(orchestrator, "agent-1", "10.0.0.0/24");
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response(null, { status: 503 })));

    await expect(new HttpAgentClient().sendWorkOrder(agent, order, 1000)).rejects.toThrow(
      new AgentUnreachableError("agent-1", "HTTP 503"),
    );
  });
});
