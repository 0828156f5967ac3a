import type { Agent, WorkOrder } from "@shared/schema";
import { AgentUnreachableError } from "../../lib/errors";
import { errorMessage } from "../../lib/log";

/**
 * Outbound channel to scanning agents. Acknowledgement only means the agent
 * accepted the work order.
 */
export interface AgentClient {
  sendWorkOrder(agent: Agent, order: WorkOrder, timeoutMs: number): Promise<void>;
}

// IPv6 literals need brackets in a URL authority
export function workOrderUrl(agent: Pick<Agent, "address" | "port">): string {
  const host = agent.address.includes(":") ? `[${agent.address}]` : agent.address;
  return `http://${host}:${agent.port}/api/scan`;
}

export class HttpAgentClient implements AgentClient {
  async sendWorkOrder(agent: Agent, order: WorkOrder, timeoutMs: number): Promise<void> {
    const url = workOrderUrl(agent);

    let response: Response;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(order),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      throw new AgentUnreachableError(agent.id, errorMessage(error));
    }

    if (!response.ok) {
      throw new AgentUnreachableError(agent.id, `HTTP ${response.status}`);
    }
  }
}
