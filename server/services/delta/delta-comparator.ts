import type {
  AggregatedResult,
  ChangedServiceEntry,
  DeltaPayload,
  DeltaPortEntry,
  DeltaReport,
  HostMap,
  PortDetail,
  ServiceFields,
} from "@shared/schema";
import type { IStorage } from "../../storage";
import type { Clock } from "../../lib/clock";
import { compareAddresses } from "../../lib/ip-range";

/**
 * Delta Comparator
 *
 * Compares a just-finalized aggregated result with the most recent earlier
 * terminal result of the same scan configuration, producing:
 * - hosts that came up / went away
 * - ports opened / closed (a new host's ports count as opened, a vanished host's as closed)
 * - services whose name, product, version or extra info changed on a port open on both sides
 *
 * Only hosts reported "up" take part. The comparison is not symmetric.
 */

const SERVICE_FIELDS = ["name", "product", "version", "extraInfo"] as const satisfies ReadonlyArray<keyof ServiceFields>;

function liveHosts(hosts: HostMap): Set<string> {
  return new Set(Object.keys(hosts).filter((address) => hosts[address].state === "up"));
}

function detailFor(hosts: HostMap, address: string, port: number): PortDetail | undefined {
  return hosts[address]?.portDetails[String(port)];
}

function portEntry(host: string, port: number, detail: PortDetail | undefined): DeltaPortEntry {
  return {
    host,
    port,
    protocol: detail?.protocol || "tcp",
    service: detail?.name ?? "",
    product: detail?.product ?? "",
    version: detail?.version ?? "",
    extraInfo: detail?.extraInfo ?? "",
  };
}

function serviceFields(detail: PortDetail): ServiceFields {
  return {
    name: detail.name,
    product: detail.product,
    version: detail.version,
    extraInfo: detail.extraInfo,
  };
}

function byHostThenPort(a: { host: string; port: number }, b: { host: string; port: number }): number {
  return compareAddresses(a.host, b.host) || a.port - b.port;
}

/**
 * Pure comparison of two host maps. Identical inputs always give an identical,
 * fully ordered payload.
 */
export function compareResults(baseline: HostMap, current: HostMap): DeltaPayload {
  const baselineHosts = liveHosts(baseline);
  const currentHosts = liveHosts(current);

  const newHosts = Array.from(currentHosts).filter((h) => !baselineHosts.has(h)).sort(compareAddresses);
  const removedHosts = Array.from(baselineHosts).filter((h) => !currentHosts.has(h)).sort(compareAddresses);
  const commonHosts = Array.from(currentHosts).filter((h) => baselineHosts.has(h));

  const newPorts: DeltaPortEntry[] = [];
  const closedPorts: DeltaPortEntry[] = [];
  const changedServices: ChangedServiceEntry[] = [];

  for (const host of newHosts) {
    for (const port of current[host].openPorts) {
      newPorts.push(portEntry(host, port, detailFor(current, host, port)));
    }
  }

  for (const host of removedHosts) {
    for (const port of baseline[host].openPorts) {
      closedPorts.push(portEntry(host, port, detailFor(baseline, host, port)));
    }
  }

  for (const host of commonHosts) {
    const before = new Set(baseline[host].openPorts);
    const after = new Set(current[host].openPorts);

    for (const port of after) {
      if (!before.has(port)) {
        newPorts.push(portEntry(host, port, detailFor(current, host, port)));
        continue;
      }

      const previous = detailFor(baseline, host, port);
      const next = detailFor(current, host, port);
      if (!previous || !next) continue;

      const changedFields = SERVICE_FIELDS.filter((field) => previous[field] !== next[field]);
      if (changedFields.length > 0) {
        changedServices.push({
          host,
          port,
          protocol: next.protocol || previous.protocol || "tcp",
          changedFields,
          before: serviceFields(previous),
          after: serviceFields(next),
        });
      }
    }

    for (const port of before) {
      if (!after.has(port)) {
        closedPorts.push(portEntry(host, port, detailFor(baseline, host, port)));
      }
    }
  }

  return {
    newHosts,
    removedHosts,
    newPorts: newPorts.sort(byHostThenPort),
    closedPorts: closedPorts.sort(byHostThenPort),
    changedServices: changedServices.sort(byHostThenPort),
  };
}

export function hasChanges(payload: DeltaPayload): boolean {
  return payload.newHosts.length > 0 ||
    payload.removedHosts.length > 0 ||
    payload.newPorts.length > 0 ||
    payload.closedPorts.length > 0 ||
    payload.changedServices.length > 0;
}

export function summarizeDelta(payload: DeltaPayload): string {
  if (!hasChanges(payload)) return "No changes since the previous scan.";

  const parts: string[] = [];
  if (payload.newHosts.length > 0) parts.push(`${payload.newHosts.length} new host(s) detected`);
  if (payload.removedHosts.length > 0) parts.push(`${payload.removedHosts.length} host(s) no longer responding`);
  if (payload.newPorts.length > 0) parts.push(`${payload.newPorts.length} port(s) opened`);
  if (payload.closedPorts.length > 0) parts.push(`${payload.closedPorts.length} port(s) closed`);
  if (payload.changedServices.length > 0) parts.push(`${payload.changedServices.length} service(s) changed`);

  return parts.join(". ") + ".";
}

export class DeltaComparator {
  constructor(
    private readonly storage: IStorage,
    private readonly clock: Clock,
  ) {}

  /**
   * Produces the delta report for a finalized result against its baseline.
   * Returns null when the result is not eligible or has no baseline yet.
   * A pair is only ever compared once; later calls return the stored report.
   */
  async generateForResult(current: AggregatedResult): Promise<DeltaReport | null> {
    if (!current.finalizedAt || current.status === "failed" || current.status === "pending") {
      return null;
    }

    const baseline = await this.storage.getPreviousTerminalResult(current);
    if (!baseline) {
      console.log(`[Delta] No baseline for result ${current.id} (scan ${current.scanConfigId}), skipping`);
      return null;
    }

    const existing = await this.storage.getDeltaReportForPair(baseline.id, current.id);
    if (existing) return existing;

    const payload = compareResults(baseline.hosts, current.hosts);
    const report = await this.storage.createDeltaReport({
      scanConfigId: current.scanConfigId,
      baselineResultId: baseline.id,
      currentResultId: current.id,
      newHostsCount: payload.newHosts.length,
      removedHostsCount: payload.removedHosts.length,
      newPortsCount: payload.newPorts.length,
      closedPortsCount: payload.closedPorts.length,
      changedServicesCount: payload.changedServices.length,
      summary: summarizeDelta(payload),
      payload,
      createdAt: this.clock(),
    });

    console.log(`[Delta] ${report.id}: ${baseline.id} -> ${current.id}: ${report.summary}`);
    return report;
  }
}
