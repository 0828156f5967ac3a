import { sql } from "drizzle-orm";
import type { Database } from "./db";

export async function createDatabaseIndexes(db: Database): Promise<void> {
  console.log("Creating database indexes for optimal query performance...");

  const indexes = [
    {
      name: "idx_agents_state",
      query: sql`CREATE INDEX IF NOT EXISTS idx_agents_state ON agents (state)`,
    },
    {
      name: "idx_agents_last_heartbeat",
      query: sql`CREATE INDEX IF NOT EXISTS idx_agents_last_heartbeat ON agents (last_heartbeat DESC)`,
    },
    {
      name: "idx_agents_registration_order",
      query: sql`CREATE INDEX IF NOT EXISTS idx_agents_registration_order ON agents (created_at, id)`,
    },
    {
      name: "idx_scan_configs_active_recurring",
      query: sql`CREATE INDEX IF NOT EXISTS idx_scan_configs_active_recurring ON scan_configs (is_active, is_recurring)`,
    },
    {
      name: "idx_scan_tasks_group",
      query: sql`CREATE INDEX IF NOT EXISTS idx_scan_tasks_group ON scan_tasks (group_id)`,
    },
    {
      name: "idx_scan_tasks_agent_status",
      query: sql`CREATE INDEX IF NOT EXISTS idx_scan_tasks_agent_status ON scan_tasks (agent_id, status)`,
    },
    {
      name: "idx_scan_tasks_created",
      query: sql`CREATE INDEX IF NOT EXISTS idx_scan_tasks_created ON scan_tasks (created_at DESC)`,
    },
    {
      name: "idx_aggregated_results_config_created",
      query: sql`CREATE INDEX IF NOT EXISTS idx_aggregated_results_config_created ON aggregated_results (scan_config_id, created_at DESC)`,
    },
    {
      name: "idx_aggregated_results_status",
      query: sql`CREATE INDEX IF NOT EXISTS idx_aggregated_results_status ON aggregated_results (status)`,
    },
    {
      name: "idx_delta_reports_config_created",
      query: sql`CREATE INDEX IF NOT EXISTS idx_delta_reports_config_created ON delta_reports (scan_config_id, created_at DESC)`,
    },
  ];

  let created = 0;
  for (const index of indexes) {
    try {
      await db.execute(index.query);
      created++;
    } catch (error) {
      console.error(`  [FAIL] ${index.name}: ${error instanceof Error ? error.message : error}`);
    }
  }

  console.log(`Database indexes ready (${created}/${indexes.length})`);
}
