/**
 * seed-demo-data.ts - Loads the access-control demo into Postgres
 *
 * Two customers, four users and a handful of reports and findings:
 * - analyst_alice can see Acme Corp, analyst_bob can see Globex Industries
 * - admin_charlie and system are admins and see everything
 * - one Globex report is PII-flagged and never shows up in a search
 *
 * Rows use fixed ids and ON CONFLICT DO NOTHING, so running it twice is
 * harmless. Embeddings are generated by a backfill at the end, which needs
 * OPENAI_API_KEY.
 *
 * Usage:
 *   npm run migrate && npm run seed
 */

import { readFileSync } from "fs";
import path from "path";
import { z } from "zod";
import { loadConfig, loadDotEnv } from "../src/config";
import { describeError } from "../src/errors";
import { createServices } from "../src/service";
import {
  ACCESS_LEVELS,
  FINDING_CATEGORIES,
  FINDING_SEVERITIES,
  FINDING_STATUSES,
  REPORT_STATUSES,
  USER_ROLES,
} from "../src/store/types";

const DATA_PATH = path.join(__dirname, "demo-data.json");

const demoDataSchema = z.object({
  customers: z.array(
    z.object({
      id: z.string().uuid(),
      name: z.string(),
      region: z.enum(["US", "EU", "APAC", "GLOBAL"]),
      piiAllowed: z.boolean(),
    })
  ),
  users: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      email: z.string().nullable(),
      role: z.enum(USER_ROLES),
    })
  ),
  grants: z.array(
    z.object({
      userId: z.string(),
      customerId: z.string().uuid(),
      accessLevel: z.enum(ACCESS_LEVELS),
    })
  ),
  reports: z.array(
    z.object({
      id: z.string().uuid(),
      clusterId: z.string(),
      title: z.string(),
      description: z.string().nullable(),
      status: z.enum(REPORT_STATUSES),
      crdbVersion: z.string().nullable(),
      customerId: z.string().uuid(),
      region: z.string(),
      piiFlag: z.boolean(),
    })
  ),
  findings: z.array(
    z.object({
      id: z.string().uuid(),
      reportId: z.string().uuid(),
      category: z.enum(FINDING_CATEGORIES),
      severity: z.enum(FINDING_SEVERITIES),
      title: z.string(),
      description: z.string(),
      status: z.enum(FINDING_STATUSES),
      tags: z.array(z.string()),
      customerId: z.string().uuid(),
      region: z.string(),
      piiFlag: z.boolean(),
    })
  ),
});

async function main(): Promise<void> {
  loadDotEnv();
  const data = demoDataSchema.parse(JSON.parse(readFileSync(DATA_PATH, "utf8")));
  const { service, pool, close } = createServices(loadConfig());

  try {
    console.log("Seeding customers, users and grants...");
    for (const c of data.customers) {
      await pool.query(
        `INSERT INTO customers (id, name, region, pii_allowed) VALUES ($1, $2, $3, $4)
         ON CONFLICT (id) DO NOTHING`,
        [c.id, c.name, c.region, c.piiAllowed]
      );
    }
    for (const u of data.users) {
      await pool.query(
        `INSERT INTO users (id, name, email, role) VALUES ($1, $2, $3, $4)
         ON CONFLICT (id) DO NOTHING`,
        [u.id, u.name, u.email, u.role]
      );
    }
    for (const g of data.grants) {
      await pool.query(
        `INSERT INTO user_access (user_id, customer_id, access_level, granted_by)
         VALUES ($1, $2, $3, 'system')
         ON CONFLICT (user_id, customer_id) DO NOTHING`,
        [g.userId, g.customerId, g.accessLevel]
      );
    }

    console.log(`Seeding ${data.reports.length} reports and ${data.findings.length} findings...`);
    for (const r of data.reports) {
      await pool.query(
        `INSERT INTO reports
           (id, cluster_id, title, description, status, crdb_version, customer_id, region, pii_flag, created_by)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, 'system')
         ON CONFLICT (id) DO NOTHING`,
        [r.id, r.clusterId, r.title, r.description, r.status, r.crdbVersion, r.customerId, r.region, r.piiFlag]
      );
    }
    for (const f of data.findings) {
      await pool.query(
        `INSERT INTO findings
           (id, report_id, category, severity, title, description, status, tags, customer_id, region, pii_flag)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
         ON CONFLICT (id) DO NOTHING`,
        [
          f.id,
          f.reportId,
          f.category,
          f.severity,
          f.title,
          f.description,
          f.status,
          f.tags,
          f.customerId,
          f.region,
          f.piiFlag,
        ]
      );
    }

    console.log("Generating embeddings...");
    const { reports, findings } = await service.backfillAll();
    console.log(
      `Done. Reports: ${reports.succeeded} embedded, ${reports.failed} failed. ` +
        `Findings: ${findings.succeeded} embedded, ${findings.failed} failed.`
    );
  } finally {
    await close();
  }
}

main().catch((error) => {
  console.error(`Seed failed: ${describeError(error)}`);
  process.exit(1);
});
