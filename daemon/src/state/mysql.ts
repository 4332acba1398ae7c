/**
 * MySQL Store
 *
 * Persists updater state bundles, reads subscriptions, and appends
 * dependency flow events over the MySQL wire protocol (mysql2).
 *
 * Tables:
 *   updater_state           one row per (owner_key, entity), JSON value
 *   subscriptions           owned by the subscription API; read here, and
 *                           last_applied_build_id advanced
 *   dependency_flow_events  append-only telemetry
 *
 * A bundle save deletes and re-inserts the owner's rows inside one
 * transaction, so readers see either the old bundle or the new one.
 */

import mysql, { type Pool, type RowDataPacket } from "mysql2/promise";

import type { DependencyFlowEvent, StateBundle, Subscription } from "../models/types.js";
import { emptyBundle } from "../models/types.js";
import type { FlowEventSink, StateStore, SubscriptionStore } from "./index.js";
import {
  codeFlowStateSchema,
  pendingUpdatesSchema,
  pullRequestStateSchema,
  subscriptionRowSchema,
} from "./schema.js";

export interface MysqlConfig {
  host: string;
  port: number;
  database: string;
  user?: string;
  password?: string;
  connectionLimit?: number;
}

export interface MysqlStore extends StateStore, SubscriptionStore, FlowEventSink {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
}

type Entity = "pull_request" | "code_flow" | "pending_updates";

const SCHEMA = [
  `CREATE TABLE IF NOT EXISTS updater_state (
    owner_key VARCHAR(255) NOT NULL,
    entity VARCHAR(32) NOT NULL,
    value LONGTEXT NOT NULL,
    updated_at DATETIME NOT NULL,
    PRIMARY KEY (owner_key, entity)
  )`,
  `CREATE TABLE IF NOT EXISTS dependency_flow_events (
    event_id INT NOT NULL AUTO_INCREMENT PRIMARY KEY,
    subscription_id VARCHAR(64) NOT NULL,
    build_id INT NOT NULL,
    owner_key VARCHAR(255) NOT NULL,
    asset_name VARCHAR(255) NOT NULL,
    from_version VARCHAR(128) DEFAULT NULL,
    to_version VARCHAR(128) NOT NULL,
    pull_request_url VARCHAR(512) NOT NULL,
    flow_type VARCHAR(16) NOT NULL,
    reason VARCHAR(16) NOT NULL,
    recorded_at DATETIME NOT NULL,
    INDEX idx_build (build_id),
    INDEX idx_subscription (subscription_id)
  )`,
];

function parseEntity(entity: string, raw: string, bundle: StateBundle): void {
  const value: unknown = JSON.parse(raw);
  switch (entity) {
    case "pull_request":
      bundle.pullRequest = pullRequestStateSchema.parse(value);
      break;
    case "code_flow":
      bundle.codeFlow = codeFlowStateSchema.parse(value);
      break;
    case "pending_updates":
      bundle.pendingUpdates = pendingUpdatesSchema.parse(value);
      break;
    default:
      console.warn(`[state-store] Ignoring unknown entity ${entity}`);
  }
}

function bundleRows(bundle: StateBundle): Array<[Entity, string]> {
  const rows: Array<[Entity, string]> = [];
  if (bundle.pullRequest) rows.push(["pull_request", JSON.stringify(bundle.pullRequest)]);
  if (bundle.codeFlow) rows.push(["code_flow", JSON.stringify(bundle.codeFlow)]);
  if (bundle.pendingUpdates.length > 0) {
    rows.push(["pending_updates", JSON.stringify(bundle.pendingUpdates)]);
  }
  return rows;
}

export function createMysqlStore(config: MysqlConfig): MysqlStore {
  let pool: Pool | null = null;

  const requirePool = (): Pool => {
    if (!pool) throw new Error("Not connected to MySQL");
    return pool;
  };

  return {
    async connect() {
      pool = mysql.createPool({
        host: config.host,
        port: config.port,
        database: config.database,
        user: config.user ?? "root",
        password: config.password,
        connectionLimit: config.connectionLimit ?? 10,
      });

      for (const ddl of SCHEMA) {
        await pool.execute(ddl);
      }
      console.log(`[state-store] Connected to MySQL at ${config.host}:${config.port}`);
    },

    async load(ownerKey) {
      const [rows] = await requirePool().query<RowDataPacket[]>(
        "SELECT entity, value FROM updater_state WHERE owner_key = ?",
        [ownerKey]
      );
      const bundle = emptyBundle();
      for (const row of rows) {
        const entity: unknown = row.entity;
        const value: unknown = row.value;
        if (typeof entity === "string" && typeof value === "string") {
          parseEntity(entity, value, bundle);
        }
      }
      return bundle;
    },

    async save(ownerKey, bundle) {
      const connection = await requirePool().getConnection();
      try {
        await connection.beginTransaction();
        await connection.execute("DELETE FROM updater_state WHERE owner_key = ?", [ownerKey]);
        const updatedAt = new Date();
        for (const [entity, value] of bundleRows(bundle)) {
          await connection.execute(
            "INSERT INTO updater_state (owner_key, entity, value, updated_at) VALUES (?, ?, ?, ?)",
            [ownerKey, entity, value, updatedAt]
          );
        }
        await connection.commit();
      } catch (error: unknown) {
        await connection.rollback();
        throw error;
      } finally {
        connection.release();
      }
    },

    async getSubscription(id): Promise<Subscription | null> {
      const [rows] = await requirePool().query<RowDataPacket[]>(
        `SELECT id, channel_id, source_repository, target_repository, target_branch,
                batchable, update_frequency, source_enabled, last_applied_build_id
         FROM subscriptions WHERE id = ?`,
        [id]
      );
      const row = rows[0];
      if (!row) return null;

      const parsed = subscriptionRowSchema.parse(row);
      return {
        id: parsed.id,
        channelId: parsed.channel_id,
        sourceRepository: parsed.source_repository,
        targetRepository: parsed.target_repository,
        targetBranch: parsed.target_branch,
        policy: {
          batchable: parsed.batchable,
          updateFrequency: parsed.update_frequency,
        },
        sourceEnabled: parsed.source_enabled,
        lastAppliedBuildId: parsed.last_applied_build_id,
      };
    },

    async markCaughtUp(id, buildId) {
      await requirePool().execute(
        `UPDATE subscriptions SET last_applied_build_id = ?
         WHERE id = ? AND (last_applied_build_id IS NULL OR last_applied_build_id < ?)`,
        [buildId, id, buildId]
      );
    },

    async record(events: readonly DependencyFlowEvent[]) {
      const db = requirePool();
      for (const event of events) {
        await db.execute(
          `INSERT INTO dependency_flow_events (
            subscription_id, build_id, owner_key, asset_name, from_version,
            to_version, pull_request_url, flow_type, reason, recorded_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
          [
            event.subscriptionId,
            event.buildId,
            event.ownerKey,
            event.assetName,
            event.fromVersion,
            event.toVersion,
            event.pullRequestUrl,
            event.flowType,
            event.reason,
            event.recordedAt,
          ]
        );
      }
    },

    async disconnect() {
      if (pool) {
        await pool.end();
        pool = null;
      }
    },
  };
}
