/**
 * SQLite-backed request and health-check history.
 *
 * One row per proxied request and one per health probe. Writes are
 * synchronous (better-sqlite3) and wrapped so a failing insert is logged
 * instead of reaching the request path.
 */

import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type { IEventReporter } from "../core/interfaces";
import type { HealthEvent, RequestEvent } from "../core/models";
import { errorMessage } from "../core/utils";

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS request_logs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    timestamp DATETIME DEFAULT CURRENT_TIMESTAMP,
    client_ip TEXT,
    method TEXT,
    path TEXT,
    backend TEXT,
    response_time_ms INTEGER,
    status_code INTEGER
  );
  CREATE TABLE IF NOT EXISTS health_check_logs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    timestamp DATETIME DEFAULT CURRENT_TIMESTAMP,
    backend TEXT,
    is_alive INTEGER,
    response_time_ms INTEGER
  );
`;

export interface RequestLogRow {
  id: number;
  timestamp: string;
  client_ip: string;
  method: string;
  path: string;
  backend: string;
  response_time_ms: number;
  status_code: number;
}

export interface HealthCheckLogRow {
  id: number;
  timestamp: string;
  backend: string;
  is_alive: number;
  response_time_ms: number;
}

export class SqliteEventStore implements IEventReporter {
  private readonly insertRequest: Database.Statement<[string, string, string, string, number, number]>;
  private readonly insertHealth: Database.Statement<[string, number, number]>;

  constructor(private readonly db: Database.Database) {
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA);

    this.insertRequest = this.db.prepare<[string, string, string, string, number, number]>(
      `INSERT INTO request_logs (client_ip, method, path, backend, response_time_ms, status_code)
       VALUES (?, ?, ?, ?, ?, ?)`
    );
    this.insertHealth = this.db.prepare<[string, number, number]>(
      `INSERT INTO health_check_logs (backend, is_alive, response_time_ms) VALUES (?, ?, ?)`
    );
  }

  /**
   * Opens (creating if needed) the database file at `dbPath`.
   * `:memory:` gives a throwaway in-process database.
   */
  static open(dbPath: string): SqliteEventStore {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    return new SqliteEventStore(new Database(dbPath));
  }

  reportRequest(event: RequestEvent): void {
    try {
      this.insertRequest.run(
        event.clientAddr,
        event.method,
        event.path,
        event.backendAddress,
        event.latencyMs,
        event.statusCode
      );
    } catch (error) {
      console.error(`🗄️ Failed to store request log: ${errorMessage(error)}`);
    }
  }

  reportHealth(event: HealthEvent): void {
    try {
      this.insertHealth.run(event.backendAddress, event.alive ? 1 : 0, event.latencyMs);
    } catch (error) {
      console.error(`🗄️ Failed to store health check log: ${errorMessage(error)}`);
    }
  }

  /** Newest first. */
  recentRequests(limit = 100): RequestLogRow[] {
    return this.db
      .prepare<[number], RequestLogRow>(`SELECT * FROM request_logs ORDER BY id DESC LIMIT ?`)
      .all(limit);
  }

  /** Newest first. */
  recentHealthChecks(limit = 100): HealthCheckLogRow[] {
    return this.db
      .prepare<[number], HealthCheckLogRow>(`SELECT * FROM health_check_logs ORDER BY id DESC LIMIT ?`)
      .all(limit);
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
