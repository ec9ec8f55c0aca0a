import Database from "better-sqlite3";
import type { TelemetrySnapshot } from "./types.js";

interface SnapshotRow {
  timestamp: number;
  cpu_percent: number;
  memory_percent: number;
  memory_used_mb: number;
  memory_total_mb: number;
  bytes_sent_per_s: number;
  bytes_recv_per_s: number;
  tcp_established: number;
  link_utilization: number | null;
}

/**
 * Append-only metrics sink. Not on the admission path.
 */
export class MetricsDB {
  private db: Database.Database;

  constructor(path: string) {
    this.db = new Database(path);
    this.initialize();
  }

  private initialize() {
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS snapshots (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp INTEGER NOT NULL,
        cpu_percent REAL,
        memory_percent REAL,
        memory_used_mb REAL,
        memory_total_mb REAL,
        bytes_sent_per_s REAL,
        bytes_recv_per_s REAL,
        tcp_established INTEGER,
        link_utilization REAL
      );

      CREATE INDEX IF NOT EXISTS idx_snapshots_timestamp ON snapshots(timestamp);
    `);
  }

  public saveSnapshot(snapshot: TelemetrySnapshot) {
    const stmt = this.db.prepare(`
      INSERT INTO snapshots (
        timestamp, cpu_percent, memory_percent, memory_used_mb, memory_total_mb,
        bytes_sent_per_s, bytes_recv_per_s, tcp_established, link_utilization
      ) VALUES (
        @timestamp, @cpuPercent, @memoryPercent, @memoryUsedMb, @memoryTotalMb,
        @bytesSentPerSec, @bytesRecvPerSec, @tcpEstablished, @linkUtilizationPercent
      )
    `);
    stmt.run(snapshot);
  }

  /** Most recent first. */
  public recentSnapshots(limit = 60): TelemetrySnapshot[] {
    const stmt = this.db.prepare("SELECT * FROM snapshots ORDER BY timestamp DESC, id DESC LIMIT ?");
    const rows = stmt.all(limit) as SnapshotRow[];
    return rows.map(row => ({
      timestamp: row.timestamp,
      cpuPercent: row.cpu_percent,
      memoryPercent: row.memory_percent,
      memoryUsedMb: row.memory_used_mb,
      memoryTotalMb: row.memory_total_mb,
      bytesSentPerSec: row.bytes_sent_per_s,
      bytesRecvPerSec: row.bytes_recv_per_s,
      tcpEstablished: row.tcp_established,
      linkUtilizationPercent: row.link_utilization,
    }));
  }

  /** Delete snapshots older than `cutoff` (epoch ms). Returns the number removed. */
  public pruneSnapshots(cutoff: number): number {
    const stmt = this.db.prepare("DELETE FROM snapshots WHERE timestamp < ?");
    return stmt.run(cutoff).changes;
  }

  public close() {
    this.db.close();
  }
}
