import { Connection, RowDataPacket } from "mysql2/promise";
import { PermissionsSnapshot, parseSnapshot, validateSnapshot } from "../snapshot";
import { PermissionsStore } from "./PermissionsStore";

interface SnapshotRow extends RowDataPacket {
  snapshot: unknown;
}

/**
 * Keeps each named snapshot as one row of `permission_snapshots`. Call
 * {@link createTable} once before first use.
 */
export class MySQLPermissionsStore implements PermissionsStore {
  private connection: Connection;
  private name: string;

  constructor(connection: Connection, name: string = "default") {
    this.connection = connection;
    this.name = name;
  }

  async createTable(): Promise<void> {
    await this.connection.query(
      `CREATE TABLE IF NOT EXISTS permission_snapshots (
        name VARCHAR(191) PRIMARY KEY,
        snapshot JSON NOT NULL,
        updated_at DATETIME NOT NULL
      )`
    );
  }

  async load(): Promise<PermissionsSnapshot | undefined> {
    const [rows] = await this.connection.query<SnapshotRow[]>(
      "SELECT snapshot FROM permission_snapshots WHERE name = ?",
      [this.name]
    );
    if (rows.length === 0) return undefined;

    // The driver hands JSON columns back parsed, unless they were stored as text.
    const { snapshot } = rows[0];
    return typeof snapshot === "string"
      ? parseSnapshot(snapshot)
      : validateSnapshot(snapshot);
  }

  async save(snapshot: PermissionsSnapshot): Promise<void> {
    await this.connection.query(
      "INSERT INTO permission_snapshots (name, snapshot, updated_at) VALUES (?, ?, NOW()) ON DUPLICATE KEY UPDATE snapshot = VALUES(snapshot), updated_at = VALUES(updated_at)",
      [this.name, JSON.stringify(snapshot)]
    );
  }
}
