import { Connection } from "mysql2/promise";
import { describe, expect, it, vi } from "vitest";

import { MySQLPermissionsStore } from "./mySQL";

function fakeConnection() {
  const query = vi.fn();
  const connection = { query } as unknown as Connection;
  return { connection, query };
}

describe("MySQLPermissionsStore", () => {
  it("loads nothing when there's no row", async () => {
    const { connection, query } = fakeConnection();
    query.mockResolvedValue([[], []]);

    await expect(new MySQLPermissionsStore(connection).load()).resolves.toBeUndefined();
    expect(query).toHaveBeenCalledWith(
      "SELECT snapshot FROM permission_snapshots WHERE name = ?",
      ["default"]
    );
  });

  it("loads a snapshot stored as text", async () => {
    const { connection, query } = fakeConnection();
    query.mockResolvedValue([[{ snapshot: '{"users":{"u":{"permissions":["a"]}}}' }], []]);

    await expect(new MySQLPermissionsStore(connection).load()).resolves.toEqual({
      users: { u: { permissions: ["a"] } },
    });
  });

  it("loads a snapshot the driver already parsed", async () => {
    const { connection, query } = fakeConnection();
    query.mockResolvedValue([[{ snapshot: { defaults: { groups: ["everyone"] } } }], []]);

    await expect(new MySQLPermissionsStore(connection).load()).resolves.toEqual({
      defaults: { groups: ["everyone"] },
    });
  });

  it("inserts or replaces the row on save", async () => {
    const { connection, query } = fakeConnection();
    query.mockResolvedValue([{ affectedRows: 1 }, undefined]);
    const snapshot = { defaults: { permissions: ["read"] } };

    await new MySQLPermissionsStore(connection, "tenant1").save(snapshot);

    expect(query).toHaveBeenCalledWith(
      expect.stringContaining("ON DUPLICATE KEY UPDATE"),
      ["tenant1", JSON.stringify(snapshot)]
    );
  });

  it("creates the table", async () => {
    const { connection, query } = fakeConnection();
    query.mockResolvedValue([{}, undefined]);

    await new MySQLPermissionsStore(connection).createTable();

    expect(query).toHaveBeenCalledWith(
      expect.stringContaining("CREATE TABLE IF NOT EXISTS permission_snapshots")
    );
  });
});
