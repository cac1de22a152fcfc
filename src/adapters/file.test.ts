import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { InvalidSnapshotError } from "../errors";
import { Logger } from "../logger";
import { FilePermissionsStore } from "./file";

let dir: string;
let filePath: string;
let logger: Logger;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "permissions-"));
  filePath = path.join(dir, "permissions.json");
  logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("FilePermissionsStore", () => {
  it("resolves the default file from the working directory", () => {
    expect(new FilePermissionsStore().filePath).toBe(
      path.resolve(process.cwd(), ".permissions.json")
    );
  });

  it("loads nothing from a missing file", async () => {
    await expect(new FilePermissionsStore(filePath).load()).resolves.toBeUndefined();
  });

  it("writes pretty JSON and reads it back", async () => {
    const store = new FilePermissionsStore(filePath);
    const snapshot = { defaults: { permissions: ["read"] } };

    await store.save(snapshot);

    expect(fs.readFileSync(filePath, "utf-8")).toBe(
      '{\n  "defaults": {\n    "permissions": [\n      "read"\n    ]\n  }\n}\n'
    );
    await expect(store.load()).resolves.toEqual(snapshot);
  });

  it("rejects a file that isn't JSON", async () => {
    fs.writeFileSync(filePath, "{ not json");

    await expect(new FilePermissionsStore(filePath).load()).rejects.toThrow(
      InvalidSnapshotError
    );
  });

  it("reloads the target when the file changes", async () => {
    fs.writeFileSync(filePath, "{}");
    const store = new FilePermissionsStore(filePath, { logger });
    const target = { loadSnapshot: vi.fn() };
    const watcher = store.watch(target);

    try {
      fs.writeFileSync(filePath, '{"users":{"u":{"permissions":["a"]}}}');

      await vi.waitFor(() =>
        expect(target.loadSnapshot).toHaveBeenCalledWith({
          users: { u: { permissions: ["a"] } },
        })
      );
      expect(logger.info).toHaveBeenCalledWith("Permissions file changed. Reloading...");
    } finally {
      watcher.close();
    }
  });

  it("logs a reload that fails and leaves the target alone", async () => {
    fs.writeFileSync(filePath, "{}");
    const store = new FilePermissionsStore(filePath, { logger });
    const target = { loadSnapshot: vi.fn() };
    const watcher = store.watch(target);

    try {
      fs.writeFileSync(filePath, '{"users":[]}');

      await vi.waitFor(() =>
        expect(logger.error).toHaveBeenCalledWith(
          `Failed to reload ${filePath}`,
          expect.any(InvalidSnapshotError)
        )
      );
      expect(target.loadSnapshot).not.toHaveBeenCalled();
    } finally {
      watcher.close();
    }
  });
});
