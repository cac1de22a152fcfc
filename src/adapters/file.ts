import fs from "fs";
import path from "path";
import { Logger, consoleLogger } from "../logger";
import { PermissionsSnapshot, parseSnapshot } from "../snapshot";
import { PermissionsStore, SnapshotTarget } from "./PermissionsStore";

export interface FilePermissionsStoreOptions {
  logger?: Logger;
}

/**
 * Keeps permissions in a JSON file, `.permissions.json` in the working
 * directory unless told otherwise.
 *
 * @example
 * ```ts
 * const store = new FilePermissionsStore();
 * const snapshot = await store.load();
 * if (snapshot) registry.loadSnapshot(snapshot);
 * store.watch(registry);
 * ```
 */
export class FilePermissionsStore implements PermissionsStore {
  readonly filePath: string;
  private logger: Logger;

  constructor(
    filePath: string = ".permissions.json",
    options: FilePermissionsStoreOptions = {}
  ) {
    this.filePath = path.resolve(process.cwd(), filePath);
    this.logger = options.logger ?? consoleLogger;
  }

  async load(): Promise<PermissionsSnapshot | undefined> {
    if (!fs.existsSync(this.filePath)) {
      return undefined;
    }
    const content = await fs.promises.readFile(this.filePath, "utf-8");
    return parseSnapshot(content);
  }

  async save(snapshot: PermissionsSnapshot): Promise<void> {
    await fs.promises.writeFile(
      this.filePath,
      `${JSON.stringify(snapshot, null, 2)}\n`,
      "utf-8"
    );
  }

  /**
   * Reloads the target whenever the file changes. A file that fails to load
   * is logged and the target keeps what it had.
   *
   * @returns the watcher; close it to stop watching
   */
  watch(target: SnapshotTarget): fs.FSWatcher {
    return fs.watch(this.filePath, (eventType) => {
      if (eventType !== "change") {
        return;
      }
      this.logger.info("Permissions file changed. Reloading...");
      this.reload(target).catch((error: unknown) =>
        this.logger.error(`Failed to reload ${this.filePath}`, error)
      );
    });
  }

  private async reload(target: SnapshotTarget): Promise<void> {
    const snapshot = await this.load();
    if (!snapshot) {
      this.logger.warn(`${this.filePath} is gone; keeping current permissions`);
      return;
    }
    await target.loadSnapshot(snapshot);
  }
}
