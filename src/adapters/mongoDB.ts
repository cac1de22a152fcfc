import { Db } from "mongodb";
import { PermissionsSnapshot, validateSnapshot } from "../snapshot";
import { PermissionsStore } from "./PermissionsStore";

export interface SnapshotDocument {
  _id: string;
  snapshot: PermissionsSnapshot;
  updatedAt: Date;
}

/**
 * Keeps each named snapshot as one document in `permissionSnapshots`.
 */
export class MongoDBPermissionsStore implements PermissionsStore {
  private db: Db;
  private name: string;

  constructor(db: Db, name: string = "default") {
    this.db = db;
    this.name = name;
  }

  async load(): Promise<PermissionsSnapshot | undefined> {
    const document = await this.db
      .collection<SnapshotDocument>("permissionSnapshots")
      .findOne({ _id: this.name });
    if (!document) return undefined;
    return validateSnapshot(document.snapshot);
  }

  async save(snapshot: PermissionsSnapshot): Promise<void> {
    await this.db
      .collection<SnapshotDocument>("permissionSnapshots")
      .replaceOne(
        { _id: this.name },
        { snapshot, updatedAt: new Date() },
        { upsert: true }
      );
  }
}
