import { PermissionsSnapshot } from "../snapshot";

/**
 * Somewhere a registry's contents can be saved to and loaded from.
 */
export interface PermissionsStore {
  /**
   * @returns undefined when nothing has been saved yet
   */
  load(): Promise<PermissionsSnapshot | undefined>;
  save(snapshot: PermissionsSnapshot): Promise<void>;
}

/**
 * Anything a loaded snapshot can be applied to: a registry, or one of its
 * decorators.
 */
export interface SnapshotTarget {
  loadSnapshot(snapshot: PermissionsSnapshot): void | Promise<void>;
}
