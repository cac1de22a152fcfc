import { PermissionPath } from './PermissionPath';
import { PermissionStatus } from './PermissionsRegistry';
import { PermissionsRegistryApi } from './PermissionsRegistryDecorator';
import { PermissionsSnapshot } from './snapshot';
import { PermissionsStore } from './adapters/PermissionsStore';
import { AsyncLock } from './util/AsyncLock';

/**
 * Wraps a registry so that every operation takes the same lock. Operations
 * run one at a time in the order they were called, and loading or saving
 * through a store can't interleave with changes.
 *
 * @example
 * ```ts
 * const registry = new SynchronizedPermissionsRegistry(
 *   PermissionsRegistry.withStringIds()
 * );
 * await registry.load(new FilePermissionsStore());
 * await registry.assignGroupToUser('123', 'editors');
 * await registry.save(new FilePermissionsStore());
 * ```
 */
class SynchronizedPermissionsRegistry<ID> {
  private lock = new AsyncLock();

  constructor(private readonly inner: PermissionsRegistryApi<ID>) {}

  /**
   * Runs several operations with the lock held, so nothing else sees the
   * registry part way through.
   *
   * @example
   * ```ts
   * await registry.runExclusive((inner) => {
   *   inner.revokeAllGroupsFromUser('123');
   *   inner.assignGroupToUser('123', 'readers');
   * });
   * ```
   */
  runExclusive<T>(
    func: (registry: PermissionsRegistryApi<ID>) => Promise<T> | T
  ): Promise<T> {
    return this.run(func);
  }

  /**
   * Replaces the registry's contents with what the store holds.
   *
   * @returns false if the store had nothing saved, leaving the registry as it was
   */
  load(store: PermissionsStore): Promise<boolean> {
    return this.run(async (registry) => {
      const snapshot = await store.load();
      if (!snapshot) {
        return false;
      }
      registry.loadSnapshot(snapshot);
      return true;
    });
  }

  save(store: PermissionsStore): Promise<void> {
    return this.run((registry) => store.save(registry.toSnapshot()));
  }

  idToString(id: ID): string {
    return this.inner.idToString(id);
  }

  idFromString(text: string): ID {
    return this.inner.idFromString(text);
  }

  hasPermission(userId: ID, permission: string): Promise<boolean> {
    return this.run((registry) => registry.hasPermission(userId, permission));
  }

  groupHasPermission(groupName: string, permission: string): Promise<boolean> {
    return this.run((registry) =>
      registry.groupHasPermission(groupName, permission)
    );
  }

  isDefaultPermission(permission: string): Promise<boolean> {
    return this.run((registry) => registry.isDefaultPermission(permission));
  }

  getUserPermissionStatus(userId: ID, permission: string): Promise<PermissionStatus> {
    return this.run((registry) =>
      registry.getUserPermissionStatus(userId, permission)
    );
  }

  getGroupPermissionStatus(groupName: string, permission: string): Promise<PermissionStatus> {
    return this.run((registry) =>
      registry.getGroupPermissionStatus(groupName, permission)
    );
  }

  getDefaultPermissionStatus(permission: string): Promise<PermissionStatus> {
    return this.run((registry) =>
      registry.getDefaultPermissionStatus(permission)
    );
  }

  getUserPermissionArg(userId: ID, permission: string): Promise<string | undefined> {
    return this.run((registry) =>
      registry.getUserPermissionArg(userId, permission)
    );
  }

  getGroupPermissionArg(groupName: string, permission: string): Promise<string | undefined> {
    return this.run((registry) =>
      registry.getGroupPermissionArg(groupName, permission)
    );
  }

  getDefaultPermissionArg(permission: string): Promise<string | undefined> {
    return this.run((registry) => registry.getDefaultPermissionArg(permission));
  }

  userHasAllPermissions(userId: ID, permissions: string[]): Promise<boolean> {
    return this.run((registry) =>
      registry.userHasAllPermissions(userId, permissions)
    );
  }

  userHasAnyPermissions(userId: ID, permissions: string[]): Promise<boolean> {
    return this.run((registry) =>
      registry.userHasAnyPermissions(userId, permissions)
    );
  }

  groupHasAllPermissions(groupName: string, permissions: string[]): Promise<boolean> {
    return this.run((registry) =>
      registry.groupHasAllPermissions(groupName, permissions)
    );
  }

  groupHasAnyPermissions(groupName: string, permissions: string[]): Promise<boolean> {
    return this.run((registry) =>
      registry.groupHasAnyPermissions(groupName, permissions)
    );
  }

  userHasAnySubPermissionOf(userId: ID, permission: string): Promise<boolean> {
    return this.run((registry) =>
      registry.userHasAnySubPermissionOf(userId, permission)
    );
  }

  groupHasAnySubPermissionOf(groupName: string, permission: string): Promise<boolean> {
    return this.run((registry) =>
      registry.groupHasAnySubPermissionOf(groupName, permission)
    );
  }

  isOrAnySubPermissionOfIsDefault(permission: string): Promise<boolean> {
    return this.run((registry) =>
      registry.isOrAnySubPermissionOfIsDefault(permission)
    );
  }

  assertUserHasPermission(userId: ID, permission: string): Promise<void> {
    return this.run((registry) =>
      registry.assertUserHasPermission(userId, permission)
    );
  }

  assertGroupHasPermission(groupName: string, permission: string): Promise<void> {
    return this.run((registry) =>
      registry.assertGroupHasPermission(groupName, permission)
    );
  }

  assertIsDefaultPermission(permission: string): Promise<void> {
    return this.run((registry) => registry.assertIsDefaultPermission(permission));
  }

  userHasGroup(userId: ID, groupName: string): Promise<boolean> {
    return this.run((registry) => registry.userHasGroup(userId, groupName));
  }

  groupExtendsFromGroup(groupName: string, superGroupName: string): Promise<boolean> {
    return this.run((registry) =>
      registry.groupExtendsFromGroup(groupName, superGroupName)
    );
  }

  isDefaultGroup(groupName: string): Promise<boolean> {
    return this.run((registry) => registry.isDefaultGroup(groupName));
  }

  getUsers(): Promise<ID[]> {
    return this.run((registry) => registry.getUsers());
  }

  getGroupNames(): Promise<string[]> {
    return this.run((registry) => registry.getGroupNames());
  }

  getUserPermissions(userId: ID, includeArgs?: boolean): Promise<string[]> {
    return this.run((registry) =>
      registry.getUserPermissions(userId, includeArgs)
    );
  }

  getGroupPermissions(groupName: string, includeArgs?: boolean): Promise<string[]> {
    return this.run((registry) =>
      registry.getGroupPermissions(groupName, includeArgs)
    );
  }

  getDefaultPermissions(includeArgs?: boolean): Promise<string[]> {
    return this.run((registry) => registry.getDefaultPermissions(includeArgs));
  }

  getGroupsOfUser(userId: ID): Promise<string[]> {
    return this.run((registry) => registry.getGroupsOfUser(userId));
  }

  getGroupsOfGroup(groupName: string): Promise<string[]> {
    return this.run((registry) => registry.getGroupsOfGroup(groupName));
  }

  getDefaultGroups(): Promise<string[]> {
    return this.run((registry) => registry.getDefaultGroups());
  }

  getAllGroupsOfUser(userId: ID): Promise<string[]> {
    return this.run((registry) => registry.getAllGroupsOfUser(userId));
  }

  assignUserPermission(userId: ID, permission: string): Promise<PermissionPath | undefined> {
    return this.run((registry) =>
      registry.assignUserPermission(userId, permission)
    );
  }

  assignGroupPermission(groupName: string, permission: string): Promise<PermissionPath | undefined> {
    return this.run((registry) =>
      registry.assignGroupPermission(groupName, permission)
    );
  }

  assignDefaultPermission(permission: string): Promise<PermissionPath | undefined> {
    return this.run((registry) => registry.assignDefaultPermission(permission));
  }

  assignUserPermissions(userId: ID, permissions: string[]): Promise<void> {
    return this.run((registry) =>
      registry.assignUserPermissions(userId, permissions)
    );
  }

  assignGroupPermissions(groupName: string, permissions: string[]): Promise<void> {
    return this.run((registry) =>
      registry.assignGroupPermissions(groupName, permissions)
    );
  }

  assignDefaultPermissions(permissions: string[]): Promise<void> {
    return this.run((registry) => registry.assignDefaultPermissions(permissions));
  }

  revokeUserPermission(userId: ID, permission: string): Promise<PermissionPath | undefined> {
    return this.run((registry) =>
      registry.revokeUserPermission(userId, permission)
    );
  }

  revokeGroupPermission(groupName: string, permission: string): Promise<PermissionPath | undefined> {
    return this.run((registry) =>
      registry.revokeGroupPermission(groupName, permission)
    );
  }

  revokeDefaultPermission(permission: string): Promise<PermissionPath | undefined> {
    return this.run((registry) => registry.revokeDefaultPermission(permission));
  }

  revokeAllUserPermissions(userId: ID): Promise<PermissionPath[]> {
    return this.run((registry) => registry.revokeAllUserPermissions(userId));
  }

  revokeAllGroupPermissions(groupName: string): Promise<PermissionPath[]> {
    return this.run((registry) => registry.revokeAllGroupPermissions(groupName));
  }

  revokeAllDefaultPermissions(): Promise<PermissionPath[]> {
    return this.run((registry) => registry.revokeAllDefaultPermissions());
  }

  assignGroupToUser(userId: ID, groupName: string): Promise<void> {
    return this.run((registry) => registry.assignGroupToUser(userId, groupName));
  }

  assignGroupToGroup(groupName: string, superGroupName: string): Promise<void> {
    return this.run((registry) =>
      registry.assignGroupToGroup(groupName, superGroupName)
    );
  }

  assignDefaultGroup(groupName: string): Promise<void> {
    return this.run((registry) => registry.assignDefaultGroup(groupName));
  }

  assignGroupsToUser(userId: ID, groupNames: string[]): Promise<void> {
    return this.run((registry) =>
      registry.assignGroupsToUser(userId, groupNames)
    );
  }

  assignGroupsToGroup(groupName: string, superGroupNames: string[]): Promise<void> {
    return this.run((registry) =>
      registry.assignGroupsToGroup(groupName, superGroupNames)
    );
  }

  assignDefaultGroups(groupNames: string[]): Promise<void> {
    return this.run((registry) => registry.assignDefaultGroups(groupNames));
  }

  revokeGroupFromUser(userId: ID, groupName: string): Promise<boolean> {
    return this.run((registry) =>
      registry.revokeGroupFromUser(userId, groupName)
    );
  }

  revokeGroupFromGroup(groupName: string, superGroupName: string): Promise<boolean> {
    return this.run((registry) =>
      registry.revokeGroupFromGroup(groupName, superGroupName)
    );
  }

  revokeDefaultGroup(groupName: string): Promise<boolean> {
    return this.run((registry) => registry.revokeDefaultGroup(groupName));
  }

  revokeAllGroupsFromUser(userId: ID): Promise<string[]> {
    return this.run((registry) => registry.revokeAllGroupsFromUser(userId));
  }

  revokeAllGroupsFromGroup(groupName: string): Promise<string[]> {
    return this.run((registry) => registry.revokeAllGroupsFromGroup(groupName));
  }

  revokeAllDefaultGroups(): Promise<string[]> {
    return this.run((registry) => registry.revokeAllDefaultGroups());
  }

  clear(): Promise<void> {
    return this.run((registry) => registry.clear());
  }

  clearUser(userId: ID): Promise<void> {
    return this.run((registry) => registry.clearUser(userId));
  }

  clearGroup(groupName: string): Promise<void> {
    return this.run((registry) => registry.clearGroup(groupName));
  }

  clearDefaults(): Promise<void> {
    return this.run((registry) => registry.clearDefaults());
  }

  toSnapshot(): Promise<PermissionsSnapshot> {
    return this.run((registry) => registry.toSnapshot());
  }

  loadSnapshot(snapshot: PermissionsSnapshot): Promise<void> {
    return this.run((registry) => registry.loadSnapshot(snapshot));
  }

  private run<T>(
    func: (registry: PermissionsRegistryApi<ID>) => Promise<T> | T
  ): Promise<T> {
    return this.lock.inLock(() => func(this.inner));
  }
}

export { SynchronizedPermissionsRegistry };
export default SynchronizedPermissionsRegistry;
