import { PermissionPath } from './PermissionPath';
import { PermissionStatus } from './PermissionsRegistry';
import {
  PermissionsRegistryApi,
  PermissionsRegistryDecorator,
} from './PermissionsRegistryDecorator';
import { PermissionsSnapshot } from './snapshot';

class QueryCache<T> {
  private values: Map<string, Map<string, { value: T }>> = new Map();

  get(subject: string, key: string, compute: () => T): T {
    let bySubject = this.values.get(subject);
    if (!bySubject) {
      bySubject = new Map();
      this.values.set(subject, bySubject);
    }
    const cached = bySubject.get(key);
    if (cached) {
      return cached.value;
    }
    const value = compute();
    bySubject.set(key, { value });
    return value;
  }

  clear(): void {
    this.values.clear();
  }
}

const DEFAULTS = '';

const listKey = (permissions: string[]): string => JSON.stringify(permissions);

/**
 * A registry that remembers the answers to permission and group queries
 * until the next change made through it. Changes made to the wrapped
 * registry directly are not seen; call `clearCache()` after making one.
 *
 * Assertions and listings are not cached.
 *
 * @example
 * ```ts
 * const registry = new CachedPermissionsRegistry(PermissionsRegistry.withStringIds());
 * registry.assignUserPermission('123', 'articles.read');
 * registry.hasPermission('123', 'articles.read'); // resolved
 * registry.hasPermission('123', 'articles.read'); // remembered
 * ```
 */
class CachedPermissionsRegistry<ID> extends PermissionsRegistryDecorator<ID> {
  private caches = {
    userHas: new QueryCache<boolean>(),
    groupHas: new QueryCache<boolean>(),
    defaultHas: new QueryCache<boolean>(),
    userStatus: new QueryCache<PermissionStatus>(),
    groupStatus: new QueryCache<PermissionStatus>(),
    defaultStatus: new QueryCache<PermissionStatus>(),
    userArg: new QueryCache<string | undefined>(),
    groupArg: new QueryCache<string | undefined>(),
    defaultArg: new QueryCache<string | undefined>(),
    userHasAll: new QueryCache<boolean>(),
    userHasAny: new QueryCache<boolean>(),
    groupHasAll: new QueryCache<boolean>(),
    groupHasAny: new QueryCache<boolean>(),
    userHasAnySub: new QueryCache<boolean>(),
    groupHasAnySub: new QueryCache<boolean>(),
    defaultHasAnySub: new QueryCache<boolean>(),
    userHasGroup: new QueryCache<boolean>(),
    groupExtends: new QueryCache<boolean>(),
    defaultGroup: new QueryCache<boolean>(),
  };

  constructor(inner: PermissionsRegistryApi<ID>) {
    super(inner);
  }

  /**
   * Forgets every remembered answer.
   */
  clearCache(): void {
    Object.values(this.caches).forEach((cache) => cache.clear());
  }

  hasPermission(userId: ID, permission: string): boolean {
    return this.caches.userHas.get(this.idToString(userId), permission, () =>
      super.hasPermission(userId, permission)
    );
  }

  groupHasPermission(groupName: string, permission: string): boolean {
    return this.caches.groupHas.get(groupName, permission, () =>
      super.groupHasPermission(groupName, permission)
    );
  }

  isDefaultPermission(permission: string): boolean {
    return this.caches.defaultHas.get(DEFAULTS, permission, () =>
      super.isDefaultPermission(permission)
    );
  }

  // Statuses are objects, so each caller gets its own copy.
  getUserPermissionStatus(userId: ID, permission: string): PermissionStatus {
    return {
      ...this.caches.userStatus.get(this.idToString(userId), permission, () =>
        super.getUserPermissionStatus(userId, permission)
      ),
    };
  }

  getGroupPermissionStatus(groupName: string, permission: string): PermissionStatus {
    return {
      ...this.caches.groupStatus.get(groupName, permission, () =>
        super.getGroupPermissionStatus(groupName, permission)
      ),
    };
  }

  getDefaultPermissionStatus(permission: string): PermissionStatus {
    return {
      ...this.caches.defaultStatus.get(DEFAULTS, permission, () =>
        super.getDefaultPermissionStatus(permission)
      ),
    };
  }

  getUserPermissionArg(userId: ID, permission: string): string | undefined {
    return this.caches.userArg.get(this.idToString(userId), permission, () =>
      super.getUserPermissionArg(userId, permission)
    );
  }

  getGroupPermissionArg(groupName: string, permission: string): string | undefined {
    return this.caches.groupArg.get(groupName, permission, () =>
      super.getGroupPermissionArg(groupName, permission)
    );
  }

  getDefaultPermissionArg(permission: string): string | undefined {
    return this.caches.defaultArg.get(DEFAULTS, permission, () =>
      super.getDefaultPermissionArg(permission)
    );
  }

  userHasAllPermissions(userId: ID, permissions: string[]): boolean {
    return this.caches.userHasAll.get(this.idToString(userId), listKey(permissions), () =>
      super.userHasAllPermissions(userId, permissions)
    );
  }

  userHasAnyPermissions(userId: ID, permissions: string[]): boolean {
    return this.caches.userHasAny.get(this.idToString(userId), listKey(permissions), () =>
      super.userHasAnyPermissions(userId, permissions)
    );
  }

  groupHasAllPermissions(groupName: string, permissions: string[]): boolean {
    return this.caches.groupHasAll.get(groupName, listKey(permissions), () =>
      super.groupHasAllPermissions(groupName, permissions)
    );
  }

  groupHasAnyPermissions(groupName: string, permissions: string[]): boolean {
    return this.caches.groupHasAny.get(groupName, listKey(permissions), () =>
      super.groupHasAnyPermissions(groupName, permissions)
    );
  }

  userHasAnySubPermissionOf(userId: ID, permission: string): boolean {
    return this.caches.userHasAnySub.get(this.idToString(userId), permission, () =>
      super.userHasAnySubPermissionOf(userId, permission)
    );
  }

  groupHasAnySubPermissionOf(groupName: string, permission: string): boolean {
    return this.caches.groupHasAnySub.get(groupName, permission, () =>
      super.groupHasAnySubPermissionOf(groupName, permission)
    );
  }

  isOrAnySubPermissionOfIsDefault(permission: string): boolean {
    return this.caches.defaultHasAnySub.get(DEFAULTS, permission, () =>
      super.isOrAnySubPermissionOfIsDefault(permission)
    );
  }

  userHasGroup(userId: ID, groupName: string): boolean {
    return this.caches.userHasGroup.get(this.idToString(userId), groupName, () =>
      super.userHasGroup(userId, groupName)
    );
  }

  groupExtendsFromGroup(groupName: string, superGroupName: string): boolean {
    return this.caches.groupExtends.get(groupName, superGroupName, () =>
      super.groupExtendsFromGroup(groupName, superGroupName)
    );
  }

  isDefaultGroup(groupName: string): boolean {
    return this.caches.defaultGroup.get(DEFAULTS, groupName, () =>
      super.isDefaultGroup(groupName)
    );
  }

  assignUserPermission(userId: ID, permission: string): PermissionPath | undefined {
    return this.changing(() => super.assignUserPermission(userId, permission));
  }

  assignGroupPermission(groupName: string, permission: string): PermissionPath | undefined {
    return this.changing(() => super.assignGroupPermission(groupName, permission));
  }

  assignDefaultPermission(permission: string): PermissionPath | undefined {
    return this.changing(() => super.assignDefaultPermission(permission));
  }

  assignUserPermissions(userId: ID, permissions: string[]): void {
    this.changing(() => super.assignUserPermissions(userId, permissions));
  }

  assignGroupPermissions(groupName: string, permissions: string[]): void {
    this.changing(() => super.assignGroupPermissions(groupName, permissions));
  }

  assignDefaultPermissions(permissions: string[]): void {
    this.changing(() => super.assignDefaultPermissions(permissions));
  }

  revokeUserPermission(userId: ID, permission: string): PermissionPath | undefined {
    return this.changing(() => super.revokeUserPermission(userId, permission));
  }

  revokeGroupPermission(groupName: string, permission: string): PermissionPath | undefined {
    return this.changing(() => super.revokeGroupPermission(groupName, permission));
  }

  revokeDefaultPermission(permission: string): PermissionPath | undefined {
    return this.changing(() => super.revokeDefaultPermission(permission));
  }

  revokeAllUserPermissions(userId: ID): PermissionPath[] {
    return this.changing(() => super.revokeAllUserPermissions(userId));
  }

  revokeAllGroupPermissions(groupName: string): PermissionPath[] {
    return this.changing(() => super.revokeAllGroupPermissions(groupName));
  }

  revokeAllDefaultPermissions(): PermissionPath[] {
    return this.changing(() => super.revokeAllDefaultPermissions());
  }

  assignGroupToUser(userId: ID, groupName: string): void {
    this.changing(() => super.assignGroupToUser(userId, groupName));
  }

  assignGroupToGroup(groupName: string, superGroupName: string): void {
    this.changing(() => super.assignGroupToGroup(groupName, superGroupName));
  }

  assignDefaultGroup(groupName: string): void {
    this.changing(() => super.assignDefaultGroup(groupName));
  }

  assignGroupsToUser(userId: ID, groupNames: string[]): void {
    this.changing(() => super.assignGroupsToUser(userId, groupNames));
  }

  assignGroupsToGroup(groupName: string, superGroupNames: string[]): void {
    this.changing(() => super.assignGroupsToGroup(groupName, superGroupNames));
  }

  assignDefaultGroups(groupNames: string[]): void {
    this.changing(() => super.assignDefaultGroups(groupNames));
  }

  revokeGroupFromUser(userId: ID, groupName: string): boolean {
    return this.changing(() => super.revokeGroupFromUser(userId, groupName));
  }

  revokeGroupFromGroup(groupName: string, superGroupName: string): boolean {
    return this.changing(() => super.revokeGroupFromGroup(groupName, superGroupName));
  }

  revokeDefaultGroup(groupName: string): boolean {
    return this.changing(() => super.revokeDefaultGroup(groupName));
  }

  revokeAllGroupsFromUser(userId: ID): string[] {
    return this.changing(() => super.revokeAllGroupsFromUser(userId));
  }

  revokeAllGroupsFromGroup(groupName: string): string[] {
    return this.changing(() => super.revokeAllGroupsFromGroup(groupName));
  }

  revokeAllDefaultGroups(): string[] {
    return this.changing(() => super.revokeAllDefaultGroups());
  }

  clear(): void {
    this.changing(() => super.clear());
  }

  clearUser(userId: ID): void {
    this.changing(() => super.clearUser(userId));
  }

  clearGroup(groupName: string): void {
    this.changing(() => super.clearGroup(groupName));
  }

  clearDefaults(): void {
    this.changing(() => super.clearDefaults());
  }

  loadSnapshot(snapshot: PermissionsSnapshot): void {
    this.changing(() => super.loadSnapshot(snapshot));
  }

  private changing<T>(change: () => T): T {
    try {
      return change();
    } finally {
      this.clearCache();
    }
  }
}

export { CachedPermissionsRegistry };
export default CachedPermissionsRegistry;
