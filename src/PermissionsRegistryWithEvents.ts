import { EventEmitter } from 'eventemitter3';
import {
  EventSubject,
  PermissionsChangedEventArgs,
  PermissionsClearedEventArgs,
  PermissionsEventArgs,
  PermissionsRegistryEvents,
  aboutAll,
  aboutDefaults,
  aboutGroup,
  aboutUser,
} from './events';
import { PermissionPath } from './PermissionPath';
import {
  PermissionsRegistryApi,
  PermissionsRegistryDecorator,
} from './PermissionsRegistryDecorator';
import { PermissionsSnapshot } from './snapshot';

type EventName = keyof PermissionsRegistryEvents<unknown>;

/**
 * A registry that raises an event after every change made through it.
 * Listeners are called synchronously, once the change has been made, in the
 * order they were added. Every event is raised a second time as `changed`.
 *
 * @example
 * ```ts
 * const registry = new PermissionsRegistryWithEvents(
 *   PermissionsRegistry.withStringIds()
 * );
 * registry.on('changed', (args) => {
 *   if (registry.userWasAffected(args, '123')) {
 *     refreshMenu('123');
 *   }
 * });
 * registry.assignGroupToUser('123', 'editors'); // refreshes
 * ```
 */
class PermissionsRegistryWithEvents<ID> extends PermissionsRegistryDecorator<ID> {
  private emitter = new EventEmitter();
  /** Who had a group just before it was cleared, keyed by the `cleared` args. */
  private clearedGroupMembers = new WeakMap<
    PermissionsChangedEventArgs<ID>,
    { everyone: boolean; userKeys: Set<string> }
  >();

  constructor(inner: PermissionsRegistryApi<ID>) {
    super(inner);
  }

  on<E extends EventName>(event: E, listener: PermissionsRegistryEvents<ID>[E]): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<E extends EventName>(event: E, listener: PermissionsRegistryEvents<ID>[E]): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<E extends EventName>(event: E, listener?: PermissionsRegistryEvents<ID>[E]): this {
    this.emitter.off(event, listener);
    return this;
  }

  /**
   * Whether a change could have changed what the user is permitted to do.
   * Changes to the defaults and to the whole registry affect everyone;
   * changes to a group affect the users that are in it, or were in it just
   * before it was cleared.
   */
  userWasAffected(args: PermissionsChangedEventArgs<ID>, userId: ID): boolean {
    switch (args.target) {
      case 'ALL':
      case 'DEFAULT_PERMISSIONS':
        return true;
      case 'USER':
        return (
          args.userTargeted !== undefined &&
          this.idToString(args.userTargeted) === this.idToString(userId)
        );
      case 'GROUP': {
        const members = this.clearedGroupMembers.get(args);
        if (members) {
          return members.everyone || members.userKeys.has(this.idToString(userId));
        }
        return (
          args.groupTargeted !== undefined &&
          this.userHasGroup(userId, args.groupTargeted)
        );
      }
    }
  }

  assignUserPermission(userId: ID, permission: string): PermissionPath | undefined {
    const previous = super.assignUserPermission(userId, permission);
    this.permissionAssigned(aboutUser(userId), permission, previous);
    return previous;
  }

  assignGroupPermission(groupName: string, permission: string): PermissionPath | undefined {
    const previous = super.assignGroupPermission(groupName, permission);
    this.permissionAssigned(aboutGroup<ID>(groupName), permission, previous);
    return previous;
  }

  assignDefaultPermission(permission: string): PermissionPath | undefined {
    const previous = super.assignDefaultPermission(permission);
    this.permissionAssigned(aboutDefaults<ID>(), permission, previous);
    return previous;
  }

  assignUserPermissions(userId: ID, permissions: string[]): void {
    permissions.forEach((permission) => PermissionPath.parse(permission));
    permissions.forEach((permission) => this.assignUserPermission(userId, permission));
  }

  assignGroupPermissions(groupName: string, permissions: string[]): void {
    permissions.forEach((permission) => PermissionPath.parse(permission));
    permissions.forEach((permission) =>
      this.assignGroupPermission(groupName, permission)
    );
  }

  assignDefaultPermissions(permissions: string[]): void {
    permissions.forEach((permission) => PermissionPath.parse(permission));
    permissions.forEach((permission) => this.assignDefaultPermission(permission));
  }

  revokeUserPermission(userId: ID, permission: string): PermissionPath | undefined {
    const revoked = super.revokeUserPermission(userId, permission);
    this.permissionRevoked(aboutUser(userId), permission, revoked);
    return revoked;
  }

  revokeGroupPermission(groupName: string, permission: string): PermissionPath | undefined {
    const revoked = super.revokeGroupPermission(groupName, permission);
    this.permissionRevoked(aboutGroup<ID>(groupName), permission, revoked);
    return revoked;
  }

  revokeDefaultPermission(permission: string): PermissionPath | undefined {
    const revoked = super.revokeDefaultPermission(permission);
    this.permissionRevoked(aboutDefaults<ID>(), permission, revoked);
    return revoked;
  }

  revokeAllUserPermissions(userId: ID): PermissionPath[] {
    const revoked = super.revokeAllUserPermissions(userId);
    revoked.forEach((entry) =>
      this.permissionRevoked(aboutUser(userId), entry.toString(), entry)
    );
    return revoked;
  }

  revokeAllGroupPermissions(groupName: string): PermissionPath[] {
    const revoked = super.revokeAllGroupPermissions(groupName);
    revoked.forEach((entry) =>
      this.permissionRevoked(aboutGroup<ID>(groupName), entry.toString(), entry)
    );
    return revoked;
  }

  revokeAllDefaultPermissions(): PermissionPath[] {
    const revoked = super.revokeAllDefaultPermissions();
    revoked.forEach((entry) =>
      this.permissionRevoked(aboutDefaults<ID>(), entry.toString(), entry)
    );
    return revoked;
  }

  assignGroupToUser(userId: ID, groupName: string): void {
    super.assignGroupToUser(userId, groupName);
    this.groupAssigned(aboutUser(userId), groupName);
  }

  assignGroupToGroup(groupName: string, superGroupName: string): void {
    super.assignGroupToGroup(groupName, superGroupName);
    this.groupAssigned(aboutGroup<ID>(groupName), superGroupName);
  }

  assignDefaultGroup(groupName: string): void {
    super.assignDefaultGroup(groupName);
    this.groupAssigned(aboutDefaults<ID>(), groupName);
  }

  assignGroupsToUser(userId: ID, groupNames: string[]): void {
    super.assignGroupsToUser(userId, groupNames);
    groupNames.forEach((groupName) => this.groupAssigned(aboutUser(userId), groupName));
  }

  assignGroupsToGroup(groupName: string, superGroupNames: string[]): void {
    super.assignGroupsToGroup(groupName, superGroupNames);
    superGroupNames.forEach((superGroupName) =>
      this.groupAssigned(aboutGroup<ID>(groupName), superGroupName)
    );
  }

  assignDefaultGroups(groupNames: string[]): void {
    super.assignDefaultGroups(groupNames);
    groupNames.forEach((groupName) => this.groupAssigned(aboutDefaults<ID>(), groupName));
  }

  revokeGroupFromUser(userId: ID, groupName: string): boolean {
    const wasRevoked = super.revokeGroupFromUser(userId, groupName);
    this.groupRevoked(aboutUser(userId), groupName, wasRevoked);
    return wasRevoked;
  }

  revokeGroupFromGroup(groupName: string, superGroupName: string): boolean {
    const wasRevoked = super.revokeGroupFromGroup(groupName, superGroupName);
    this.groupRevoked(aboutGroup<ID>(groupName), superGroupName, wasRevoked);
    return wasRevoked;
  }

  revokeDefaultGroup(groupName: string): boolean {
    const wasRevoked = super.revokeDefaultGroup(groupName);
    this.groupRevoked(aboutDefaults<ID>(), groupName, wasRevoked);
    return wasRevoked;
  }

  revokeAllGroupsFromUser(userId: ID): string[] {
    const revoked = super.revokeAllGroupsFromUser(userId);
    revoked.forEach((groupName) => this.groupRevoked(aboutUser(userId), groupName, true));
    return revoked;
  }

  revokeAllGroupsFromGroup(groupName: string): string[] {
    const revoked = super.revokeAllGroupsFromGroup(groupName);
    revoked.forEach((superGroupName) =>
      this.groupRevoked(aboutGroup<ID>(groupName), superGroupName, true)
    );
    return revoked;
  }

  revokeAllDefaultGroups(): string[] {
    const revoked = super.revokeAllDefaultGroups();
    revoked.forEach((groupName) => this.groupRevoked(aboutDefaults<ID>(), groupName, true));
    return revoked;
  }

  clear(): void {
    super.clear();
    this.raise({ ...argsAbout(aboutAll<ID>()), kind: 'cleared' });
  }

  clearUser(userId: ID): void {
    super.clearUser(userId);
    this.raise({ ...argsAbout(aboutUser(userId)), kind: 'cleared' });
  }

  clearGroup(groupName: string): void {
    const members = {
      everyone: this.isDefaultGroup(groupName),
      userKeys: new Set(
        this.getUsers()
          .filter((userId) => this.userHasGroup(userId, groupName))
          .map((userId) => this.idToString(userId))
      ),
    };
    super.clearGroup(groupName);
    const args: PermissionsClearedEventArgs<ID> = {
      ...argsAbout(aboutGroup<ID>(groupName)),
      kind: 'cleared',
    };
    this.clearedGroupMembers.set(args, members);
    this.raise(args);
  }

  clearDefaults(): void {
    super.clearDefaults();
    this.raise({ ...argsAbout(aboutDefaults<ID>()), kind: 'cleared' });
  }

  loadSnapshot(snapshot: PermissionsSnapshot): void {
    super.loadSnapshot(snapshot);
    this.raise({ ...argsAbout(aboutAll<ID>()), kind: 'loaded' });
  }

  private permissionAssigned(
    subject: EventSubject<ID>,
    permission: string,
    previous: PermissionPath | undefined
  ): void {
    this.raise({
      ...argsAbout(subject),
      kind: 'permissionAssigned',
      permission,
      previous,
    });
  }

  private permissionRevoked(
    subject: EventSubject<ID>,
    permission: string,
    revoked: PermissionPath | undefined
  ): void {
    this.raise({
      ...argsAbout(subject),
      kind: 'permissionRevoked',
      permission,
      revoked,
    });
  }

  private groupAssigned(subject: EventSubject<ID>, groupId: string): void {
    this.raise({ ...argsAbout(subject), kind: 'groupAssigned', groupId });
  }

  private groupRevoked(
    subject: EventSubject<ID>,
    groupId: string,
    wasRevoked: boolean
  ): void {
    this.raise({ ...argsAbout(subject), kind: 'groupRevoked', groupId, wasRevoked });
  }

  // Event names match the `kind` of their args.
  private raise(args: PermissionsEventArgs<ID>): void {
    const frozen = Object.freeze(args);
    this.emitter.emit(frozen.kind, frozen);
    this.emitter.emit('changed', frozen);
  }
}

function argsAbout<ID>(subject: EventSubject<ID>): PermissionsChangedEventArgs<ID> {
  return {
    target: subject.target,
    userTargeted: subject.userTargeted,
    groupTargeted: subject.groupTargeted,
  };
}

export { PermissionsRegistryWithEvents };
export default PermissionsRegistryWithEvents;
