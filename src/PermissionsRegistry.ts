import {
  InvalidGroupNameError,
  InvalidOperationError,
  MissingPermissionError,
} from './errors';
import {
  GroupMembershipGraph,
  Member,
  groupMember,
  userMember,
} from './GroupMembershipGraph';
import { PermissionPath } from './PermissionPath';
import { PermissionMatch, PermissionSet } from './PermissionSet';
import {
  PermissionsSnapshot,
  SubjectSnapshot,
  validateSnapshot,
} from './snapshot';

export interface PermissionsRegistryOptions<ID> {
  idToString: (id: ID) => string;
  idFromString: (text: string) => ID;
}

export interface PermissionStatus {
  permission: string;
  hasPermission: boolean;
  argument: string | undefined;
}

interface UserEntry<ID> {
  id: ID;
  permissions: PermissionSet;
}

/**
 * Where a query looks, in order: the subject's own set, then its groups in
 * traversal order, then the fallback if none of those said anything.
 */
interface Sources {
  own: PermissionSet | undefined;
  groups: string[];
  fallback: PermissionSet | undefined;
}

const GROUP_NAME = /^[\p{L}\p{N}]+$/u;

/**
 * Holds the permissions of users, groups and the defaults, and the groups
 * each of them belongs to.
 *
 * Users are identified by any id type; the two converters map ids to and
 * from the strings the registry keys them by and saves them as.
 *
 * @example
 * ```ts
 * const registry = PermissionsRegistry.withStringIds();
 * registry.assignGroupPermission('editors', 'articles.*');
 * registry.assignGroupToUser('123', 'editors');
 * registry.hasPermission('123', 'articles.write'); // true
 * ```
 */
class PermissionsRegistry<ID> {
  private users: Map<string, UserEntry<ID>> = new Map();
  private groups: Map<string, PermissionSet> = new Map();
  private defaults: PermissionSet = new PermissionSet();
  private memberships: GroupMembershipGraph = new GroupMembershipGraph();
  private options: PermissionsRegistryOptions<ID>;

  constructor(options: PermissionsRegistryOptions<ID>) {
    this.options = options;
  }

  static withStringIds(): PermissionsRegistry<string> {
    return new PermissionsRegistry<string>({
      idToString: (id) => id,
      idFromString: (text) => text,
    });
  }

  public idToString(id: ID): string {
    return this.options.idToString(id);
  }

  public idFromString(text: string): ID {
    return this.options.idFromString(text);
  }

  /**
   * Checks whether a user has a permission.
   *
   * The most specific entry covering the permission wins, whether it's the
   * user's own or one of their groups'. At equal specificity the user's own
   * entry wins, then groups in the order they're reached. The default
   * permissions are only consulted when none of those cover it.
   *
   * @param userId - The user to check; unknown users only have the defaults
   * @param permission - The permission to check (e.g. 'articles.write')
   * @throws InvalidPathError if the permission is malformed
   *
   * @example
   * ```ts
   * registry.assignUserPermission('123', 'articles');
   * registry.hasPermission('123', 'articles.write'); // true
   * ```
   */
  public hasPermission(userId: ID, permission: string): boolean {
    return this.resolveForUser(userId, permission)?.permits ?? false;
  }

  public groupHasPermission(groupName: string, permission: string): boolean {
    return this.resolveForGroup(groupName, permission)?.permits ?? false;
  }

  public isDefaultPermission(permission: string): boolean {
    return this.resolveForDefaults(permission)?.permits ?? false;
  }

  /**
   * Like {@link hasPermission}, also returning the argument of the entry
   * that decided it.
   *
   * @example
   * ```ts
   * registry.assignUserPermission('123', 'articles.publish: drafts');
   * registry.getUserPermissionStatus('123', 'articles.publish');
   * // { permission: 'articles.publish', hasPermission: true, argument: 'drafts' }
   * ```
   */
  public getUserPermissionStatus(userId: ID, permission: string): PermissionStatus {
    return toStatus(permission, this.resolveForUser(userId, permission));
  }

  public getGroupPermissionStatus(
    groupName: string,
    permission: string
  ): PermissionStatus {
    return toStatus(permission, this.resolveForGroup(groupName, permission));
  }

  public getDefaultPermissionStatus(permission: string): PermissionStatus {
    return toStatus(permission, this.resolveForDefaults(permission));
  }

  public getUserPermissionArg(userId: ID, permission: string): string | undefined {
    return this.resolveForUser(userId, permission)?.argument;
  }

  public getGroupPermissionArg(
    groupName: string,
    permission: string
  ): string | undefined {
    return this.resolveForGroup(groupName, permission)?.argument;
  }

  public getDefaultPermissionArg(permission: string): string | undefined {
    return this.resolveForDefaults(permission)?.argument;
  }

  /**
   * Checks if a user has ALL of the specified permissions.
   *
   * @example
   * ```ts
   * registry.userHasAllPermissions('123', ['articles.read', 'articles.write']);
   * ```
   */
  public userHasAllPermissions(userId: ID, permissions: string[]): boolean {
    return permissions.every((permission) =>
      this.hasPermission(userId, permission)
    );
  }

  /**
   * Checks if a user has ANY of the specified permissions.
   */
  public userHasAnyPermissions(userId: ID, permissions: string[]): boolean {
    return permissions.some((permission) =>
      this.hasPermission(userId, permission)
    );
  }

  public groupHasAllPermissions(groupName: string, permissions: string[]): boolean {
    return permissions.every((permission) =>
      this.groupHasPermission(groupName, permission)
    );
  }

  public groupHasAnyPermissions(groupName: string, permissions: string[]): boolean {
    return permissions.some((permission) =>
      this.groupHasPermission(groupName, permission)
    );
  }

  /**
   * Checks whether a user has the permission, or any permission under it.
   * Useful for deciding whether to show a section that has only some of its
   * actions allowed.
   *
   * @example
   * ```ts
   * registry.assignUserPermission('123', 'articles.comments.moderate');
   * registry.userHasAnySubPermissionOf('123', 'articles'); // true
   * registry.hasPermission('123', 'articles');             // false
   * ```
   */
  public userHasAnySubPermissionOf(userId: ID, permission: string): boolean {
    return this.hasAnySubPermissionOf(this.userSources(userId), permission);
  }

  public groupHasAnySubPermissionOf(groupName: string, permission: string): boolean {
    return this.hasAnySubPermissionOf(this.groupSources(groupName), permission);
  }

  public isOrAnySubPermissionOfIsDefault(permission: string): boolean {
    return this.hasAnySubPermissionOf(this.defaultSources(), permission);
  }

  /**
   * @throws MissingPermissionError if the user doesn't have the permission
   */
  public assertUserHasPermission(userId: ID, permission: string): void {
    if (!this.hasPermission(userId, permission)) {
      throw new MissingPermissionError(
        permission,
        'USER',
        this.idToString(userId)
      );
    }
  }

  public assertGroupHasPermission(groupName: string, permission: string): void {
    if (!this.groupHasPermission(groupName, permission)) {
      throw new MissingPermissionError(permission, 'GROUP', groupName);
    }
  }

  public assertIsDefaultPermission(permission: string): void {
    if (!this.isDefaultPermission(permission)) {
      throw new MissingPermissionError(permission, 'DEFAULT_PERMISSIONS');
    }
  }

  /**
   * Checks whether the user is in a group, directly, through other groups,
   * or through the default groups.
   */
  public userHasGroup(userId: ID, groupName: string): boolean {
    return this.getAllGroupsOfUser(userId).includes(groupName);
  }

  public groupExtendsFromGroup(groupName: string, superGroupName: string): boolean {
    return this.memberships
      .getAllGroupsOf(groupMember(groupName))
      .includes(superGroupName);
  }

  public isDefaultGroup(groupName: string): boolean {
    return this.memberships.getAllDefaultGroups().includes(groupName);
  }

  public getUsers(): ID[] {
    return [...this.users.values()].map((user) => user.id);
  }

  public getGroupNames(): string[] {
    return [...this.groups.keys()].sort();
  }

  /**
   * Returns the user's own permissions, sorted, as they'd be written in a
   * permissions file.
   *
   * @example
   * ```ts
   * registry.getUserPermissions('123', true);
   * // Returns: ['articles.publish: drafts', '-articles.delete']
   * ```
   */
  public getUserPermissions(userId: ID, includeArgs = false): string[] {
    const user = this.users.get(this.idToString(userId));
    return user ? user.permissions.getPermissions(includeArgs) : [];
  }

  public getGroupPermissions(groupName: string, includeArgs = false): string[] {
    return this.groups.get(groupName)?.getPermissions(includeArgs) ?? [];
  }

  public getDefaultPermissions(includeArgs = false): string[] {
    return this.defaults.getPermissions(includeArgs);
  }

  public getGroupsOfUser(userId: ID): string[] {
    return this.memberships.getGroupsOf(userMember(this.idToString(userId)));
  }

  public getGroupsOfGroup(groupName: string): string[] {
    return this.memberships.getGroupsOf(groupMember(groupName));
  }

  public getDefaultGroups(): string[] {
    return this.memberships.getDefaultGroups();
  }

  /**
   * Every group the user belongs to, in the order they're consulted when
   * resolving permissions.
   */
  public getAllGroupsOfUser(userId: ID): string[] {
    return this.memberships.getAllGroupsOf(userMember(this.idToString(userId)));
  }

  /**
   * Grants a permission to a user, replacing anything the user had at the
   * same path. A leading `-` stores it as a negation instead.
   *
   * @returns the entry it replaced, if any
   * @throws InvalidPathError if the permission is malformed
   *
   * @example
   * ```ts
   * registry.assignUserPermission('123', 'articles.publish: drafts');
   * registry.assignUserPermission('123', '-articles.delete');
   * ```
   */
  public assignUserPermission(userId: ID, permission: string): PermissionPath | undefined {
    const path = PermissionPath.parse(permission);
    return this.getOrCreateUser(userId).permissions.set(path);
  }

  public assignGroupPermission(
    groupName: string,
    permission: string
  ): PermissionPath | undefined {
    const path = PermissionPath.parse(permission);
    return this.getOrCreateGroup(groupName).set(path);
  }

  public assignDefaultPermission(permission: string): PermissionPath | undefined {
    return this.defaults.set(PermissionPath.parse(permission));
  }

  public assignUserPermissions(userId: ID, permissions: string[]): void {
    const paths = permissions.map((permission) => PermissionPath.parse(permission));
    if (paths.length === 0) {
      return;
    }
    const user = this.getOrCreateUser(userId);
    paths.forEach((path) => user.permissions.set(path));
  }

  public assignGroupPermissions(groupName: string, permissions: string[]): void {
    const paths = permissions.map((permission) => PermissionPath.parse(permission));
    if (paths.length === 0) {
      return;
    }
    const group = this.getOrCreateGroup(groupName);
    paths.forEach((path) => group.set(path));
  }

  public assignDefaultPermissions(permissions: string[]): void {
    const paths = permissions.map((permission) => PermissionPath.parse(permission));
    paths.forEach((path) => this.defaults.set(path));
  }

  /**
   * Removes the user's entry at exactly this path. The argument and any
   * leading `-` are ignored. Revoking something that isn't there does
   * nothing.
   *
   * @returns the entry that was removed, if any
   *
   * @example
   * ```ts
   * registry.assignUserPermission('123', 'articles.publish: drafts');
   * registry.revokeUserPermission('123', 'articles.publish');
   * registry.hasPermission('123', 'articles.publish'); // false
   * ```
   */
  public revokeUserPermission(userId: ID, permission: string): PermissionPath | undefined {
    const path = PermissionPath.parse(permission);
    const key = this.idToString(userId);
    const user = this.users.get(key);
    if (!user) {
      return undefined;
    }
    const revoked = user.permissions.revoke(path);
    this.pruneUser(key);
    return revoked;
  }

  public revokeGroupPermission(
    groupName: string,
    permission: string
  ): PermissionPath | undefined {
    const path = PermissionPath.parse(permission);
    const group = this.groups.get(groupName);
    if (!group) {
      return undefined;
    }
    const revoked = group.revoke(path);
    this.pruneGroup(groupName);
    return revoked;
  }

  public revokeDefaultPermission(permission: string): PermissionPath | undefined {
    return this.defaults.revoke(PermissionPath.parse(permission));
  }

  /**
   * @returns the entries that were removed
   */
  public revokeAllUserPermissions(userId: ID): PermissionPath[] {
    const key = this.idToString(userId);
    const user = this.users.get(key);
    if (!user) {
      return [];
    }
    const revoked = user.permissions.entries();
    user.permissions.clear();
    this.pruneUser(key);
    return revoked;
  }

  public revokeAllGroupPermissions(groupName: string): PermissionPath[] {
    const group = this.groups.get(groupName);
    if (!group) {
      return [];
    }
    const revoked = group.entries();
    group.clear();
    this.pruneGroup(groupName);
    return revoked;
  }

  public revokeAllDefaultPermissions(): PermissionPath[] {
    const revoked = this.defaults.entries();
    this.defaults.clear();
    return revoked;
  }

  /**
   * Makes the user a member of a group, creating either if needed.
   *
   * @throws InvalidGroupNameError if the group name isn't letters and digits
   */
  public assignGroupToUser(userId: ID, groupName: string): void {
    assertGroupName(groupName);
    this.getOrCreateUser(userId);
    this.getOrCreateGroup(groupName);
    this.memberships.addEdge(userMember(this.idToString(userId)), groupName);
  }

  /**
   * Makes one group a member of another, so it inherits the other's
   * permissions. Cycles are allowed; each group is still only consulted once
   * per query.
   *
   * @example
   * ```ts
   * registry.assignGroupPermission('staff', 'intranet');
   * registry.assignGroupToGroup('editors', 'staff');
   * registry.groupHasPermission('editors', 'intranet.news'); // true
   * ```
   */
  public assignGroupToGroup(groupName: string, superGroupName: string): void {
    assertGroupName(groupName);
    assertGroupName(superGroupName);
    this.getOrCreateGroup(groupName);
    this.getOrCreateGroup(superGroupName);
    this.memberships.addEdge(groupMember(groupName), superGroupName);
  }

  public assignDefaultGroup(groupName: string): void {
    this.getOrCreateGroup(groupName);
    this.memberships.addDefaultGroup(groupName);
  }

  public assignGroupsToUser(userId: ID, groupNames: string[]): void {
    groupNames.forEach(assertGroupName);
    groupNames.forEach((groupName) => this.assignGroupToUser(userId, groupName));
  }

  public assignGroupsToGroup(groupName: string, superGroupNames: string[]): void {
    superGroupNames.forEach(assertGroupName);
    superGroupNames.forEach((superGroupName) =>
      this.assignGroupToGroup(groupName, superGroupName)
    );
  }

  public assignDefaultGroups(groupNames: string[]): void {
    groupNames.forEach(assertGroupName);
    groupNames.forEach((groupName) => this.assignDefaultGroup(groupName));
  }

  /**
   * @returns whether the user was directly in the group
   */
  public revokeGroupFromUser(userId: ID, groupName: string): boolean {
    const key = this.idToString(userId);
    const removed = this.memberships.removeEdge(userMember(key), groupName);
    this.pruneUser(key);
    this.pruneGroup(groupName);
    return removed;
  }

  public revokeGroupFromGroup(groupName: string, superGroupName: string): boolean {
    const removed = this.memberships.removeEdge(
      groupMember(groupName),
      superGroupName
    );
    this.pruneGroup(groupName);
    this.pruneGroup(superGroupName);
    return removed;
  }

  public revokeDefaultGroup(groupName: string): boolean {
    const removed = this.memberships.removeDefaultGroup(groupName);
    this.pruneGroup(groupName);
    return removed;
  }

  /**
   * @returns the groups the user was directly in
   */
  public revokeAllGroupsFromUser(userId: ID): string[] {
    const key = this.idToString(userId);
    const revoked = this.memberships.removeMember(userMember(key));
    this.pruneUser(key);
    revoked.forEach((groupName) => this.pruneGroup(groupName));
    return revoked;
  }

  public revokeAllGroupsFromGroup(groupName: string): string[] {
    const revoked = this.memberships.removeMember(groupMember(groupName));
    this.pruneGroup(groupName);
    revoked.forEach((superGroupName) => this.pruneGroup(superGroupName));
    return revoked;
  }

  public revokeAllDefaultGroups(): string[] {
    const revoked = this.memberships.getDefaultGroups();
    revoked.forEach((groupName) => {
      this.memberships.removeDefaultGroup(groupName);
      this.pruneGroup(groupName);
    });
    return revoked;
  }

  /**
   * Removes everything: users, groups, default permissions and default
   * groups.
   */
  public clear(): void {
    this.users.clear();
    this.groups.clear();
    this.defaults.clear();
    this.memberships.clear();
  }

  public clearUser(userId: ID): void {
    const key = this.idToString(userId);
    const groupNames = this.memberships.removeMember(userMember(key));
    this.users.delete(key);
    groupNames.forEach((groupName) => this.pruneGroup(groupName));
  }

  /**
   * Removes a group along with every membership of and in it. Users and
   * groups left with nothing are removed too.
   */
  public clearGroup(groupName: string): void {
    if (!this.groups.has(groupName)) {
      return;
    }
    const superGroupNames = this.memberships.removeMember(groupMember(groupName));
    const emptied = this.memberships.removeGroupEverywhere(groupName);
    this.groups.delete(groupName);
    emptied.forEach((member) => this.pruneMember(member));
    superGroupNames.forEach((superGroupName) => this.pruneGroup(superGroupName));
  }

  public clearDefaults(): void {
    this.defaults.clear();
    this.revokeAllDefaultGroups();
  }

  /**
   * Returns the registry's contents in the shape of a permissions file.
   */
  public toSnapshot(): PermissionsSnapshot {
    const snapshot: PermissionsSnapshot = {};

    if (!this.defaults.isEmpty() || this.memberships.getDefaultGroups().length > 0) {
      snapshot.defaults = toSubject(this.defaults, this.memberships.getDefaultGroups());
    }

    // Keys are own properties even for an id like `__proto__`.
    if (this.groups.size > 0) {
      snapshot.groups = Object.fromEntries(
        this.getGroupNames().map((groupName): [string, SubjectSnapshot] => [
          groupName,
          toSubject(
            this.groups.get(groupName) ?? new PermissionSet(),
            this.memberships.getGroupsOf(groupMember(groupName))
          ),
        ])
      );
    }

    if (this.users.size > 0) {
      snapshot.users = Object.fromEntries(
        [...this.users].map(([key, user]): [string, SubjectSnapshot] => [
          key,
          toSubject(user.permissions, this.memberships.getGroupsOf(userMember(key))),
        ])
      );
    }

    return snapshot;
  }

  /**
   * Replaces the registry's contents with a snapshot. Everything in the
   * snapshot is checked before anything is changed, so a bad snapshot leaves
   * the registry as it was.
   *
   * @throws InvalidSnapshotError, InvalidPathError, InvalidGroupNameError or
   *         InvalidOperationError if the snapshot can't be loaded
   */
  public loadSnapshot(value: PermissionsSnapshot): void {
    const snapshot = validateSnapshot(value);
    const defaults = parseSubject(snapshot.defaults);
    const groups = Object.entries(snapshot.groups ?? {}).map(
      ([groupName, subject]) => {
        assertGroupName(groupName);
        return { groupName, ...parseSubject(subject) };
      }
    );
    const users = Object.entries(snapshot.users ?? {}).map(([key, subject]) => {
      const id = this.idFromString(key);
      this.assertIdRoundTrips(id);
      return { id, ...parseSubject(subject) };
    });

    this.clear();

    for (const { groupName, paths, groupNames } of groups) {
      const group = this.getOrCreateGroup(groupName);
      paths.forEach((path) => group.set(path));
      groupNames.forEach((superGroupName) =>
        this.assignGroupToGroup(groupName, superGroupName)
      );
    }
    for (const { id, paths, groupNames } of users) {
      if (paths.length === 0 && groupNames.length === 0) {
        continue;
      }
      const user = this.getOrCreateUser(id);
      paths.forEach((path) => user.permissions.set(path));
      groupNames.forEach((groupName) => this.assignGroupToUser(id, groupName));
    }
    defaults.paths.forEach((path) => this.defaults.set(path));
    defaults.groupNames.forEach((groupName) => this.assignDefaultGroup(groupName));

    [...this.groups.keys()].forEach((groupName) => this.pruneGroup(groupName));
  }

  private userSources(userId: ID): Sources {
    const key = this.idToString(userId);
    return {
      own: this.users.get(key)?.permissions,
      groups: this.memberships.getAllGroupsOf(userMember(key)),
      fallback: this.defaults,
    };
  }

  private groupSources(groupName: string): Sources {
    return {
      own: this.groups.get(groupName),
      groups: this.memberships.getAllGroupsOf(groupMember(groupName)),
      fallback: undefined,
    };
  }

  private defaultSources(): Sources {
    return {
      own: this.defaults,
      groups: this.memberships.getAllDefaultGroups(),
      fallback: undefined,
    };
  }

  private resolveForUser(userId: ID, permission: string): PermissionMatch | undefined {
    return this.resolve(this.userSources(userId), PermissionPath.parseQuery(permission));
  }

  private resolveForGroup(
    groupName: string,
    permission: string
  ): PermissionMatch | undefined {
    return this.resolve(
      this.groupSources(groupName),
      PermissionPath.parseQuery(permission)
    );
  }

  private resolveForDefaults(permission: string): PermissionMatch | undefined {
    return this.resolve(this.defaultSources(), PermissionPath.parseQuery(permission));
  }

  private resolve(sources: Sources, query: PermissionPath): PermissionMatch | undefined {
    let best = sources.own?.getMostRelevantPermission(query);
    for (const groupName of sources.groups) {
      const match = this.groups.get(groupName)?.getMostRelevantPermission(query);
      if (match && (!best || match.path.specificity > best.path.specificity)) {
        best = match;
      }
    }
    return best ?? sources.fallback?.getMostRelevantPermission(query);
  }

  private hasAnySubPermissionOf(sources: Sources, permission: string): boolean {
    const query = PermissionPath.parseQuery(permission);
    if (this.resolve(sources, query)?.permits) {
      return true;
    }
    const sets = [
      sources.own,
      ...sources.groups.map((groupName) => this.groups.get(groupName)),
      sources.fallback,
    ];
    // An entry under the path only counts if nothing more specific elsewhere
    // negates it.
    return sets.some((set) =>
      set
        ?.getPermittingAtOrUnder(query)
        .some((entry) => this.resolve(sources, entry)?.permits)
    );
  }

  private getOrCreateUser(userId: ID): UserEntry<ID> {
    const key = this.idToString(userId);
    let user = this.users.get(key);
    if (!user) {
      this.assertIdRoundTrips(userId);
      user = { id: userId, permissions: new PermissionSet() };
      this.users.set(key, user);
    }
    return user;
  }

  private getOrCreateGroup(groupName: string): PermissionSet {
    assertGroupName(groupName);
    let group = this.groups.get(groupName);
    if (!group) {
      group = new PermissionSet();
      this.groups.set(groupName, group);
    }
    return group;
  }

  private assertIdRoundTrips(userId: ID): void {
    const key = this.idToString(userId);
    const roundTripped = this.idToString(this.idFromString(key));
    if (roundTripped !== key) {
      throw new InvalidOperationError(
        `User id converters disagree: "${key}" comes back as "${roundTripped}"`
      );
    }
  }

  private pruneMember(member: Member): void {
    if (member.kind === 'user') {
      this.pruneUser(member.key);
    } else {
      this.pruneGroup(member.id);
    }
  }

  private pruneUser(key: string): void {
    const user = this.users.get(key);
    if (
      user &&
      user.permissions.isEmpty() &&
      !this.memberships.hasMemberships(userMember(key))
    ) {
      this.users.delete(key);
    }
  }

  private pruneGroup(groupName: string): void {
    const group = this.groups.get(groupName);
    if (
      group &&
      group.isEmpty() &&
      !this.memberships.hasMemberships(groupMember(groupName)) &&
      !this.memberships.isReferenced(groupName)
    ) {
      this.groups.delete(groupName);
    }
  }
}

function assertGroupName(groupName: string): void {
  if (!GROUP_NAME.test(groupName)) {
    throw new InvalidGroupNameError(groupName);
  }
}

function toStatus(
  permission: string,
  match: PermissionMatch | undefined
): PermissionStatus {
  return {
    permission,
    hasPermission: match?.permits ?? false,
    argument: match?.argument,
  };
}

function toSubject(permissions: PermissionSet, groupNames: string[]): SubjectSnapshot {
  const subject: SubjectSnapshot = {};
  if (!permissions.isEmpty()) {
    subject.permissions = permissions.getPermissions(true);
  }
  if (groupNames.length > 0) {
    subject.groups = groupNames;
  }
  return subject;
}

function parseSubject(subject: SubjectSnapshot | undefined): {
  paths: PermissionPath[];
  groupNames: string[];
} {
  const groupNames = subject?.groups ?? [];
  groupNames.forEach(assertGroupName);
  return {
    paths: (subject?.permissions ?? []).map((permission) =>
      PermissionPath.parse(permission)
    ),
    groupNames,
  };
}

export { PermissionsRegistry };
export default PermissionsRegistry;
