import { PermissionPath } from './PermissionPath';
import { PermissionStatus, PermissionsRegistry } from './PermissionsRegistry';
import { PermissionsSnapshot } from './snapshot';

/**
 * The public surface of {@link PermissionsRegistry}, which decorators also
 * implement.
 */
export type PermissionsRegistryApi<ID> = {
  [K in keyof PermissionsRegistry<ID>]: PermissionsRegistry<ID>[K];
};

/**
 * Passes every operation through to another registry. Extend it and
 * override what should behave differently.
 */
export class PermissionsRegistryDecorator<ID> implements PermissionsRegistryApi<ID> {
  constructor(protected readonly inner: PermissionsRegistryApi<ID>) {}

  idToString(id: ID): string {
    return this.inner.idToString(id);
  }

  idFromString(text: string): ID {
    return this.inner.idFromString(text);
  }

  hasPermission(userId: ID, permission: string): boolean {
    return this.inner.hasPermission(userId, permission);
  }

  groupHasPermission(groupName: string, permission: string): boolean {
    return this.inner.groupHasPermission(groupName, permission);
  }

  isDefaultPermission(permission: string): boolean {
    return this.inner.isDefaultPermission(permission);
  }

  getUserPermissionStatus(userId: ID, permission: string): PermissionStatus {
    return this.inner.getUserPermissionStatus(userId, permission);
  }

  getGroupPermissionStatus(groupName: string, permission: string): PermissionStatus {
    return this.inner.getGroupPermissionStatus(groupName, permission);
  }

  getDefaultPermissionStatus(permission: string): PermissionStatus {
    return this.inner.getDefaultPermissionStatus(permission);
  }

  getUserPermissionArg(userId: ID, permission: string): string | undefined {
    return this.inner.getUserPermissionArg(userId, permission);
  }

  getGroupPermissionArg(groupName: string, permission: string): string | undefined {
    return this.inner.getGroupPermissionArg(groupName, permission);
  }

  getDefaultPermissionArg(permission: string): string | undefined {
    return this.inner.getDefaultPermissionArg(permission);
  }

  userHasAllPermissions(userId: ID, permissions: string[]): boolean {
    return this.inner.userHasAllPermissions(userId, permissions);
  }

  userHasAnyPermissions(userId: ID, permissions: string[]): boolean {
    return this.inner.userHasAnyPermissions(userId, permissions);
  }

  groupHasAllPermissions(groupName: string, permissions: string[]): boolean {
    return this.inner.groupHasAllPermissions(groupName, permissions);
  }

  groupHasAnyPermissions(groupName: string, permissions: string[]): boolean {
    return this.inner.groupHasAnyPermissions(groupName, permissions);
  }

  userHasAnySubPermissionOf(userId: ID, permission: string): boolean {
    return this.inner.userHasAnySubPermissionOf(userId, permission);
  }

  groupHasAnySubPermissionOf(groupName: string, permission: string): boolean {
    return this.inner.groupHasAnySubPermissionOf(groupName, permission);
  }

  isOrAnySubPermissionOfIsDefault(permission: string): boolean {
    return this.inner.isOrAnySubPermissionOfIsDefault(permission);
  }

  assertUserHasPermission(userId: ID, permission: string): void {
    this.inner.assertUserHasPermission(userId, permission);
  }

  assertGroupHasPermission(groupName: string, permission: string): void {
    this.inner.assertGroupHasPermission(groupName, permission);
  }

  assertIsDefaultPermission(permission: string): void {
    this.inner.assertIsDefaultPermission(permission);
  }

  userHasGroup(userId: ID, groupName: string): boolean {
    return this.inner.userHasGroup(userId, groupName);
  }

  groupExtendsFromGroup(groupName: string, superGroupName: string): boolean {
    return this.inner.groupExtendsFromGroup(groupName, superGroupName);
  }

  isDefaultGroup(groupName: string): boolean {
    return this.inner.isDefaultGroup(groupName);
  }

  getUsers(): ID[] {
    return this.inner.getUsers();
  }

  getGroupNames(): string[] {
    return this.inner.getGroupNames();
  }

  getUserPermissions(userId: ID, includeArgs?: boolean): string[] {
    return this.inner.getUserPermissions(userId, includeArgs);
  }

  getGroupPermissions(groupName: string, includeArgs?: boolean): string[] {
    return this.inner.getGroupPermissions(groupName, includeArgs);
  }

  getDefaultPermissions(includeArgs?: boolean): string[] {
    return this.inner.getDefaultPermissions(includeArgs);
  }

  getGroupsOfUser(userId: ID): string[] {
    return this.inner.getGroupsOfUser(userId);
  }

  getGroupsOfGroup(groupName: string): string[] {
    return this.inner.getGroupsOfGroup(groupName);
  }

  getDefaultGroups(): string[] {
    return this.inner.getDefaultGroups();
  }

  getAllGroupsOfUser(userId: ID): string[] {
    return this.inner.getAllGroupsOfUser(userId);
  }

  assignUserPermission(userId: ID, permission: string): PermissionPath | undefined {
    return this.inner.assignUserPermission(userId, permission);
  }

  assignGroupPermission(groupName: string, permission: string): PermissionPath | undefined {
    return this.inner.assignGroupPermission(groupName, permission);
  }

  assignDefaultPermission(permission: string): PermissionPath | undefined {
    return this.inner.assignDefaultPermission(permission);
  }

  assignUserPermissions(userId: ID, permissions: string[]): void {
    this.inner.assignUserPermissions(userId, permissions);
  }

  assignGroupPermissions(groupName: string, permissions: string[]): void {
    this.inner.assignGroupPermissions(groupName, permissions);
  }

  assignDefaultPermissions(permissions: string[]): void {
    this.inner.assignDefaultPermissions(permissions);
  }

  revokeUserPermission(userId: ID, permission: string): PermissionPath | undefined {
    return this.inner.revokeUserPermission(userId, permission);
  }

  revokeGroupPermission(groupName: string, permission: string): PermissionPath | undefined {
    return this.inner.revokeGroupPermission(groupName, permission);
  }

  revokeDefaultPermission(permission: string): PermissionPath | undefined {
    return this.inner.revokeDefaultPermission(permission);
  }

  revokeAllUserPermissions(userId: ID): PermissionPath[] {
    return this.inner.revokeAllUserPermissions(userId);
  }

  revokeAllGroupPermissions(groupName: string): PermissionPath[] {
    return this.inner.revokeAllGroupPermissions(groupName);
  }

  revokeAllDefaultPermissions(): PermissionPath[] {
    return this.inner.revokeAllDefaultPermissions();
  }

  assignGroupToUser(userId: ID, groupName: string): void {
    this.inner.assignGroupToUser(userId, groupName);
  }

  assignGroupToGroup(groupName: string, superGroupName: string): void {
    this.inner.assignGroupToGroup(groupName, superGroupName);
  }

  assignDefaultGroup(groupName: string): void {
    this.inner.assignDefaultGroup(groupName);
  }

  assignGroupsToUser(userId: ID, groupNames: string[]): void {
    this.inner.assignGroupsToUser(userId, groupNames);
  }

  assignGroupsToGroup(groupName: string, superGroupNames: string[]): void {
    this.inner.assignGroupsToGroup(groupName, superGroupNames);
  }

  assignDefaultGroups(groupNames: string[]): void {
    this.inner.assignDefaultGroups(groupNames);
  }

  revokeGroupFromUser(userId: ID, groupName: string): boolean {
    return this.inner.revokeGroupFromUser(userId, groupName);
  }

  revokeGroupFromGroup(groupName: string, superGroupName: string): boolean {
    return this.inner.revokeGroupFromGroup(groupName, superGroupName);
  }

  revokeDefaultGroup(groupName: string): boolean {
    return this.inner.revokeDefaultGroup(groupName);
  }

  revokeAllGroupsFromUser(userId: ID): string[] {
    return this.inner.revokeAllGroupsFromUser(userId);
  }

  revokeAllGroupsFromGroup(groupName: string): string[] {
    return this.inner.revokeAllGroupsFromGroup(groupName);
  }

  revokeAllDefaultGroups(): string[] {
    return this.inner.revokeAllDefaultGroups();
  }

  clear(): void {
    this.inner.clear();
  }

  clearUser(userId: ID): void {
    this.inner.clearUser(userId);
  }

  clearGroup(groupName: string): void {
    this.inner.clearGroup(groupName);
  }

  clearDefaults(): void {
    this.inner.clearDefaults();
  }

  toSnapshot(): PermissionsSnapshot {
    return this.inner.toSnapshot();
  }

  loadSnapshot(snapshot: PermissionsSnapshot): void {
    this.inner.loadSnapshot(snapshot);
  }
}
