import { PermissionPath } from './PermissionPath';

/**
 * What a change was made to. `ALL` is used when the whole registry changed at
 * once, such as on clear or load.
 */
export type PermissionsChangedTarget =
  | 'USER'
  | 'GROUP'
  | 'DEFAULT_PERMISSIONS'
  | 'ALL';

export interface PermissionsChangedEventArgs<ID> {
  readonly target: PermissionsChangedTarget;
  readonly userTargeted: ID | undefined;
  readonly groupTargeted: string | undefined;
}

export interface PermissionAssignedEventArgs<ID>
  extends PermissionsChangedEventArgs<ID> {
  readonly kind: 'permissionAssigned';
  /** The permission as it was passed in, e.g. `-articles.delete`. */
  readonly permission: string;
  readonly previous: PermissionPath | undefined;
}

export interface PermissionRevokedEventArgs<ID>
  extends PermissionsChangedEventArgs<ID> {
  readonly kind: 'permissionRevoked';
  readonly permission: string;
  /** Undefined when there was nothing at that path to revoke. */
  readonly revoked: PermissionPath | undefined;
}

export interface PermissionGroupAssignedEventArgs<ID>
  extends PermissionsChangedEventArgs<ID> {
  readonly kind: 'groupAssigned';
  readonly groupId: string;
}

export interface PermissionGroupRevokedEventArgs<ID>
  extends PermissionsChangedEventArgs<ID> {
  readonly kind: 'groupRevoked';
  readonly groupId: string;
  readonly wasRevoked: boolean;
}

export interface PermissionsClearedEventArgs<ID>
  extends PermissionsChangedEventArgs<ID> {
  readonly kind: 'cleared';
}

export interface PermissionsLoadedEventArgs<ID>
  extends PermissionsChangedEventArgs<ID> {
  readonly kind: 'loaded';
}

export type PermissionsEventArgs<ID> =
  | PermissionAssignedEventArgs<ID>
  | PermissionRevokedEventArgs<ID>
  | PermissionGroupAssignedEventArgs<ID>
  | PermissionGroupRevokedEventArgs<ID>
  | PermissionsClearedEventArgs<ID>
  | PermissionsLoadedEventArgs<ID>;

export interface PermissionsRegistryEvents<ID> {
  permissionAssigned: (args: PermissionAssignedEventArgs<ID>) => void;
  permissionRevoked: (args: PermissionRevokedEventArgs<ID>) => void;
  groupAssigned: (args: PermissionGroupAssignedEventArgs<ID>) => void;
  groupRevoked: (args: PermissionGroupRevokedEventArgs<ID>) => void;
  cleared: (args: PermissionsClearedEventArgs<ID>) => void;
  loaded: (args: PermissionsLoadedEventArgs<ID>) => void;
  /** Raised after each of the above, with the same args. */
  changed: (args: PermissionsEventArgs<ID>) => void;
}

export interface EventSubject<ID> {
  target: PermissionsChangedTarget;
  userTargeted?: ID;
  groupTargeted?: string;
}

export const aboutUser = <ID>(userId: ID): EventSubject<ID> => ({
  target: 'USER',
  userTargeted: userId,
});

export const aboutGroup = <ID>(groupName: string): EventSubject<ID> => ({
  target: 'GROUP',
  groupTargeted: groupName,
});

export const aboutDefaults = <ID>(): EventSubject<ID> => ({
  target: 'DEFAULT_PERMISSIONS',
});

export const aboutAll = <ID>(): EventSubject<ID> => ({ target: 'ALL' });
