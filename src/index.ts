export { PermissionPath } from './PermissionPath';
export { PermissionSet } from './PermissionSet';
export type { PermissionMatch } from './PermissionSet';
export { GroupMembershipGraph, userMember, groupMember } from './GroupMembershipGraph';
export type { Member } from './GroupMembershipGraph';
export { PermissionsRegistry } from './PermissionsRegistry';
export type { PermissionsRegistryOptions, PermissionStatus } from './PermissionsRegistry';
export { PermissionsRegistryDecorator } from './PermissionsRegistryDecorator';
export type { PermissionsRegistryApi } from './PermissionsRegistryDecorator';
export { PermissionsRegistryWithEvents } from './PermissionsRegistryWithEvents';
export { CachedPermissionsRegistry } from './CachedPermissionsRegistry';
export { SynchronizedPermissionsRegistry } from './SynchronizedPermissionsRegistry';
export * from './events';
export * from './errors';
export { consoleLogger } from './logger';
export type { Logger } from './logger';
export { validateSnapshot, parseSnapshot } from './snapshot';
export type { PermissionsSnapshot, SubjectSnapshot } from './snapshot';
export type { PermissionsStore, SnapshotTarget } from './adapters/PermissionsStore';
export { FilePermissionsStore } from './adapters/file';
export type { FilePermissionsStoreOptions } from './adapters/file';
export { ApiPermissionsStore } from './adapters/api';
export type { ApiPermissionsStoreOptions } from './adapters/api';
export { MongoDBPermissionsStore } from './adapters/mongoDB';
export type { SnapshotDocument } from './adapters/mongoDB';
export { MySQLPermissionsStore } from './adapters/mySQL';
export { AsyncLock } from './util/AsyncLock';

export { PermissionsRegistry as default } from './PermissionsRegistry';
