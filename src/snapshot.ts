import { InvalidSnapshotError } from './errors';

export interface SubjectSnapshot {
  permissions?: string[];
  groups?: string[];
}

/**
 * The whole contents of a registry in a JSON-friendly shape. This is also
 * the format of the permissions file:
 *
 * ```json
 * {
 *   "defaults": { "permissions": ["articles.read"], "groups": ["readers"] },
 *   "groups": {
 *     "editors": { "permissions": ["articles.*", "-articles.delete"], "groups": ["readers"] }
 *   },
 *   "users": {
 *     "123": { "permissions": ["articles.publish: drafts"], "groups": ["editors"] }
 *   }
 * }
 * ```
 */
export interface PermissionsSnapshot {
  defaults?: SubjectSnapshot;
  groups?: Record<string, SubjectSnapshot>;
  users?: Record<string, SubjectSnapshot>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateStrings(value: unknown, field: string): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new InvalidSnapshotError(`${field} must be an array`);
  }
  return value.map((item, index) => {
    if (typeof item !== 'string') {
      throw new InvalidSnapshotError(`${field}[${index}] must be a string`);
    }
    return item;
  });
}

function validateSubject(value: unknown, field: string): SubjectSnapshot {
  if (!isRecord(value)) {
    throw new InvalidSnapshotError(`${field} must be an object`);
  }
  const subject: SubjectSnapshot = {};
  const permissions = validateStrings(value.permissions, `${field}.permissions`);
  const groups = validateStrings(value.groups, `${field}.groups`);
  if (permissions) subject.permissions = permissions;
  if (groups) subject.groups = groups;
  return subject;
}

function validateSubjects(
  value: unknown,
  field: string
): Record<string, SubjectSnapshot> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new InvalidSnapshotError(`${field} must be an object`);
  }
  return Object.fromEntries(
    Object.entries(value).map(([name, subject]): [string, SubjectSnapshot] => [
      name,
      validateSubject(subject, `${field}.${name}`),
    ])
  );
}

/**
 * Checks that a value read from a file, an API or a database has the shape
 * of a snapshot. Permission syntax is checked later, when it's loaded.
 *
 * @throws InvalidSnapshotError naming the first field that's wrong
 */
export function validateSnapshot(value: unknown): PermissionsSnapshot {
  if (!isRecord(value)) {
    throw new InvalidSnapshotError('Permissions snapshot must be an object');
  }
  const snapshot: PermissionsSnapshot = {};
  if (value.defaults !== undefined) {
    snapshot.defaults = validateSubject(value.defaults, 'defaults');
  }
  const groups = validateSubjects(value.groups, 'groups');
  const users = validateSubjects(value.users, 'users');
  if (groups) snapshot.groups = groups;
  if (users) snapshot.users = users;
  return snapshot;
}

export function parseSnapshot(json: string): PermissionsSnapshot {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new InvalidSnapshotError(`Failed to parse permissions: ${error}`);
  }
  return validateSnapshot(parsed);
}
