export type PermissionTarget = 'USER' | 'GROUP' | 'DEFAULT_PERMISSIONS';

class PermissionRegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PermissionRegistryError';
  }
}

/**
 * Thrown when a permission string can't be parsed.
 */
class InvalidPathError extends PermissionRegistryError {
  constructor(
    public readonly permission: string,
    reason: string
  ) {
    super(`${reason}: "${permission}"`);
    this.name = 'InvalidPathError';
  }
}

/**
 * Thrown when the registry is used in a way its contract doesn't allow, such
 * as id converters that don't agree with each other.
 */
class InvalidOperationError extends PermissionRegistryError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidOperationError';
  }
}

class InvalidGroupNameError extends PermissionRegistryError {
  constructor(public readonly groupName: string) {
    super(
      `Group names may only contain letters and digits: "${groupName}"`
    );
    this.name = 'InvalidGroupNameError';
  }
}

class InvalidSnapshotError extends PermissionRegistryError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidSnapshotError';
  }
}

/**
 * Thrown by the registry's assert* methods.
 *
 * @example
 * ```ts
 * try {
 *   registry.assertUserHasPermission('123', 'articles.write');
 * } catch (error) {
 *   if (error instanceof MissingPermissionError) {
 *     console.log(error.subject); // '123'
 *   }
 * }
 * ```
 */
class MissingPermissionError extends PermissionRegistryError {
  constructor(
    public readonly permission: string,
    public readonly target: PermissionTarget,
    public readonly subject?: string
  ) {
    super(MissingPermissionError.describe(permission, target, subject));
    this.name = 'MissingPermissionError';
  }

  private static describe(
    permission: string,
    target: PermissionTarget,
    subject?: string
  ): string {
    switch (target) {
      case 'USER':
        return `User ${subject} is missing permission: ${permission}`;
      case 'GROUP':
        return `Group ${subject} is missing permission: ${permission}`;
      case 'DEFAULT_PERMISSIONS':
        return `Permission is not a default permission: ${permission}`;
    }
  }
}

export {
  PermissionRegistryError,
  InvalidPathError,
  InvalidOperationError,
  InvalidGroupNameError,
  InvalidSnapshotError,
  MissingPermissionError,
};
