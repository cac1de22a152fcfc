import { InvalidPathError } from './errors';

const ROOT = '*';
const DESCENDANTS_SUFFIX = '.*';

/**
 * A parsed permission such as `articles.write`, `-articles.delete`,
 * `articles.*` or `articles.publish: drafts`.
 *
 * Two paths are the same path when they have the same segments and the same
 * descendants-only flag; the argument and the negation flag travel with the
 * path but take no part in its identity.
 */
export class PermissionPath {
  private constructor(
    public readonly segments: readonly string[],
    public readonly descendantsOnly: boolean,
    public readonly negates: boolean,
    public readonly argument: string | undefined
  ) {}

  /**
   * Parses a permission as it's assigned to a user, group or the defaults.
   *
   * @throws InvalidPathError if the permission is malformed
   *
   * @example
   * ```ts
   * const path = PermissionPath.parse('-first.second.*: someArg');
   * path.negates;         // true
   * path.descendantsOnly; // true
   * path.argument;        // 'someArg'
   * ```
   */
  static parse(text: string): PermissionPath {
    const trimmed = text.trim();
    const colon = trimmed.indexOf(':');
    let pathText = (colon < 0 ? trimmed : trimmed.slice(0, colon)).trim();
    const argument = colon < 0 ? undefined : trimmed.slice(colon + 1).trim();

    let negates = false;
    if (pathText.startsWith('-')) {
      negates = true;
      pathText = pathText.slice(1).trim();
    }

    if (pathText === ROOT) {
      return new PermissionPath([], false, negates, argument);
    }

    let descendantsOnly = false;
    if (pathText.endsWith(DESCENDANTS_SUFFIX)) {
      descendantsOnly = true;
      pathText = pathText.slice(0, -DESCENDANTS_SUFFIX.length);
    }

    return new PermissionPath(
      splitSegments(pathText, text),
      descendantsOnly,
      negates,
      argument
    );
  }

  /**
   * Parses a path being asked about. `*` asks about the root.
   */
  static parseQuery(text: string): PermissionPath {
    const trimmed = text.trim();
    if (trimmed === ROOT) {
      return new PermissionPath([], false, false, undefined);
    }
    if (trimmed.includes(':')) {
      throw new InvalidPathError(
        text,
        'Queried permissions cannot carry an argument'
      );
    }
    if (trimmed.startsWith('-')) {
      throw new InvalidPathError(text, 'Queried permissions cannot be negated');
    }
    return new PermissionPath(
      splitSegments(trimmed, text),
      false,
      false,
      undefined
    );
  }

  static keyOf(segments: readonly string[], descendantsOnly: boolean): string {
    if (segments.length === 0) {
      return ROOT;
    }
    const joined = segments.join('.');
    return descendantsOnly ? joined + DESCENDANTS_SUFFIX : joined;
  }

  /**
   * Orders paths by how specific they are, least specific first.
   */
  static compareSpecificity(a: PermissionPath, b: PermissionPath): number {
    return a.specificity - b.specificity;
  }

  /**
   * Listing order: segment by segment, a path before its descendants, and a
   * path before its descendants-only counterpart.
   */
  static comparePaths(a: PermissionPath, b: PermissionPath): number {
    const shared = Math.min(a.segments.length, b.segments.length);
    for (let i = 0; i < shared; i++) {
      if (a.segments[i] !== b.segments[i]) {
        return a.segments[i] < b.segments[i] ? -1 : 1;
      }
    }
    if (a.segments.length !== b.segments.length) {
      return a.segments.length - b.segments.length;
    }
    return Number(a.descendantsOnly) - Number(b.descendantsOnly);
  }

  get key(): string {
    return PermissionPath.keyOf(this.segments, this.descendantsOnly);
  }

  get isRoot(): boolean {
    return this.segments.length === 0;
  }

  /**
   * Deeper paths are more specific. At the same depth, `a.b.*` is more
   * specific than `a.b`, so it decides what the descendants of `a.b` get.
   */
  get specificity(): number {
    return this.segments.length * 2 + (this.descendantsOnly ? 1 : 0);
  }

  get permits(): boolean {
    return !this.negates;
  }

  covers(other: PermissionPath): boolean {
    if (other.segments.length < this.segments.length) {
      return false;
    }
    for (let i = 0; i < this.segments.length; i++) {
      if (this.segments[i] !== other.segments[i]) {
        return false;
      }
    }
    if (!this.descendantsOnly) {
      return true;
    }
    return (
      other.segments.length > this.segments.length || other.descendantsOnly
    );
  }

  equals(other: PermissionPath): boolean {
    return this.key === other.key;
  }

  negated(): PermissionPath {
    return this.negates
      ? this
      : new PermissionPath(this.segments, this.descendantsOnly, true, this.argument);
  }

  granting(): PermissionPath {
    return this.negates
      ? new PermissionPath(this.segments, this.descendantsOnly, false, this.argument)
      : this;
  }

  withArgument(argument: string | undefined): PermissionPath {
    return new PermissionPath(
      this.segments,
      this.descendantsOnly,
      this.negates,
      argument
    );
  }

  toString(includeArgument = true): string {
    const path = (this.negates ? '-' : '') + this.key;
    if (!includeArgument || this.argument === undefined) {
      return path;
    }
    return `${path}: ${this.argument}`;
  }
}

function splitSegments(pathText: string, original: string): string[] {
  if (pathText.length === 0) {
    throw new InvalidPathError(original, 'Permission path is empty');
  }
  if (pathText.includes('*')) {
    throw new InvalidPathError(
      original,
      'Permissions cannot be arbitrarily wildcarded'
    );
  }
  if (pathText.includes('-')) {
    throw new InvalidPathError(
      original,
      'Permission negations must be at the start of the permission'
    );
  }
  const segments = pathText.split('.');
  if (segments.some((segment) => segment.trim().length === 0)) {
    throw new InvalidPathError(
      original,
      'Permission paths cannot contain empty segments'
    );
  }
  return segments;
}
