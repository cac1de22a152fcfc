import { PermissionPath } from './PermissionPath';

/**
 * The entry that decided a lookup, as found in one permission set.
 */
export interface PermissionMatch {
  path: PermissionPath;
  permits: boolean;
  argument: string | undefined;
}

/**
 * The permissions held by a single user, group or the defaults, keyed by
 * path. Each key holds at most one entry, granting or negating.
 */
export class PermissionSet {
  private entriesByKey: Map<string, PermissionPath> = new Map();

  get size(): number {
    return this.entriesByKey.size;
  }

  isEmpty(): boolean {
    return this.entriesByKey.size === 0;
  }

  /**
   * Stores the permission as given, negation included, replacing whatever
   * was at the same path.
   *
   * @returns the entry that was replaced
   */
  set(path: PermissionPath): PermissionPath | undefined {
    const previous = this.entriesByKey.get(path.key);
    this.entriesByKey.set(path.key, path);
    return previous;
  }

  assign(path: PermissionPath, argument?: string): PermissionPath | undefined {
    const grant = path.granting();
    return this.set(argument === undefined ? grant : grant.withArgument(argument));
  }

  assignNegating(path: PermissionPath): PermissionPath | undefined {
    return this.set(path.negated());
  }

  /**
   * Removes the entry at exactly this path. Entries above or below it are
   * left alone.
   */
  revoke(path: PermissionPath): PermissionPath | undefined {
    const previous = this.entriesByKey.get(path.key);
    this.entriesByKey.delete(path.key);
    return previous;
  }

  clear(): void {
    this.entriesByKey.clear();
  }

  get(path: PermissionPath): PermissionPath | undefined {
    return this.entriesByKey.get(path.key);
  }

  /**
   * Finds the most specific entry covering the queried path: the entry at
   * the path itself, otherwise the nearest ancestor, where `a.b.*` is
   * preferred over `a.b` at the same depth.
   *
   * @returns undefined when nothing here says anything about the path
   */
  getMostRelevantPermission(query: PermissionPath): PermissionMatch | undefined {
    const exact = this.entriesByKey.get(
      PermissionPath.keyOf(query.segments, query.descendantsOnly)
    );
    if (exact) {
      return toMatch(exact);
    }

    const depth = query.descendantsOnly
      ? query.segments.length
      : query.segments.length - 1;
    for (let i = depth; i >= 0; i--) {
      const prefix = query.segments.slice(0, i);
      const found =
        (i > 0 ? this.entriesByKey.get(PermissionPath.keyOf(prefix, true)) : undefined) ??
        this.entriesByKey.get(PermissionPath.keyOf(prefix, false));
      if (found) {
        return toMatch(found);
      }
    }
    return undefined;
  }

  hasPermission(query: PermissionPath): boolean {
    return this.getMostRelevantPermission(query)?.permits ?? false;
  }

  negatesPermission(query: PermissionPath): boolean {
    const match = this.getMostRelevantPermission(query);
    return match !== undefined && !match.permits;
  }

  /**
   * True if the path is permitted, or if anything at or under it is.
   */
  hasPermissionOrAnyUnder(query: PermissionPath): boolean {
    return (
      this.hasPermission(query) || this.getPermittingAtOrUnder(query).length > 0
    );
  }

  /**
   * Granting entries at the queried path or below it.
   */
  getPermittingAtOrUnder(query: PermissionPath): PermissionPath[] {
    return this.entries().filter(
      (entry) => entry.permits && query.covers(entry)
    );
  }

  entries(): PermissionPath[] {
    return [...this.entriesByKey.values()].sort(PermissionPath.comparePaths);
  }

  getPermissions(includeArgs = false): string[] {
    return this.entries().map((entry) => entry.toString(includeArgs));
  }
}

function toMatch(path: PermissionPath): PermissionMatch {
  return { path, permits: path.permits, argument: path.argument };
}
