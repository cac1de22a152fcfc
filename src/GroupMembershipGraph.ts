export type Member =
  | { kind: 'user'; key: string }
  | { kind: 'group'; id: string };

export const userMember = (key: string): Member => ({ kind: 'user', key });
export const groupMember = (id: string): Member => ({ kind: 'group', id });

function memberKey(member: Member): string {
  return member.kind === 'user' ? `user:${member.key}` : `group:${member.id}`;
}

/**
 * Which groups each user and group is a member of, plus the default groups
 * every user belongs to. Edges keep the order they were added in, which is
 * the order groups are consulted in.
 */
export class GroupMembershipGraph {
  private edges: Map<string, Set<string>> = new Map();
  private defaultGroups: Set<string> = new Set();

  addEdge(member: Member, group: string): boolean {
    const key = memberKey(member);
    let groups = this.edges.get(key);
    if (!groups) {
      groups = new Set();
      this.edges.set(key, groups);
    }
    if (groups.has(group)) {
      return false;
    }
    groups.add(group);
    return true;
  }

  removeEdge(member: Member, group: string): boolean {
    const key = memberKey(member);
    const groups = this.edges.get(key);
    if (!groups || !groups.delete(group)) {
      return false;
    }
    if (groups.size === 0) {
      this.edges.delete(key);
    }
    return true;
  }

  addDefaultGroup(group: string): boolean {
    if (this.defaultGroups.has(group)) {
      return false;
    }
    this.defaultGroups.add(group);
    return true;
  }

  removeDefaultGroup(group: string): boolean {
    return this.defaultGroups.delete(group);
  }

  isDefaultGroup(group: string): boolean {
    return this.defaultGroups.has(group);
  }

  getDefaultGroups(): string[] {
    return [...this.defaultGroups];
  }

  getGroupsOf(member: Member): string[] {
    return [...(this.edges.get(memberKey(member)) ?? [])];
  }

  hasMemberships(member: Member): boolean {
    return this.edges.has(memberKey(member));
  }

  /**
   * Every group the member belongs to, directly or through other groups,
   * breadth-first from its direct groups. Users also start from the default
   * groups, after their own. A group is never listed as belonging to itself.
   */
  getAllGroupsOf(member: Member): string[] {
    const roots = this.getGroupsOf(member);
    if (member.kind === 'user') {
      roots.push(...this.defaultGroups);
    }
    return this.traverse(roots, member.kind === 'group' ? member.id : undefined);
  }

  getAllDefaultGroups(): string[] {
    return this.traverse([...this.defaultGroups]);
  }

  /**
   * True if any user, group or the defaults list this group as one of theirs.
   */
  isReferenced(group: string): boolean {
    if (this.defaultGroups.has(group)) {
      return true;
    }
    for (const groups of this.edges.values()) {
      if (groups.has(group)) {
        return true;
      }
    }
    return false;
  }

  /**
   * Drops the member's own memberships.
   */
  removeMember(member: Member): string[] {
    const key = memberKey(member);
    const groups = [...(this.edges.get(key) ?? [])];
    this.edges.delete(key);
    return groups;
  }

  /**
   * Drops every edge into the group, including its place among the defaults.
   *
   * @returns the members that lost their last membership
   */
  removeGroupEverywhere(group: string): Member[] {
    this.defaultGroups.delete(group);
    const emptied: Member[] = [];
    for (const [key, groups] of this.edges) {
      if (groups.delete(group) && groups.size === 0) {
        this.edges.delete(key);
        emptied.push(parseMemberKey(key));
      }
    }
    return emptied;
  }

  clear(): void {
    this.edges.clear();
    this.defaultGroups.clear();
  }

  private traverse(roots: string[], origin?: string): string[] {
    const visited = new Set<string>();
    if (origin !== undefined) {
      visited.add(origin);
    }
    const order: string[] = [];
    const queue = [...roots];

    while (queue.length > 0) {
      const group = queue.shift();
      if (group === undefined || visited.has(group)) {
        continue;
      }
      visited.add(group);
      order.push(group);
      for (const parent of this.edges.get(memberKey(groupMember(group))) ?? []) {
        if (!visited.has(parent)) {
          queue.push(parent);
        }
      }
    }
    return order;
  }
}

function parseMemberKey(key: string): Member {
  return key.startsWith('user:')
    ? userMember(key.slice('user:'.length))
    : groupMember(key.slice('group:'.length));
}
