import { describe, expect, it } from 'vitest';

import { GroupMembershipGraph, groupMember, userMember } from './GroupMembershipGraph';

describe('GroupMembershipGraph', () => {
  it('walks groups breadth-first in the order they were added', () => {
    const graph = new GroupMembershipGraph();
    graph.addEdge(userMember('u'), 'a');
    graph.addEdge(userMember('u'), 'b');
    graph.addEdge(groupMember('a'), 'c');
    graph.addEdge(groupMember('b'), 'd');

    expect(graph.getAllGroupsOf(userMember('u'))).toEqual(['a', 'b', 'c', 'd']);
  });

  it('adds default groups after a user’s own, but not for groups', () => {
    const graph = new GroupMembershipGraph();
    graph.addEdge(userMember('u'), 'a');
    graph.addEdge(groupMember('a'), 'b');
    graph.addDefaultGroup('everyone');

    expect(graph.getAllGroupsOf(userMember('u'))).toEqual(['a', 'everyone', 'b']);
    expect(graph.getAllGroupsOf(userMember('stranger'))).toEqual(['everyone']);
    expect(graph.getAllGroupsOf(groupMember('a'))).toEqual(['b']);
  });

  it('visits each group once in a cycle and never lists a group under itself', () => {
    const graph = new GroupMembershipGraph();
    graph.addEdge(groupMember('a'), 'b');
    graph.addEdge(groupMember('b'), 'c');
    graph.addEdge(groupMember('c'), 'a');
    graph.addEdge(groupMember('d'), 'd');

    expect(graph.getAllGroupsOf(groupMember('a'))).toEqual(['b', 'c']);
    expect(graph.getAllGroupsOf(groupMember('d'))).toEqual([]);
  });

  it('reports whether edges changed', () => {
    const graph = new GroupMembershipGraph();

    expect(graph.addEdge(userMember('u'), 'a')).toBe(true);
    expect(graph.addEdge(userMember('u'), 'a')).toBe(false);
    expect(graph.removeEdge(userMember('u'), 'a')).toBe(true);
    expect(graph.removeEdge(userMember('u'), 'a')).toBe(false);
    expect(graph.hasMemberships(userMember('u'))).toBe(false);
  });

  it('keeps users and groups with the same name apart', () => {
    const graph = new GroupMembershipGraph();
    graph.addEdge(userMember('x'), 'a');

    expect(graph.getGroupsOf(groupMember('x'))).toEqual([]);
    expect(graph.getGroupsOf(userMember('x'))).toEqual(['a']);
  });

  it('walks the defaults on their own', () => {
    const graph = new GroupMembershipGraph();
    graph.addDefaultGroup('everyone');
    graph.addEdge(groupMember('everyone'), 'base');

    expect(graph.getAllDefaultGroups()).toEqual(['everyone', 'base']);
    expect(graph.isDefaultGroup('base')).toBe(false);
    expect(graph.isReferenced('base')).toBe(true);
  });

  it('removes a group everywhere and returns the members left with none', () => {
    const graph = new GroupMembershipGraph();
    graph.addEdge(userMember('u'), 'a');
    graph.addEdge(userMember('v'), 'a');
    graph.addEdge(userMember('v'), 'b');
    graph.addEdge(groupMember('c'), 'a');
    graph.addDefaultGroup('a');

    const emptied = graph.removeGroupEverywhere('a');

    expect(emptied).toEqual([userMember('u'), groupMember('c')]);
    expect(graph.getGroupsOf(userMember('v'))).toEqual(['b']);
    expect(graph.isReferenced('a')).toBe(false);
  });

  it('removes a member’s own memberships', () => {
    const graph = new GroupMembershipGraph();
    graph.addEdge(groupMember('a'), 'b');
    graph.addEdge(groupMember('a'), 'c');

    expect(graph.removeMember(groupMember('a'))).toEqual(['b', 'c']);
    expect(graph.isReferenced('b')).toBe(false);
  });
});
