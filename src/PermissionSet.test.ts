import { describe, expect, it } from 'vitest';

import { PermissionPath } from './PermissionPath';
import { PermissionSet } from './PermissionSet';

const parse = (text: string) => PermissionPath.parse(text);
const query = (text: string) => PermissionPath.parseQuery(text);

describe('PermissionSet', () => {
  it('finds the nearest ancestor when the path itself is missing', () => {
    const set = new PermissionSet();
    set.assign(parse('a'));

    const match = set.getMostRelevantPermission(query('a.b.c'));

    expect(match?.path.key).toBe('a');
    expect(match?.permits).toBe(true);
    expect(set.hasPermission(query('a.b.c'))).toBe(true);
    expect(set.getMostRelevantPermission(query('b'))).toBeUndefined();
  });

  it('prefers a descendants-only entry over the plain one at the same depth', () => {
    const set = new PermissionSet();
    set.set(parse('a'));
    set.set(parse('-a.*'));

    expect(set.hasPermission(query('a'))).toBe(true);
    expect(set.hasPermission(query('a.b'))).toBe(false);
    expect(set.negatesPermission(query('a.b'))).toBe(true);
  });

  it('falls back to the root', () => {
    const set = new PermissionSet();
    set.set(parse('*: everything'));

    expect(set.getMostRelevantPermission(query('x.y'))?.argument).toBe('everything');
  });

  it('tells a negation apart from knowing nothing', () => {
    const set = new PermissionSet();
    set.assignNegating(parse('a'));

    expect(set.negatesPermission(query('a'))).toBe(true);
    expect(set.negatesPermission(query('b'))).toBe(false);
    expect(set.hasPermission(query('b'))).toBe(false);
  });

  it('replaces the entry at the same path and returns the previous one', () => {
    const set = new PermissionSet();

    expect(set.assign(parse('a'), 'one')).toBeUndefined();
    expect(set.assign(parse('a'), 'two')?.argument).toBe('one');
    expect(set.assign(parse('-a'))?.argument).toBe('two');
    expect(set.get(parse('a'))?.negates).toBe(false);
    expect(set.size).toBe(1);
  });

  it('revokes only the exact path', () => {
    const set = new PermissionSet();
    set.set(parse('a'));
    set.set(parse('a.b'));

    expect(set.revoke(parse('a.b'))?.key).toBe('a.b');
    expect(set.revoke(parse('a.b'))).toBeUndefined();
    expect(set.getPermissions()).toEqual(['a']);

    set.clear();
    expect(set.isEmpty()).toBe(true);
  });

  it('lists entries sorted, with arguments on request', () => {
    const set = new PermissionSet();
    set.set(parse('b: x'));
    set.set(parse('-a.*'));
    set.set(parse('a'));

    expect(set.getPermissions()).toEqual(['a', '-a.*', 'b']);
    expect(set.getPermissions(true)).toEqual(['a', '-a.*', 'b: x']);
  });

  it('finds granted permissions under a path', () => {
    const granted = new PermissionSet();
    granted.set(parse('a.b.c'));
    const negated = new PermissionSet();
    negated.set(parse('-a.b'));

    expect(granted.hasPermission(query('a'))).toBe(false);
    expect(granted.hasPermissionOrAnyUnder(query('a'))).toBe(true);
    expect(negated.hasPermissionOrAnyUnder(query('a'))).toBe(false);
  });
});
