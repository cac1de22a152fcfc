import { describe, expect, it } from 'vitest';

import { InvalidPathError } from './errors';
import { PermissionPath } from './PermissionPath';

const parse = (text: string) => PermissionPath.parse(text);

describe('PermissionPath.parse', () => {
  it('reads negation, descendants-only and the argument', () => {
    const path = parse('-first.second.*: someArg');

    expect(path.segments).toEqual(['first', 'second']);
    expect(path.negates).toBe(true);
    expect(path.permits).toBe(false);
    expect(path.descendantsOnly).toBe(true);
    expect(path.argument).toBe('someArg');
    expect(path.key).toBe('first.second.*');
  });

  it('splits the argument at the first colon only', () => {
    expect(parse('a.b: x: y').argument).toBe('x: y');
    expect(parse('a.b:').argument).toBe('');
    expect(parse('a.b').argument).toBeUndefined();
  });

  it('reads a lone star as the root', () => {
    const root = parse('*');

    expect(root.isRoot).toBe(true);
    expect(root.key).toBe('*');
    expect(root.specificity).toBe(0);
    expect(parse('-*').negates).toBe(true);
  });

  it.each([
    ['', 'Permission path is empty: ""'],
    ['.*', 'Permission path is empty: ".*"'],
    ['a.*.b', 'Permissions cannot be arbitrarily wildcarded: "a.*.b"'],
    ['a*', 'Permissions cannot be arbitrarily wildcarded: "a*"'],
    ['a.-b', 'Permission negations must be at the start of the permission: "a.-b"'],
    ['--a', 'Permission negations must be at the start of the permission: "--a"'],
    ['a..b', 'Permission paths cannot contain empty segments: "a..b"'],
    ['a.', 'Permission paths cannot contain empty segments: "a."'],
    ['a. .b', 'Permission paths cannot contain empty segments: "a. .b"'],
  ])('rejects %j', (text, message) => {
    expect(() => parse(text)).toThrow(InvalidPathError);
    expect(() => parse(text)).toThrow(message);
  });
});

describe('PermissionPath.parseQuery', () => {
  it('rejects arguments and negations', () => {
    expect(() => PermissionPath.parseQuery('a.b: x')).toThrow(
      'Queried permissions cannot carry an argument: "a.b: x"'
    );
    expect(() => PermissionPath.parseQuery('-a.b')).toThrow(
      'Queried permissions cannot be negated: "-a.b"'
    );
  });

  it('asks about the root with a star', () => {
    expect(PermissionPath.parseQuery('*').isRoot).toBe(true);
  });
});

describe('PermissionPath', () => {
  it('covers itself and its descendants', () => {
    expect(parse('a').covers(parse('a'))).toBe(true);
    expect(parse('a').covers(parse('a.b.c'))).toBe(true);
    expect(parse('a.b').covers(parse('a'))).toBe(false);
    expect(parse('a').covers(parse('ab'))).toBe(false);
  });

  it('covers only strictly deeper paths when descendants-only', () => {
    expect(parse('a.*').covers(parse('a'))).toBe(false);
    expect(parse('a.*').covers(parse('a.b'))).toBe(true);
    expect(parse('a.*').covers(parse('a.*'))).toBe(true);
  });

  it('covers everything from the root', () => {
    expect(parse('*').covers(parse('x.y.z'))).toBe(true);
  });

  it('ignores negation and argument in equality', () => {
    expect(parse('-a.b: x').equals(parse('a.b'))).toBe(true);
    expect(parse('a.b').equals(parse('a.b.*'))).toBe(false);
  });

  it('ranks deeper and descendants-only paths as more specific', () => {
    expect(parse('a').specificity).toBe(2);
    expect(parse('a.*').specificity).toBe(3);
    expect(parse('a.b').specificity).toBe(4);
    expect(PermissionPath.compareSpecificity(parse('a.b'), parse('a.*'))).toBe(1);
  });

  it('sorts a path before its descendants', () => {
    const sorted = ['b', 'a.*', 'a', 'a.c', 'a.b']
      .map(parse)
      .sort(PermissionPath.comparePaths)
      .map((path) => path.key);

    expect(sorted).toEqual(['a', 'a.*', 'a.b', 'a.c', 'b']);
  });

  it('formats with or without the argument', () => {
    const path = parse(' -a.b.* :  x ');

    expect(path.toString()).toBe('-a.b.*: x');
    expect(path.toString(false)).toBe('-a.b.*');
    expect(path.granting().toString()).toBe('a.b.*: x');
    expect(parse('a').negated().withArgument('y').toString()).toBe('-a: y');
  });
});
