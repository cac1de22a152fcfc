import { describe, expect, it } from 'vitest';

import { InvalidSnapshotError } from './errors';
import { parseSnapshot, validateSnapshot } from './snapshot';

describe('validateSnapshot', () => {
  it('accepts a snapshot with every section optional', () => {
    expect(validateSnapshot({})).toEqual({});
    expect(
      validateSnapshot({
        defaults: { permissions: ['read'] },
        users: { '1': { groups: ['editors'] } },
      })
    ).toEqual({
      defaults: { permissions: ['read'] },
      users: { '1': { groups: ['editors'] } },
    });
  });

  it('drops fields it does not know', () => {
    expect(validateSnapshot({ groups: { g: { permissions: [], extra: true } } })).toEqual({
      groups: { g: { permissions: [] } },
    });
  });

  it.each([
    [[], 'Permissions snapshot must be an object'],
    [{ defaults: 'read' }, 'defaults must be an object'],
    [{ groups: [] }, 'groups must be an object'],
    [{ users: { '1': { permissions: 'a' } } }, 'users.1.permissions must be an array'],
    [{ groups: { g: { groups: ['a', 2] } } }, 'groups.g.groups[1] must be a string'],
  ])('rejects %j', (value, message) => {
    expect(() => validateSnapshot(value)).toThrow(InvalidSnapshotError);
    expect(() => validateSnapshot(value)).toThrow(message);
  });
});

describe('parseSnapshot', () => {
  it('parses JSON', () => {
    expect(parseSnapshot('{"defaults":{"groups":["everyone"]}}')).toEqual({
      defaults: { groups: ['everyone'] },
    });
  });

  it('keeps a user whose id is __proto__', () => {
    const json = '{"users":{"__proto__":{"permissions":["a"]}}}';

    const snapshot = parseSnapshot(json);

    expect(Object.keys(snapshot.users ?? {})).toEqual(['__proto__']);
    expect(JSON.stringify(snapshot)).toBe(json);
  });

  it('reports JSON that does not parse', () => {
    expect(() => parseSnapshot('{')).toThrow(/^Failed to parse permissions: /);
  });
});
