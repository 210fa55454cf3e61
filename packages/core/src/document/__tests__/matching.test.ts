import { describe, it, expect } from 'vitest';
import { applyChanges, equalityFields, matchesFilter, project } from '../matching.js';
import { normalizeChanges } from '../validation.js';
import { ValidationError } from '../../errors.js';

describe('matchesFilter', () => {
  const document = {
    _id: 'doc-1',
    name: 'Ada',
    age: 36,
    tags: ['math', 'engines'],
    address: { city: 'London', zip: 'N1' },
    joined: new Date('2024-01-15T00:00:00Z'),
  };

  it('should match by equality', () => {
    expect(matchesFilter(document, { name: 'Ada' })).toBe(true);
    expect(matchesFilter(document, { name: 'Grace' })).toBe(false);
    expect(matchesFilter(document, {})).toBe(true);
  });

  it('should match array membership', () => {
    expect(matchesFilter(document, { tags: 'math' })).toBe(true);
    expect(matchesFilter(document, { tags: ['math', 'engines'] })).toBe(true);
    expect(matchesFilter(document, { tags: 'poetry' })).toBe(false);
  });

  it('should follow dotted paths', () => {
    expect(matchesFilter(document, { 'address.city': 'London' })).toBe(true);
    expect(matchesFilter(document, { 'address.country': { $exists: false } })).toBe(true);
  });

  it('should compare numbers, strings and dates', () => {
    expect(matchesFilter(document, { age: { $gt: 30, $lte: 36 } })).toBe(true);
    expect(matchesFilter(document, { age: { $lt: 36 } })).toBe(false);
    expect(matchesFilter(document, { name: { $gte: 'A', $lt: 'B' } })).toBe(true);
    expect(matchesFilter(document, { joined: { $gte: new Date('2024-01-01T00:00:00Z') } })).toBe(true);
    expect(matchesFilter(document, { age: { $gt: '30' } })).toBe(false);
  });

  it('should support $in, $nin, $ne and $exists', () => {
    expect(matchesFilter(document, { name: { $in: ['Ada', 'Grace'] } })).toBe(true);
    expect(matchesFilter(document, { name: { $nin: ['Ada'] } })).toBe(false);
    expect(matchesFilter(document, { name: { $ne: 'Grace' } })).toBe(true);
    expect(matchesFilter(document, { nickname: { $ne: 'Countess' } })).toBe(true);
    expect(matchesFilter(document, { age: { $exists: true } })).toBe(true);
  });

  it('should combine clauses with $and, $or and $nor', () => {
    expect(matchesFilter(document, { $or: [{ name: 'Grace' }, { age: 36 }] })).toBe(true);
    expect(matchesFilter(document, { $and: [{ name: 'Ada' }, { age: 37 }] })).toBe(false);
    expect(matchesFilter(document, { $nor: [{ name: 'Grace' }] })).toBe(true);
  });

  it('should reject unknown operators', () => {
    expect(() => matchesFilter(document, { name: { $regex: '^A' } })).toThrow(
      "Unsupported filter operator '$regex'"
    );
    expect(() => matchesFilter(document, { $or: { name: 'Ada' } })).toThrow(
      "Operator '$or' requires an array of filters"
    );
  });
});

describe('applyChanges', () => {
  it('should set, unset, increment and push', () => {
    const updated = applyChanges(
      { _id: 'doc-1', name: 'Ada', visits: 1, legacy: true, tags: ['a'] },
      {
        $set: { 'profile.title': 'Countess' },
        $unset: { legacy: '' },
        $inc: { visits: 2, fresh: 5 },
        $push: { tags: 'b' },
      }
    );

    expect(updated).toEqual({
      _id: 'doc-1',
      name: 'Ada',
      visits: 3,
      fresh: 5,
      tags: ['a', 'b'],
      profile: { title: 'Countess' },
    });
  });

  it('should not modify the input document', () => {
    const original = { _id: 'doc-1', visits: 1 };

    applyChanges(original, { $inc: { visits: 1 } });

    expect(original).toEqual({ _id: 'doc-1', visits: 1 });
  });

  it('should refuse to change _id', () => {
    expect(() => applyChanges({ _id: 'doc-1' }, { $set: { _id: 'doc-2' } })).toThrow(ValidationError);
  });

  it('should refuse to increment non-numeric fields', () => {
    expect(() => applyChanges({ name: 'Ada' }, { $inc: { name: 1 } })).toThrow(
      "Cannot apply '$inc' to non-numeric field 'name'"
    );
  });
});

describe('normalizeChanges', () => {
  it('should wrap plain payloads as $set', () => {
    expect(normalizeChanges({ role: 'admin' }, {})).toEqual({ $set: { role: 'admin' } });
  });

  it('should pass operator payloads through', () => {
    const payload = { $set: { role: 'admin' }, $inc: { logins: 1 } };

    expect(normalizeChanges(payload, {})).toBe(payload);
  });

  it('should require operator values to be objects', () => {
    expect(() => normalizeChanges({ $set: 'admin' }, {})).toThrow("Operator '$set' requires an object of fields");
  });
});

describe('equalityFields', () => {
  it('should collect equality and $eq clauses only', () => {
    expect(
      equalityFields({
        email: 'ada@example.com',
        'profile.team': 'core',
        status: { $eq: 'active' },
        age: { $gt: 30 },
        $or: [{ a: 1 }],
      })
    ).toEqual({ email: 'ada@example.com', profile: { team: 'core' }, status: 'active' });
  });
});

describe('project', () => {
  it('should keep the requested fields and _id', () => {
    const document = { _id: 'doc-1', name: 'Ada', age: 36, address: { city: 'London', zip: 'N1' } };

    expect(project(document, ['name', 'address.city', 'missing'])).toEqual({
      _id: 'doc-1',
      name: 'Ada',
      address: { city: 'London' },
    });
  });
});
