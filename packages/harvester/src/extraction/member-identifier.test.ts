import { describe, it, expect } from 'vitest';
import { createHash } from 'node:crypto';
import { MemberIdentifier } from './member-identifier.js';

describe('MemberIdentifier', () => {
  const identifier = new MemberIdentifier();

  it('uses @id before the other candidate fields', () => {
    expect(
      identifier.identify({
        '@id': 'https://x/member/1',
        id: 'https://x/other',
        object: 'https://x/object',
      }),
    ).toBe('https://x/member/1');
  });

  it('falls through to id, then object', () => {
    expect(identifier.identify({ id: 'https://x/member/2' })).toBe(
      'https://x/member/2',
    );
    expect(identifier.identify({ object: 'https://x/object/3' })).toBe(
      'https://x/object/3',
    );
  });

  it('unwraps an object carrying an identifier', () => {
    expect(
      identifier.identify({
        type: 'Create',
        object: { '@id': 'https://x/object/4', name: 'Four' },
      }),
    ).toBe('https://x/object/4');
  });

  it('skips candidate fields that hold no usable identifier', () => {
    expect(
      identifier.identify({
        '@id': 12,
        object: { name: 'anonymous' },
        '@type': 'Activity',
      }),
    ).toBe('Activity');
  });

  it('hashes the canonical JSON when no identity field exists', () => {
    const member = { name: 'alpha', value: 1 };
    const expected = createHash('sha256')
      .update('{"name":"alpha","value":1}')
      .digest('hex');

    expect(identifier.identify(member)).toBe(expected);
  });

  it('gives identical content the same fallback identity regardless of key order', () => {
    const first = identifier.identify({
      name: 'alpha',
      tags: ['a', 'b'],
      nested: { y: 2, z: 1 },
    });
    const second = identifier.identify({
      nested: { z: 1, y: 2 },
      tags: ['a', 'b'],
      name: 'alpha',
    });

    expect(first).toBe(second);
    expect(first).toMatch(/^[0-9a-f]{64}$/);
  });

  it('gives different content different fallback identities', () => {
    expect(identifier.identify({ name: 'alpha' })).not.toBe(
      identifier.identify({ name: 'beta' }),
    );
  });
});
