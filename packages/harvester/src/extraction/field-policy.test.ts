import { describe, it, expect } from 'vitest';
import {
  FIELD_SYNONYMS,
  asObjects,
  isEventStream,
  readAllFields,
  readField,
} from './field-policy.js';

describe('field policy', () => {
  it('declares the tolerated spellings per concept in lookup order', () => {
    expect(FIELD_SYNONYMS.relation).toEqual([
      'relation',
      '@relation',
      'tree:relation',
    ]);
    expect(FIELD_SYNONYMS.member).toEqual([
      'member',
      'members',
      '@member',
      '@members',
      'tree:member',
    ]);
    expect(FIELD_SYNONYMS.identity).toEqual(['@id', 'id', 'object', '@type']);
  });

  it('readField returns the first present non-null value', () => {
    expect(readField({ view: null, '@view': { a: 1 } }, 'view')).toEqual({
      a: 1,
    });
    expect(readField({ other: 1 }, 'view')).toBeUndefined();
  });

  it('readField skips empty lists and strings in favour of later synonyms', () => {
    expect(
      readField({ relation: [], '@relation': [{ node: 'https://x/2' }] }, 'relation'),
    ).toEqual([{ node: 'https://x/2' }]);
    expect(readField({ '@id': '', id: 'urn:a' }, 'nodeId')).toBe('urn:a');
    expect(readField({ view: [], '@view': '' }, 'view')).toBeUndefined();
  });

  it('readAllFields returns every present value in policy order', () => {
    expect(readAllFields({ '@type': 'A', type: ['B'] }, 'type')).toEqual([
      'A',
      ['B'],
    ]);
  });

  it('readField honours a custom policy', () => {
    const policy = { ...FIELD_SYNONYMS, view: ['hydra:view'] };
    expect(readField({ 'hydra:view': 'x', view: 'y' }, 'view', policy)).toBe(
      'x',
    );
  });

  it('asObjects flattens records and drops other values', () => {
    expect(asObjects([{ a: 1 }, 'x', [{ b: 2 }]])).toEqual([{ a: 1 }]);
    expect(asObjects({ a: 1 })).toEqual([{ a: 1 }]);
    expect(asObjects(undefined)).toEqual([]);
  });

  it('detects an event stream root by either type key', () => {
    expect(isEventStream({ '@type': 'EventStream' })).toBe(true);
    expect(isEventStream({ type: 'EventStream' })).toBe(true);
    expect(isEventStream({ '@type': ['tree:Collection', 'ldes:EventStream'] })).toBe(true);
    expect(isEventStream({ '@type': 'tree:Node' })).toBe(false);
    expect(isEventStream({})).toBe(false);
  });
});
