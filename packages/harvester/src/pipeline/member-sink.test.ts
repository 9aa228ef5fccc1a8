import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, readdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { ConversionFailure } from '../errors.js';
import { sha256Hex } from '../utils/hash.js';
import {
  NTriplesMemberSink,
  artifactName,
  buildMemberDocument,
} from './member-sink.js';

const TEST_DIR = join(process.cwd(), 'tmp', 'test-member-sink');

const context = { name: 'http://schema.org/name' };

describe('buildMemberDocument', () => {
  it('attaches the page context to a member without one', () => {
    expect(buildMemberDocument({ '@id': 'urn:a' }, context)).toEqual({
      '@context': context,
      '@id': 'urn:a',
    });
  });

  it('keeps the member context when present', () => {
    const member = { '@context': { title: 'urn:t' }, '@id': 'urn:a' };

    expect(buildMemberDocument(member, context)).toBe(member);
  });

  it('returns the member unchanged when there is no context at all', () => {
    const member = { '@id': 'urn:a' };

    expect(buildMemberDocument(member, undefined)).toBe(member);
  });

  it('unwraps an object graph and gives it the page context', () => {
    const member = {
      '@context': { other: 'urn:o' },
      '@graph': { '@id': 'urn:obj', name: 'Obj' },
    };

    expect(buildMemberDocument(member, context)).toEqual({
      '@context': context,
      '@id': 'urn:obj',
      name: 'Obj',
    });
  });

  it('falls back to the member context for an object graph', () => {
    const member = {
      '@context': { other: 'urn:o' },
      '@graph': { '@id': 'urn:obj' },
    };

    expect(buildMemberDocument(member, undefined)).toEqual({
      '@context': { other: 'urn:o' },
      '@id': 'urn:obj',
    });
  });

  it('keeps a graph that declares its own context', () => {
    const graph = { '@context': { own: 'urn:own' }, '@id': 'urn:obj' };

    expect(buildMemberDocument({ '@graph': graph }, context)).toBe(graph);
  });

  it('wraps an array graph', () => {
    const graph = [{ '@id': 'urn:x' }, { '@id': 'urn:y' }];

    expect(buildMemberDocument({ '@graph': graph }, context)).toEqual({
      '@context': context,
      '@graph': graph,
    });
  });
});

describe('NTriplesMemberSink', () => {
  beforeEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('names artifacts by the sha256 of the identity', () => {
    expect(artifactName('https://example.org/a')).toBe(
      `${sha256Hex('https://example.org/a')}.nt`,
    );
    expect(artifactName('https://example.org/a')).toMatch(/^[0-9a-f]{64}\.nt$/);
  });

  it('writes the member as N-Triples', async () => {
    const sink = new NTriplesMemberSink(TEST_DIR);

    const result = await sink.persist(
      'https://example.org/a',
      { '@id': 'https://example.org/a', name: 'Alpha' },
      context,
    );

    const expectedPath = join(TEST_DIR, artifactName('https://example.org/a'));
    expect(result).toEqual({ success: true, artifactPath: expectedPath });
    expect(readFileSync(expectedPath, 'utf-8')).toBe(
      '<https://example.org/a> <http://schema.org/name> "Alpha" .\n',
    );
  });

  it('returns a ConversionFailure for an unconvertible member', async () => {
    const sink = new NTriplesMemberSink(TEST_DIR);

    const result = await sink.persist(
      'urn:broken',
      { '@context': 5, '@id': 'urn:broken' },
      undefined,
    );

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(ConversionFailure);
      expect(result.error.identity).toBe('urn:broken');
    }
    expect(readdirSync(TEST_DIR)).toEqual([]);
  });

  it('returns a ConversionFailure when the directory is missing', async () => {
    const sink = new NTriplesMemberSink(join(TEST_DIR, 'missing'));

    const result = await sink.persist(
      'https://example.org/a',
      { '@id': 'https://example.org/a', name: 'Alpha' },
      context,
    );

    expect(result.success).toBe(false);
    expect(existsSync(join(TEST_DIR, 'missing'))).toBe(false);
  });
});
