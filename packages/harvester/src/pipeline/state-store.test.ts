import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  existsSync,
  mkdirSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from 'node:fs';
import { join } from 'node:path';
import { StateStore } from './state-store.js';
import type { CrawlStateSnapshot } from './types.js';

const TEST_DIR = join(process.cwd(), 'tmp', 'test-state-store');
const STATE_PATH = join(TEST_DIR, 'state.json');

const SNAPSHOT: CrawlStateSnapshot = {
  processed_pages: ['https://x/1'],
  processed_members: ['m1', 'm2'],
  pending_pages: ['https://x/2', 'https://x/3'],
  stats: {
    start_time: '2026-03-01T09:00:00.000Z',
    members_harvested: 2,
    pages_processed: 1,
    errors: 0,
    total_duration: 0,
  },
  last_updated: '2026-03-01T09:00:01.000Z',
};

function cleanup(): void {
  if (existsSync(TEST_DIR)) {
    rmSync(TEST_DIR, { recursive: true, force: true });
  }
}

describe('StateStore', () => {
  beforeEach(() => {
    cleanup();
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    cleanup();
  });

  it('save and load round-trip', () => {
    const store = new StateStore(STATE_PATH);

    expect(store.save(SNAPSHOT)).toBe(true);
    expect(store.load()).toEqual(SNAPSHOT);
  });

  it('writes human-readable JSON with the documented field names', () => {
    new StateStore(STATE_PATH).save(SNAPSHOT);

    const content = readFileSync(STATE_PATH, 'utf-8');
    expect(content.startsWith('{\n  "processed_pages": [\n    "https://x/1"\n  ],')).toBe(true);
    expect(Object.keys(JSON.parse(content))).toEqual([
      'processed_pages',
      'processed_members',
      'pending_pages',
      'stats',
      'last_updated',
    ]);
  });

  it('save fully overwrites the previous state', () => {
    const store = new StateStore(STATE_PATH);
    store.save(SNAPSHOT);
    store.save({ ...SNAPSHOT, pending_pages: [], processed_members: ['m9'] });

    const loaded = store.load();
    expect(loaded?.pending_pages).toEqual([]);
    expect(loaded?.processed_members).toEqual(['m9']);
  });

  it('load returns undefined when the file does not exist', () => {
    expect(new StateStore(STATE_PATH).load()).toBeUndefined();
  });

  it('load returns undefined for a corrupt file', () => {
    writeFileSync(STATE_PATH, '{"processed_pages": ["https://x/1"', 'utf-8');

    expect(new StateStore(STATE_PATH).load()).toBeUndefined();
  });

  it('load returns undefined for a file with the wrong shape', () => {
    writeFileSync(STATE_PATH, JSON.stringify({ processed_pages: 'nope' }), 'utf-8');

    expect(new StateStore(STATE_PATH).load()).toBeUndefined();
  });

  it('fills in counters missing from older files', () => {
    writeFileSync(
      STATE_PATH,
      JSON.stringify({
        processed_pages: ['https://x/1'],
        stats: { start_time: '2026-03-01T09:00:00.000Z' },
        last_updated: '2026-03-01T09:00:01.000Z',
      }),
      'utf-8',
    );

    expect(new StateStore(STATE_PATH).load()).toEqual({
      processed_pages: ['https://x/1'],
      processed_members: [],
      pending_pages: [],
      stats: {
        start_time: '2026-03-01T09:00:00.000Z',
        members_harvested: 0,
        pages_processed: 0,
        errors: 0,
        total_duration: 0,
      },
      last_updated: '2026-03-01T09:00:01.000Z',
    });
  });

  it('creates the directory when missing', () => {
    const nested = new StateStore(join(TEST_DIR, 'deep', 'nested', 'state.json'));

    expect(nested.save(SNAPSHOT)).toBe(true);
    expect(nested.load()).toEqual(SNAPSHOT);
  });

  it('save reports failure instead of throwing', () => {
    const blocker = join(TEST_DIR, 'blocker');
    writeFileSync(blocker, 'not a directory', 'utf-8');
    const store = new StateStore(join(blocker, 'state.json'));

    expect(store.save(SNAPSHOT)).toBe(false);
  });
});
