import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { InvalidTransitionError } from './errors';
import { silentLogger } from './logger';
import { serializeState } from './state';
import { SessionStore } from './store';

describe('SessionStore', () => {
  let dir: string;
  let file: string;
  let store: SessionStore;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'crew-relay-store-'));
    file = path.join(dir, 'session.json');
    store = new SessionStore(file, { repoRoot: '/repo', logger: silentLogger });
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('should create a normalized document on first read', async () => {
    const state = await store.read();
    expect(state.personas.pm.status).toBe('idle');
    const onDisk = await fs.promises.readFile(file, 'utf-8');
    expect(onDisk).toBe(serializeState(state));
  });

  it('should round-trip a written document', async () => {
    const state = await store.read();
    state.personas.review.message = 'looking at the diff';
    expect(await store.writeIfChanged(state)).toBe(true);
    expect(await store.writeIfChanged(state)).toBe(false);

    const again = await store.read();
    expect(again).toEqual(state);
  });

  it('should quarantine a corrupt file exactly once and keep working', async () => {
    await fs.promises.writeFile(file, '{"personas": {', 'utf-8');

    const state = await store.read();
    expect(state.personas.docs.status).toBe('idle');

    const quarantined = (await fs.promises.readdir(dir)).filter((name) => name.startsWith('session.json.corrupt-'));
    expect(quarantined).toHaveLength(1);
    expect(await fs.promises.readFile(path.join(dir, quarantined[0]), 'utf-8')).toBe('{"personas": {');

    await store.setStatus('docs', 'working');
    expect((await store.read()).personas.docs.status).toBe('working');
    const after = (await fs.promises.readdir(dir)).filter((name) => name.startsWith('session.json.corrupt-'));
    expect(after).toHaveLength(1);
  });

  it('should treat a blank file as empty without quarantining it', async () => {
    await fs.promises.writeFile(file, '  \n', 'utf-8');
    const state = await store.read();
    expect(state.version).toBe(3);
    const names = await fs.promises.readdir(dir);
    expect(names.some((name) => name.includes('.corrupt-'))).toBe(false);
  });

  it('should leave no temp files behind', async () => {
    await store.setStatus('pm', 'working');
    await store.setInputReady('pm', true);
    const names = await fs.promises.readdir(dir);
    expect(names.filter((name) => name.includes('.tmp.'))).toEqual([]);
  });

  it('should serialize concurrent updates', async () => {
    const stores = [0, 1, 2, 3].map(() => new SessionStore(file, { repoRoot: '/repo', logger: silentLogger }));
    await Promise.all(
      Array.from({ length: 20 }, (_, i) =>
        stores[i % stores.length].update((state) => {
          state.personas.pm.message = `${state.personas.pm.message}x`;
        }),
      ),
    );
    expect((await store.read()).personas.pm.message).toBe('x'.repeat(20));
  });

  it('should enforce the transition table unless forced', async () => {
    await store.setStatus('impl', 'working');
    await expect(store.setStatus('impl', 'waiting')).rejects.toThrow(InvalidTransitionError);
    await store.setStatus('impl', 'waiting', { force: true, message: 'blocked on review' });

    const record = (await store.read()).personas.impl;
    expect(record.status).toBe('waiting');
    expect(record.message).toBe('blocked on review');
  });

  it('should record input readiness and pane ids', async () => {
    await store.setInputReady('review', true);
    await store.setPaneId('review', '%3');
    const record = (await store.read()).personas.review;
    expect(record.inputReady).toBe(true);
    expect(record.paneId).toBe('%3');
  });

  describe('waitFor', () => {
    it('should resolve true once the predicate holds', async () => {
      const waiting = store.waitFor((state) => state.personas.docs.status === 'done', { timeoutMs: 2000, pollMs: 10 });
      await store.setStatus('docs', 'done');
      expect(await waiting).toBe(true);
    });

    it('should resolve false after the timeout', async () => {
      const started = Date.now();
      const result = await store.waitFor((state) => state.personas.docs.status === 'done', {
        timeoutMs: 100,
        pollMs: 20,
      });
      expect(result).toBe(false);
      expect(Date.now() - started).toBeGreaterThanOrEqual(100);
    });
  });
});
