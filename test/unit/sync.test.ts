import { describe, it, after } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs';
import path from 'path';
import { runSync, pullEntries, pushEntries, summarize } from '../../src/services/sync.js';
import {
  CodecError,
  ProviderAuthError,
  ProviderNotFoundError,
  ProviderTransportError,
} from '../../src/errors.js';
import { MemoryProvider } from '../helpers/memory-provider.js';
import { makeEntry, tmpDir, removeDirs } from '../helpers/fixtures.js';
import type { SyncOutcome } from '../../src/types/index.js';

const FAST = { retryDelayMs: 0 };

const UNREADABLE_REMOTE =
  'remote value of "app/api" is not key/value content: line 1: expected KEY=VALUE';

function statuses(outcomes: SyncOutcome[]): string[] {
  return outcomes.map(outcome => `${outcome.entryKey}:${outcome.status}`);
}

describe('sync', () => {
  const dirs: string[] = [];

  function dir(): string {
    const created = tmpDir();
    dirs.push(created);
    return created;
  }

  after(() => removeDirs(dirs));

  describe('pull', () => {
    it('creates a missing local file from the remote value', async () => {
      const root = dir();
      const entry = makeEntry(root, 'api');
      const provider = new MemoryProvider({ 'app/api': { A: '1', B: 'two words' } });

      const report = await pullEntries(provider, [entry], FAST);

      assert.deepEqual(report.outcomes, [
        { entryKey: 'api', secretName: 'app/api', path: entry.path, status: 'created' },
      ]);
      assert.equal(report.failed, false);
      assert.equal(fs.readFileSync(entry.path, 'utf-8'), 'A=1\nB="two words"\n');
    });

    it('reports unchanged when the file already matches', async () => {
      const root = dir();
      const entry = makeEntry(root, 'api');
      fs.writeFileSync(entry.path, 'A=1\n');
      const provider = new MemoryProvider({ 'app/api': { A: '1' } });

      const report = await pullEntries(provider, [entry], FAST);

      assert.deepEqual(statuses(report.outcomes), ['api:unchanged']);
    });

    it('overwrites a differing file completely', async () => {
      const root = dir();
      const entry = makeEntry(root, 'api');
      fs.writeFileSync(entry.path, '# local notes\nA=0\nLOCAL_ONLY=x\n');
      const provider = new MemoryProvider({ 'app/api': { A: '1' } });

      const report = await pullEntries(provider, [entry], FAST);

      assert.deepEqual(statuses(report.outcomes), ['api:updated']);
      assert.equal(fs.readFileSync(entry.path, 'utf-8'), 'A=1\n');
    });

    it('writes JSON files with the json codec', async () => {
      const root = dir();
      const entry = makeEntry(root, 'web', { file: 'web.json' });
      const provider = new MemoryProvider({ 'app/web': { TOKEN: 'abc' } });

      await pullEntries(provider, [entry], FAST);

      assert.equal(fs.readFileSync(entry.path, 'utf-8'), '{\n  "TOKEN": "abc"\n}\n');
    });

    it('fails on a missing remote secret and leaves the local file alone', async () => {
      const root = dir();
      const entry = makeEntry(root, 'api');
      fs.writeFileSync(entry.path, 'KEEP=1\n');
      const provider = new MemoryProvider();

      const report = await pullEntries(provider, [entry], FAST);

      assert.deepEqual(report.outcomes, [
        {
          entryKey: 'api',
          secretName: 'app/api',
          path: entry.path,
          status: 'failed',
          reason: 'remote secret absent: "app/api" does not exist',
        },
      ]);
      assert.equal(report.failed, true);
      assert.equal(fs.readFileSync(entry.path, 'utf-8'), 'KEEP=1\n');
    });

    it('fails when the remote keys cannot be written to the file format', async () => {
      const root = dir();
      const entry = makeEntry(root, 'api');
      const provider = new MemoryProvider({ 'app/api': { 'my-key': 'x' } });

      const report = await pullEntries(provider, [entry], FAST);

      const [outcome] = report.outcomes;
      assert.equal(outcome.status, 'failed');
      assert.equal(
        outcome.status === 'failed' && outcome.reason,
        'key "my-key" cannot be written as KEY=VALUE'
      );
      assert.equal(fs.existsSync(entry.path), false);
    });

    it('fails with the remote named when the remote value cannot be decoded', async () => {
      const root = dir();
      const entry = makeEntry(root, 'api');
      fs.writeFileSync(entry.path, 'KEEP=1\n');
      const provider = new MemoryProvider({ 'app/api': { A: '1' } });
      provider.failNext('fetch', new CodecError('MalformedLine', UNREADABLE_REMOTE));

      const report = await pullEntries(provider, [entry], FAST);

      const [outcome] = report.outcomes;
      assert.equal(outcome.status === 'failed' && outcome.reason, UNREADABLE_REMOTE);
      assert.equal(fs.readFileSync(entry.path, 'utf-8'), 'KEEP=1\n');
    });

    it('writes nothing in dry-run mode', async () => {
      const root = dir();
      const created = makeEntry(root, 'api');
      const updated = makeEntry(root, 'worker');
      fs.writeFileSync(updated.path, 'A=0\n');
      const provider = new MemoryProvider({ 'app/api': { A: '1' }, 'app/worker': { A: '1' } });

      const report = await pullEntries(provider, [created, updated], { ...FAST, dryRun: true });

      assert.equal(report.dryRun, true);
      assert.deepEqual(statuses(report.outcomes), ['api:created', 'worker:updated']);
      assert.equal(fs.existsSync(created.path), false);
      assert.equal(fs.readFileSync(updated.path, 'utf-8'), 'A=0\n');
    });
  });

  describe('push', () => {
    it('creates a missing secret with its metadata', async () => {
      const root = dir();
      const metadata = { description: 'API secrets', tags: { team: 'core' } };
      const entry = makeEntry(root, 'api', { metadata });
      fs.writeFileSync(entry.path, 'A=1\n');
      const provider = new MemoryProvider();

      const report = await pushEntries(provider, [entry], FAST);

      assert.deepEqual(statuses(report.outcomes), ['api:created']);
      assert.deepEqual(provider.secrets.get('app/api'), { value: { A: '1' }, metadata });
      assert.deepEqual(
        provider.calls.map(call => call.method),
        ['exists', 'create']
      );
    });

    it('is idempotent: a second push of the same file changes nothing', async () => {
      const root = dir();
      const entry = makeEntry(root, 'api');
      fs.writeFileSync(entry.path, 'A=1\nB=2\n');
      const provider = new MemoryProvider();

      const first = await pushEntries(provider, [entry], FAST);
      const callsAfterFirst = provider.calls.length;
      const second = await pushEntries(provider, [entry], FAST);

      assert.deepEqual(statuses(first.outcomes), ['api:created']);
      assert.deepEqual(statuses(second.outcomes), ['api:unchanged']);
      assert.deepEqual(
        provider.calls.slice(callsAfterFirst).map(call => call.method),
        ['exists', 'fetch']
      );
      assert.equal(provider.callsOf('create').length, 1);
      assert.equal(provider.callsOf('update').length, 0);
    });

    it('never re-sends metadata after the secret exists', async () => {
      const root = dir();
      const metadata = { description: 'first description', tags: { stage: 'dev' } };
      const entry = makeEntry(root, 'api', { metadata });
      fs.writeFileSync(entry.path, 'A=1\n');
      const provider = new MemoryProvider();

      await pushEntries(provider, [entry], FAST);
      fs.writeFileSync(entry.path, 'A=2\n');
      const changed = { ...entry, metadata: { description: 'second description' } };
      const report = await pushEntries(provider, [changed], FAST);

      assert.deepEqual(statuses(report.outcomes), ['api:updated']);
      assert.deepEqual(provider.secrets.get('app/api'), { value: { A: '2' }, metadata });
      assert.deepEqual(provider.callsOf('update'), [{ method: 'update', secretName: 'app/api' }]);
    });

    it('treats a value with reordered keys as unchanged', async () => {
      const root = dir();
      const entry = makeEntry(root, 'api');
      fs.writeFileSync(entry.path, 'A=1\nB=2\n');
      const provider = new MemoryProvider({ 'app/api': { B: '2', A: '1' } });

      const report = await pushEntries(provider, [entry], FAST);

      assert.deepEqual(statuses(report.outcomes), ['api:unchanged']);
      assert.equal(provider.callsOf('update').length, 0);
    });

    it('keeps going after an entry fails to decode', async () => {
      const root = dir();
      const entries = ['one', 'two', 'three'].map(key => makeEntry(root, key));
      fs.writeFileSync(entries[0].path, 'A=1\n');
      fs.writeFileSync(entries[1].path, 'A=1\nA=2\n');
      fs.writeFileSync(entries[2].path, 'C=3\n');
      const provider = new MemoryProvider();

      const report = await pushEntries(provider, entries, FAST);

      assert.deepEqual(statuses(report.outcomes), ['one:created', 'two:failed', 'three:created']);
      const failedOutcome = report.outcomes[1];
      assert.equal(failedOutcome.status === 'failed' && failedOutcome.reason, 'line 2: duplicate key "A"');
      assert.equal(report.failed, true);
      assert.equal(provider.secrets.has('app/two'), false);
      assert.deepEqual(summarize(report), {
        created: 2,
        updated: 0,
        unchanged: 0,
        skipped: 0,
        failed: 1,
      });
    });

    it('fails an entry whose local file is missing', async () => {
      const root = dir();
      const entry = makeEntry(root, 'api');
      const provider = new MemoryProvider();

      const report = await pushEntries(provider, [entry], FAST);

      assert.deepEqual(report.outcomes, [
        {
          entryKey: 'api',
          secretName: 'app/api',
          path: entry.path,
          status: 'failed',
          reason: `local file "${entry.path}" does not exist`,
        },
      ]);
      assert.equal(provider.calls.length, 0);
    });

    it('falls back to an update when it loses the creation race', async () => {
      const root = dir();
      const entry = makeEntry(root, 'api', { metadata: { description: 'mine' } });
      fs.writeFileSync(entry.path, 'A=1\n');
      const provider = new MemoryProvider();
      provider.beforeCreate = secretName => {
        provider.secrets.set(secretName, { value: { OTHER: 'writer' } });
      };

      const report = await pushEntries(provider, [entry], FAST);

      assert.deepEqual(statuses(report.outcomes), ['api:updated']);
      assert.deepEqual(provider.secrets.get('app/api'), { value: { A: '1' } });
      assert.deepEqual(
        provider.calls.map(call => call.method),
        ['exists', 'create', 'update']
      );
    });

    it('fails when the update after a lost race also fails', async () => {
      const root = dir();
      const entry = makeEntry(root, 'api');
      fs.writeFileSync(entry.path, 'A=1\n');
      const provider = new MemoryProvider();
      provider.beforeCreate = secretName => {
        provider.secrets.set(secretName, { value: {} });
      };
      provider.failNext('update', new ProviderNotFoundError('app/api'));

      const report = await pushEntries(provider, [entry], FAST);

      const [outcome] = report.outcomes;
      assert.equal(
        outcome.status === 'failed' && outcome.reason,
        'create race unresolved: secret "app/api" not found'
      );
    });

    it('overwrites a remote value that cannot be decoded', async () => {
      const root = dir();
      const entry = makeEntry(root, 'api');
      fs.writeFileSync(entry.path, 'A=1\n');
      const provider = new MemoryProvider({ 'app/api': { OLD: 'x' } });
      provider.failNext('fetch', new CodecError('MalformedLine', UNREADABLE_REMOTE));

      const report = await pushEntries(provider, [entry], FAST);

      assert.deepEqual(statuses(report.outcomes), ['api:updated']);
      assert.deepEqual(provider.secrets.get('app/api'), { value: { A: '1' } });
      assert.deepEqual(
        provider.calls.map(call => call.method),
        ['exists', 'fetch', 'update']
      );
    });

    it('reports an undecodable remote value as updated in dry-run mode', async () => {
      const root = dir();
      const entry = makeEntry(root, 'api');
      fs.writeFileSync(entry.path, 'A=1\n');
      const provider = new MemoryProvider({ 'app/api': { OLD: 'x' } });
      provider.failNext('fetch', new CodecError('MalformedLine', UNREADABLE_REMOTE));

      const report = await pushEntries(provider, [entry], { ...FAST, dryRun: true });

      assert.deepEqual(statuses(report.outcomes), ['api:updated']);
      assert.equal(provider.callsOf('update').length, 0);
      assert.deepEqual(provider.secrets.get('app/api'), { value: { OLD: 'x' } });
    });

    it('reports what would change in dry-run mode without writing', async () => {
      const root = dir();
      const fresh = makeEntry(root, 'fresh');
      const stale = makeEntry(root, 'stale');
      fs.writeFileSync(fresh.path, 'A=1\n');
      fs.writeFileSync(stale.path, 'A=2\n');
      const provider = new MemoryProvider({ 'app/stale': { A: '1' } });

      const report = await pushEntries(provider, [fresh, stale], { ...FAST, dryRun: true });

      assert.deepEqual(statuses(report.outcomes), ['fresh:created', 'stale:updated']);
      assert.equal(provider.secrets.has('app/fresh'), false);
      assert.deepEqual(provider.secrets.get('app/stale'), { value: { A: '1' } });
      assert.equal(provider.callsOf('create').length, 0);
      assert.equal(provider.callsOf('update').length, 0);
    });
  });

  describe('retries and fatal errors', () => {
    it('retries transport errors with backoff', async () => {
      const root = dir();
      const entry = makeEntry(root, 'api');
      fs.writeFileSync(entry.path, 'A=1\n');
      const provider = new MemoryProvider();
      provider.failNext('exists', new ProviderTransportError('timeout'));
      provider.failNext('exists', new ProviderTransportError('timeout'));
      const logs: string[] = [];

      const report = await pushEntries(provider, [entry], { ...FAST, log: message => logs.push(message) });

      assert.deepEqual(statuses(report.outcomes), ['api:created']);
      assert.equal(provider.callsOf('exists').length, 3);
      assert.deepEqual(logs, [
        'check app/api failed (timeout), retrying in 0ms',
        'check app/api failed (timeout), retrying in 0ms',
      ]);
    });

    it('fails the entry once retries are exhausted', async () => {
      const root = dir();
      const entry = makeEntry(root, 'api');
      const provider = new MemoryProvider({ 'app/api': { A: '1' } });
      for (let i = 0; i < 3; i++) {
        provider.failNext('fetch', new ProviderTransportError('connection reset'));
      }

      const report = await pullEntries(provider, [entry], FAST);

      const [outcome] = report.outcomes;
      assert.equal(outcome.status === 'failed' && outcome.reason, 'connection reset');
      assert.equal(provider.callsOf('fetch').length, 3);
    });

    it('does not retry other provider errors', async () => {
      const root = dir();
      const entry = makeEntry(root, 'api');
      const provider = new MemoryProvider({ 'app/api': { A: '1' } });
      provider.failNext('fetch', new ProviderNotFoundError('app/api'));

      await pullEntries(provider, [entry], { ...FAST, retries: 5 });

      assert.equal(provider.callsOf('fetch').length, 1);
    });

    it('aborts the run on an authentication failure', async () => {
      const root = dir();
      const entries = [makeEntry(root, 'one'), makeEntry(root, 'two')];
      const provider = new MemoryProvider({ 'app/one': { A: '1' }, 'app/two': { B: '2' } });
      provider.failNext('fetch', new ProviderAuthError('invalid token'));

      await assert.rejects(
        pullEntries(provider, entries, FAST),
        (err: unknown) => err instanceof ProviderAuthError && err.message === 'invalid token'
      );
      assert.equal(provider.calls.length, 1);
      assert.equal(fs.existsSync(entries[1].path), false);
    });

    it('keeps the outcomes of entries finished before an authentication failure', async () => {
      const root = dir();
      const entries = ['one', 'two', 'three'].map(key => makeEntry(root, key));
      const provider = new MemoryProvider({
        'app/one': { A: '1' },
        'app/two': { B: '2' },
        'app/three': { C: '3' },
      });
      provider.failNext('fetch', new ProviderTransportError('timeout'));
      provider.failNext('fetch', new ProviderAuthError('expired token'));

      await assert.rejects(
        pullEntries(provider, entries, { ...FAST, retries: 0 }),
        (err: unknown) => {
          assert.ok(err instanceof ProviderAuthError);
          assert.equal(err.message, 'expired token');
          assert.deepEqual(err.outcomes, [
            {
              entryKey: 'one',
              secretName: 'app/one',
              path: entries[0].path,
              status: 'failed',
              reason: 'timeout',
            },
          ]);
          return true;
        }
      );
      assert.equal(fs.existsSync(entries[2].path), false);
    });
  });

  describe('scheduling', () => {
    it('skips entries not started before cancellation', async () => {
      const root = dir();
      const entries = ['one', 'two', 'three'].map(key => makeEntry(root, key));
      const provider = new MemoryProvider({
        'app/one': { A: '1' },
        'app/two': { A: '2' },
        'app/three': { A: '3' },
      });
      const controller = new AbortController();

      const report = await runSync('pull', provider, entries, {
        ...FAST,
        signal: controller.signal,
        onOutcome: () => controller.abort(),
      });

      assert.deepEqual(statuses(report.outcomes), ['one:created', 'two:skipped', 'three:skipped']);
      const skippedOutcome = report.outcomes[1];
      assert.equal(skippedOutcome.status === 'skipped' && skippedOutcome.reason, 'cancelled');
      assert.equal(report.failed, false);
      assert.equal(fs.existsSync(entries[1].path), false);
    });

    it('bounds in-flight provider calls and keeps manifest order', async () => {
      const root = dir();
      const keys = ['a', 'b', 'c', 'd', 'e'];
      const entries = keys.map(key => makeEntry(root, key));
      const provider = new MemoryProvider(
        Object.fromEntries(keys.map(key => [`app/${key}`, { KEY: key }]))
      );
      provider.delayMs = 5;

      const report = await pullEntries(provider, entries, { ...FAST, concurrency: 2 });

      assert.deepEqual(statuses(report.outcomes), keys.map(key => `${key}:created`));
      assert.equal(provider.maxInFlight, 2);
      for (const key of keys) {
        assert.equal(fs.readFileSync(path.join(root, `${key}.env`), 'utf-8'), `KEY=${key}\n`);
      }
    });

    it('reports an empty run as successful', async () => {
      const report = await pushEntries(new MemoryProvider(), [], FAST);
      assert.deepEqual(report, { direction: 'push', dryRun: false, outcomes: [], failed: false });
    });
  });
});
