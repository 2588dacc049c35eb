import { describe, it, expect } from 'vitest';
import { MutationEngine } from '../../src/MutationEngine.js';
import { InMemoryRecordStore } from '../../src/infrastructure/stores/InMemoryRecordStore.js';
import { InMemoryCheckpointStore } from '../../src/infrastructure/state/InMemoryCheckpointStore.js';
import { createTokenMutator } from '../../src/domain/services/TokenMutator.js';
import { pendingCheckpoint } from '../../src/domain/model/Checkpoint.js';
import type { Checkpoint, CheckpointLookup } from '../../src/domain/model/Checkpoint.js';
import type { CheckpointStore } from '../../src/domain/ports/CheckpointStore.js';
import type { DomainEvent, RunProgressEvent } from '../../src/domain/events/DomainEvents.js';
import { ScriptedRecordStore } from '../helpers/ScriptedRecordStore.js';
import { makeRecords, sequentialTokens } from '../helpers/records.js';

/** Checkpoint store that remembers every write. */
class RecordingCheckpointStore implements CheckpointStore {
  readonly writes: Checkpoint[] = [];
  private readonly inner = new InMemoryCheckpointStore();

  read(): Promise<CheckpointLookup> {
    return this.inner.read();
  }

  async write(checkpoint: Checkpoint): Promise<void> {
    this.writes.push(checkpoint);
    await this.inner.write(checkpoint);
  }
}

describe('MutationEngine', () => {
  it('should regenerate every token with pairwise distinct values', async () => {
    const store = new InMemoryRecordStore(makeRecords(1000));
    const engine = new MutationEngine({ recordStore: store, pageSize: 100 });

    const outcome = await engine.run();

    expect(outcome.status).toBe('DONE');
    expect(outcome.summary).toMatchObject({
      totalRows: 1000,
      totalPages: 10,
      startPage: 1,
      lastCommittedPage: 10,
      pagesCommitted: 10,
      rowsMutated: 1000,
    });
    const rows = store.snapshot();
    expect(rows.every((row) => row.token !== `original-${String(row.id)}`)).toBe(true);
    expect(new Set(rows.map((row) => row.token)).size).toBe(1000);
  });

  it.each([0, 1, 99, 100, 101, 1000])(
    'should never hold more than one page of records (%i rows)',
    async (rowCount) => {
      const store = new ScriptedRecordStore(new InMemoryRecordStore(makeRecords(rowCount)));
      const engine = new MutationEngine({ recordStore: store, pageSize: 100 });

      const outcome = await engine.run();

      expect(outcome.status).toBe('DONE');
      expect(store.peakFetched).toBeLessThanOrEqual(100);
      expect(Math.max(0, ...store.committedBatchSizes)).toBeLessThanOrEqual(100);
      expect(store.committedBatchSizes.reduce((sum, size) => sum + size, 0)).toBe(rowCount);
      expect(store.committedBatchSizes).toHaveLength(Math.ceil(rowCount / 100));
    },
  );

  it('should process the final partial page', async () => {
    const store = new ScriptedRecordStore(new InMemoryRecordStore(makeRecords(101)));
    const engine = new MutationEngine({ recordStore: store, pageSize: 100 });

    await engine.run();

    expect(store.committedBatchSizes).toEqual([100, 1]);
  });

  it('should complete immediately on an empty table', async () => {
    const checkpointStore = new InMemoryCheckpointStore();
    const engine = new MutationEngine({ recordStore: new InMemoryRecordStore(), checkpointStore, pageSize: 100 });

    const outcome = await engine.run();

    expect(outcome.status).toBe('DONE');
    expect(outcome.summary.pagesCommitted).toBe(0);
    expect(await checkpointStore.read()).toMatchObject({
      found: true,
      checkpoint: { status: 'COMPLETE', lastCommittedPage: 0, totalPages: 0 },
    });
  });

  it('should resume after an interruption without touching committed pages', async () => {
    const inner = new InMemoryRecordStore(makeRecords(1000));
    const checkpointStore = new InMemoryCheckpointStore();

    const firstStore = new ScriptedRecordStore(inner);
    const first = new MutationEngine({
      recordStore: firstStore,
      checkpointStore,
      pageSize: 100,
      mutator: createTokenMutator(sequentialTokens('first')),
    });
    firstStore.onCommitted = (commits) => {
      if (commits === 3) first.interrupt('test stop');
    };

    const stopped = await first.run();

    expect(stopped.status).toBe('INTERRUPTED');
    if (stopped.status === 'INTERRUPTED') {
      expect(stopped.cause).toEqual({ kind: 'interrupted', reason: 'test stop' });
      expect(stopped.checkpoint).toMatchObject({ lastCommittedPage: 3, totalPages: 10, status: 'PENDING' });
    }
    const afterFirst = inner.snapshot();
    expect(afterFirst[299]).toEqual({ id: 300, token: 'first-300' });
    expect(afterFirst[300]).toEqual({ id: 301, token: 'original-301' });

    const secondStore = new ScriptedRecordStore(inner);
    const second = new MutationEngine({
      recordStore: secondStore,
      checkpointStore,
      pageSize: 100,
      mutator: createTokenMutator(sequentialTokens('second')),
    });

    const resumed = await second.run();

    expect(resumed.status).toBe('DONE');
    expect(resumed.summary).toMatchObject({ startPage: 4, pagesCommitted: 7, rowsMutated: 700 });
    expect(secondStore.fetchedPages).toEqual([4, 5, 6, 7, 8, 9, 10]);
    const afterSecond = inner.snapshot();
    expect(afterSecond.slice(0, 300)).toEqual(afterFirst.slice(0, 300));
    expect(afterSecond[300]).toEqual({ id: 301, token: 'second-1' });
    expect(afterSecond[999]).toEqual({ id: 1000, token: 'second-700' });
  });

  it('should resume every remaining row when the same store is reused with a smaller page size', async () => {
    const inner = new InMemoryRecordStore(makeRecords(1000));

    const firstStore = new ScriptedRecordStore(inner);
    const first = new MutationEngine({
      recordStore: firstStore,
      pageSize: 100,
      mutator: createTokenMutator(sequentialTokens('first')),
    });
    firstStore.onCommitted = (commits) => {
      if (commits === 3) first.interrupt('test stop');
    };
    expect((await first.run()).status).toBe('INTERRUPTED');

    const second = new MutationEngine({
      recordStore: new ScriptedRecordStore(inner),
      checkpointStore: new InMemoryCheckpointStore(pendingCheckpoint(3, 20, 50)),
      pageSize: 50,
      mutator: createTokenMutator(sequentialTokens('second')),
    });
    const resumed = await second.run();

    expect(resumed.status).toBe('DONE');
    expect(resumed.summary).toMatchObject({ startPage: 4, pagesCommitted: 17, rowsMutated: 850 });
    const rows = inner.snapshot();
    expect(rows[150]).toEqual({ id: 151, token: 'second-1' });
    expect(rows[999]).toEqual({ id: 1000, token: 'second-850' });
    const untouched = rows.slice(150).filter((r) => !r.token.startsWith('second-'));
    expect(untouched).toEqual([]);
  });

  it('should restart from page 1 when the table grew since the checkpoint', async () => {
    const store = new ScriptedRecordStore(new InMemoryRecordStore(makeRecords(1000)));
    const checkpointStore = new InMemoryCheckpointStore(pendingCheckpoint(10, 10, 100));
    store.inner.insert(makeRecords(500, 1001));
    const engine = new MutationEngine({ recordStore: store, checkpointStore, pageSize: 100 });
    const discarded: DomainEvent[] = [];
    engine.on('checkpoint:discarded', (event) => discarded.push(event));

    const outcome = await engine.run();

    expect(discarded).toHaveLength(1);
    expect(discarded[0]).toMatchObject({ reason: 'ROW_COUNT_CHANGED' });
    expect(outcome.summary).toMatchObject({ startPage: 1, totalPages: 15, pagesCommitted: 15 });
    expect(store.fetchedPages[0]).toBe(1);
  });

  it('should start a fresh full run after the completion sentinel', async () => {
    const store = new ScriptedRecordStore(new InMemoryRecordStore(makeRecords(300)));
    const checkpointStore = new InMemoryCheckpointStore();

    await new MutationEngine({ recordStore: store, checkpointStore, pageSize: 100 }).run();
    expect(await checkpointStore.read()).toMatchObject({
      found: true,
      checkpoint: { status: 'COMPLETE', lastCommittedPage: 3, totalPages: 3 },
    });

    const again = await new MutationEngine({ recordStore: store, checkpointStore, pageSize: 100 }).run();

    expect(again.summary).toMatchObject({ startPage: 1, pagesCommitted: 3 });
    expect(store.fetchedPages).toEqual([1, 2, 3, 1, 2, 3]);
  });

  it('should only ever move the checkpoint forward across invocations', async () => {
    const inner = new InMemoryRecordStore(makeRecords(1000));
    const checkpointStore = new RecordingCheckpointStore();

    for (const stopAfter of [3, 4]) {
      const store = new ScriptedRecordStore(inner);
      const engine = new MutationEngine({ recordStore: store, checkpointStore, pageSize: 100 });
      store.onCommitted = (commits) => {
        if (commits === stopAfter) engine.interrupt();
      };
      await engine.run();
    }
    await new MutationEngine({ recordStore: inner, checkpointStore, pageSize: 100 }).run();

    expect(checkpointStore.writes.map((c) => [c.lastCommittedPage, c.status])).toEqual([
      [3, 'PENDING'],
      [7, 'PENDING'],
      [10, 'COMPLETE'],
    ]);
  });

  it('should commit pages in strictly increasing order', async () => {
    const engine = new MutationEngine({ recordStore: new InMemoryRecordStore(makeRecords(550)), pageSize: 50 });
    const committed: number[] = [];
    engine.on('page:committed', (event) => committed.push(event.pageIndex));

    await engine.run();

    expect(committed).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11]);
  });

  it('should report progress including pages committed by an earlier invocation', async () => {
    const engine = new MutationEngine({
      recordStore: new InMemoryRecordStore(makeRecords(1000)),
      checkpointStore: new InMemoryCheckpointStore(pendingCheckpoint(3, 10, 100)),
      pageSize: 100,
    });
    const progress: RunProgressEvent[] = [];
    engine.on('run:progress', (event) => progress.push(event));

    await engine.run();

    expect(progress.map((e) => e.progress.rowsProcessed)).toEqual([400, 500, 600, 700, 800, 900, 1000]);
    expect(progress[0]?.progress.percent).toBe(40);
    expect(progress.at(-1)?.progress).toMatchObject({ percent: 100, remainingMs: 0, lastCommittedPage: 10 });
    const remaining = progress.map((e) => e.progress.remainingMs);
    for (let i = 1; i < remaining.length; i++) {
      expect(remaining[i]).toBeLessThanOrEqual(remaining[i - 1] ?? Number.POSITIVE_INFINITY);
    }
  });

  it('should emit lifecycle events in order', async () => {
    const engine = new MutationEngine({ recordStore: new InMemoryRecordStore(makeRecords(150)), pageSize: 100 });
    const types: string[] = [];
    engine.onAny((event) => types.push(event.type));

    await engine.run();

    expect(types).toEqual([
      'run:started',
      'page:started',
      'page:committed',
      'run:progress',
      'page:started',
      'page:committed',
      'run:progress',
      'run:completed',
    ]);
  });

  it('should report status and refuse to run twice', async () => {
    const engine = new MutationEngine({ recordStore: new InMemoryRecordStore(makeRecords(10)), pageSize: 5 });
    expect(engine.getStatus().status).toBe('INIT');

    await engine.run();

    expect(engine.getStatus()).toMatchObject({
      status: 'DONE',
      progress: { percent: 100, rowsProcessed: 10, totalPages: 2, lastCommittedPage: 2 },
    });
    expect(engine.interrupt()).toBe(false);
    await expect(engine.run()).rejects.toThrow("Cannot run from status 'DONE'");
  });

  it('should reject a second run started while the first is still counting rows', async () => {
    const store = new InMemoryRecordStore(makeRecords(300));
    const engine = new MutationEngine({ recordStore: store, pageSize: 100 });

    const first = engine.run();
    const second = engine.run();

    await expect(second).rejects.toThrow('Run already started');
    const outcome = await first;
    expect(outcome.status).toBe('DONE');
    expect(outcome.summary).toMatchObject({ startPage: 1, pagesCommitted: 3, rowsMutated: 300 });
  });

  it('should produce the same result with offset and keyset paging', async () => {
    const records = makeRecords(345).map((r, i) => ({ ...r, id: i * 2 + 1 }));
    const offsetStore = new InMemoryRecordStore(records);
    const keysetStore = new InMemoryRecordStore(records);

    await new MutationEngine({
      recordStore: offsetStore,
      pageSize: 40,
      strategy: 'offset',
      mutator: createTokenMutator(sequentialTokens()),
    }).run();
    await new MutationEngine({
      recordStore: keysetStore,
      pageSize: 40,
      strategy: 'keyset',
      mutator: createTokenMutator(sequentialTokens()),
    }).run();

    expect(keysetStore.snapshot()).toEqual(offsetStore.snapshot());
  });

  it('should validate its configuration', () => {
    const recordStore = new InMemoryRecordStore();

    expect(() => new MutationEngine({ recordStore, pageSize: 0 })).toThrow(RangeError);
    expect(() => new MutationEngine({ recordStore, maxRetries: -1 })).toThrow(RangeError);
    expect(() => new MutationEngine({ recordStore, retryDelayMs: Number.NaN })).toThrow(RangeError);
  });
});
