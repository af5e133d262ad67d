import { describe, expect, it } from 'vitest';
import { MemoryTableStore } from './memory.js';

describe('MemoryTableStore', () => {
  it('creates a missing table when headers are ensured', async () => {
    const store = new MemoryTableStore();

    const index = await store.ensureHeaders('Players', ['Player Id', 'Player Name']);

    expect([...index.values()]).toEqual([0, 1]);
    expect(await store.readTable('Players')).toEqual({ headers: ['Player Id', 'Player Name'], rows: [] });
  });

  it('pads rows to the header width when writing', async () => {
    const store = new MemoryTableStore();

    await store.writeRows('Guild', { headers: ['Guild Id', 'Guild Name', 'Members'], rows: [['G1'], ['G2', 'Beta', '50', 'extra']] });

    expect(await store.readTable('Guild')).toEqual({
      headers: ['Guild Id', 'Guild Name', 'Members'],
      rows: [
        ['G1', '', ''],
        ['G2', 'Beta', '50']
      ]
    });
    expect(store.writes).toEqual(['Guild']);
  });

  it('hands out copies so callers cannot mutate stored rows', async () => {
    const store = new MemoryTableStore({ Guild: { headers: ['Guild Id'], rows: [['G1']] } });

    const table = await store.readTable('Guild');
    table?.rows[0].splice(0, 1, 'changed');

    expect((await store.readTable('Guild'))?.rows).toEqual([['G1']]);
  });

  it('snapshots the named tables of another store', async () => {
    const source = new MemoryTableStore({
      Guild: { headers: ['Guild Id'], rows: [['G1']] },
      Other: { headers: ['x'], rows: [] }
    });

    const copy = await MemoryTableStore.snapshot(source, ['Guild', 'Missing']);

    expect(copy.tableNames()).toEqual(['Guild']);
  });
});
