import { describe, expect, it } from 'vitest';
import { KeyedTable, mergeRow } from './table.js';

function playersTable(): KeyedTable {
  return new KeyedTable(
    'Players',
    {
      headers: ['Player Id', 'Player Name', 'Guild Name', 'Notes'],
      rows: [
        ['p1', 'Ana', 'A', 'keep'],
        ['p2', 'Ben', 'B', ''],
        ['p3', 'Cid', 'A', 'x']
      ]
    },
    ['Player Id']
  );
}

describe('KeyedTable', () => {
  it('looks rows up by key', () => {
    const table = playersTable();

    expect(table.get(['p2'])).toEqual(['p2', 'Ben', 'B', '']);
    expect(table.get([' p3 '])).toEqual(['p3', 'Cid', 'A', 'x']);
    expect(table.get(['p9'])).toBeUndefined();
  });

  it('replaces a scope at the position of its first row', () => {
    const table = playersTable();

    const result = table.replaceScope('Guild Name', ['A'], [['p4', 'Dan', 'A']]);

    expect(result).toEqual({ removed: 2, inserted: 1 });
    expect(table.rows).toEqual([
      ['p4', 'Dan', 'A', ''],
      ['p2', 'Ben', 'B', '']
    ]);
    expect(table.get(['p1'])).toBeUndefined();
    expect(table.get(['p2'])).toEqual(['p2', 'Ben', 'B', '']);
    expect(table.get(['p4'])).toEqual(['p4', 'Dan', 'A', '']);
  });

  it('appends a scope that had no rows yet', () => {
    const table = playersTable();

    table.replaceScope('Guild Name', ['C'], [['p5', 'Eve', 'C', '']]);

    expect(table.rows.map((row) => row[0])).toEqual(['p1', 'p2', 'p3', 'p5']);
    expect(table.get(['p5'])?.[1]).toBe('Eve');
  });

  it('appends missing key headers and resolves synonyms', () => {
    const bare = new KeyedTable('X', { headers: ['Name'], rows: [['a']] }, ['Player Id']);
    expect(bare.headers).toEqual(['Name', 'Player Id']);
    expect(bare.rows).toEqual([['a', '']]);

    const units = new KeyedTable(
      'Player_Units',
      { headers: ['Player Guild', 'Player Name', 'VADER'], rows: [['A', 'Ana', 'R7']] },
      ['Guild Name', 'Player Name']
    );
    expect(units.headers).toHaveLength(3);
    expect(units.get(['A', 'Ana'])).toEqual(['A', 'Ana', 'R7']);
  });

  it('upserts in place or at the end', () => {
    const table = playersTable();

    table.upsert(['p2', 'Ben', 'B', 'updated']);
    table.upsert(['p6', 'Fay', 'B']);

    expect(table.rows[1]).toEqual(['p2', 'Ben', 'B', 'updated']);
    expect(table.rows[3]).toEqual(['p6', 'Fay', 'B', '']);
  });

  it('adds a column once and pads every row', () => {
    const table = playersTable();

    expect(table.addColumn('Level')).toBe(4);
    expect(table.addColumn('level')).toBe(4);
    expect(table.rows[0]).toEqual(['p1', 'Ana', 'A', 'keep', '']);
  });

  it('prunes columns and keeps the index usable', () => {
    const table = playersTable();

    expect(table.pruneColumns((header) => header !== 'Notes')).toEqual(['Notes']);
    expect(table.toTable()).toEqual({
      headers: ['Player Id', 'Player Name', 'Guild Name'],
      rows: [
        ['p1', 'Ana', 'A'],
        ['p2', 'Ben', 'B'],
        ['p3', 'Cid', 'A']
      ]
    });
    expect(table.get(['p3'])).toEqual(['p3', 'Cid', 'A']);
  });

  it('selects rows by column value', () => {
    expect(playersTable().rowsWhere('Guild Name', ['A']).map((row) => row[0])).toEqual(['p1', 'p3']);
  });

  it('removes matching rows and reindexes the rest', () => {
    const table = playersTable();

    expect(table.removeWhere((row) => row[0] === 'p1')).toBe(1);
    expect(table.rows.map((row) => row[0])).toEqual(['p2', 'p3']);
    expect(table.get(['p1'])).toBeUndefined();
    expect(table.get(['p3'])).toEqual(['p3', 'Cid', 'A', 'x']);
  });
});

describe('mergeRow', () => {
  it('overwrites owned positions and keeps the rest', () => {
    const row = mergeRow(4, ['p1', 'Ana', 'A', 'keep'], new Map([[1, 'Ana B']]), new Set([0, 1, 2]));

    expect(row).toEqual(['', 'Ana B', '', 'keep']);
  });

  it('starts from an empty row without a previous one', () => {
    expect(mergeRow(3, undefined, new Map([[0, 'x']]), new Set([0]))).toEqual(['x', '', '']);
  });
});
