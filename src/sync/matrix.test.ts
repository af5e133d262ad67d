import { describe, expect, it } from 'vitest';
import { KeyedTable } from './table.js';
import { SkillTierAccumulator, growMatrix, headerBaseId, planMatrixColumns, pruneEmptyColumns } from './matrix.js';

const KEYS = ['Guild Name', 'Player Name'];

describe('planMatrixColumns', () => {
  it('orders by key and suffixes colliding names', () => {
    const columns = planMatrixColumns(
      [
        { key: 'VADER', name: 'Darth Vader' },
        { key: 'ANAKIN', name: 'Darth Vader' },
        { key: 'GUILDNAME', name: 'Guild Name' },
        { key: 'LUKE', name: '' },
        { key: 'VADER', name: 'Ignored' }
      ],
      KEYS
    );

    expect(columns.map((column) => column.header)).toEqual([
      'Darth Vader',
      'Guild Name (GUILDNAME)',
      'LUKE',
      'Darth Vader (VADER)'
    ]);
  });
});

describe('growMatrix', () => {
  it('matches existing headers before appending new ones', () => {
    const columns = planMatrixColumns(
      [
        { key: 'VADER', name: 'Darth Vader' },
        { key: 'ANAKIN', name: 'Darth Vader' },
        { key: 'GUILDNAME', name: 'Guild Name' },
        { key: 'LUKE', name: '' }
      ],
      KEYS
    );

    const grown = growMatrix(['Guild Name', 'Player Name', 'Notes', 'Darth Vader (VADER)', 'ANAKIN'], columns, KEYS);

    expect(grown.headers).toEqual([
      'Guild Name',
      'Player Name',
      'Notes',
      'Darth Vader (VADER)',
      'ANAKIN',
      'Guild Name (GUILDNAME)',
      'LUKE'
    ]);
    expect([...grown.columnByKey.entries()]).toEqual([
      ['ANAKIN', 4],
      ['GUILDNAME', 5],
      ['LUKE', 6],
      ['VADER', 3]
    ]);
    expect(grown.added).toEqual(['Guild Name (GUILDNAME)', 'LUKE']);
  });
});

describe('headerBaseId', () => {
  it('recognizes bare and suffixed base ids', () => {
    expect(headerBaseId('VADER')).toBe('VADER');
    expect(headerBaseId('Darth Vader (VADER)')).toBe('VADER');
    expect(headerBaseId('Notes')).toBeUndefined();
  });
});

describe('pruneEmptyColumns', () => {
  it('drops only the empty candidate columns', () => {
    const table = new KeyedTable(
      'Player_Skills',
      {
        headers: ['Player Guild', 'Player Name', 'S1', 'S2', 'Notes'],
        rows: [
          ['A', 'Ana', '8', '', ''],
          ['B', 'Ben', '', ' ', '']
        ]
      },
      ['Player Guild', 'Player Name']
    );

    expect(pruneEmptyColumns(table, [2, 3])).toEqual(['S2']);
    expect(table.headers).toEqual(['Player Guild', 'Player Name', 'S1', 'Notes']);
    expect(table.rows).toEqual([
      ['A', 'Ana', '8', ''],
      ['B', 'Ben', '', '']
    ]);
  });
});

describe('SkillTierAccumulator', () => {
  it('keeps the highest tier seen', () => {
    const tiers = new SkillTierAccumulator();
    for (const tier of [3, 7, 5]) tiers.observe('A', 'Ana', 'skill1', tier);
    tiers.observe('A', 'Ana', 'skill1', undefined);
    tiers.observe('B', 'Ana', 'skill1', 1);

    expect(tiers.get('A', 'Ana', 'skill1')).toBe(7);
    expect(tiers.get('B', 'Ana', 'skill1')).toBe(1);
    expect([...tiers.tiersFor('A', 'Ana').entries()]).toEqual([['skill1', 7]]);
    expect(tiers.tiersFor('C', 'Ana').size).toBe(0);
  });
});
