import { Table } from './table.js';

test('toDebugStr()', () => {
  let table: Table<number> = Table.init(2, 3, () => 0);
  table.setCell(1, 1, 354);
  expect('\n' + table.toDebugStr()).toEqual(
    ['', '  0    0  0', '  0  354  0', ''].join('\n')
  );
});

test('setCell() rejects cells outside the table', () => {
  let table: Table<string> = Table.init(1, 1, () => '');
  expect(() => table.setCell(1, 0, 'x')).toThrow(
    'TableIndexError: Invalid row 1. Must be between 0 and 1 exclusive'
  );
  expect(() => table.setCell(0, 2, 'x')).toThrow(
    'TableIndexError: Invalid col 2. Must be between 0 and 1 exclusive'
  );
});
