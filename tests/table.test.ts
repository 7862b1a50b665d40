import test from 'node:test';
import assert from 'node:assert/strict';
import { printTableForColumns, renderTable } from '../src/util/table';
import { EmptyInputError, MissingFieldError } from '../src/errors';
import type { Logger } from '../src/types';

const records = [
  { a: '1', b: '2', c: '3' },
  { a: '4', b: '5', c: '6' }
];

test('renderTable renders header, separator and one line per record', () => {
  assert.equal(renderTable(records, ['a', 'b', 'c']), 'a | b | c\n--+---+--\n1 | 2 | 3\n4 | 5 | 6\n');
});

test('renderTable sizes columns from data values and mixes value types', () => {
  const rows = [
    { number: 101, created_at: '2024-01-02', title: 'Crash on start' },
    { number: 7, created_at: '2024-03-15', title: 'Typo' }
  ];
  const text = renderTable(rows, ['number', 'created_at', 'title']);
  assert.equal(
    text,
    [
      'number | created_at | title         ',
      '----+------------+---------------',
      '101 | 2024-01-02 | Crash on start',
      '7   | 2024-03-15 | Typo          ',
      ''
    ].join('\n')
  );
});

test('renderTable produces records.length + 2 lines', () => {
  const text = renderTable(records, ['c']);
  assert.equal(text.split('\n').length - 1, records.length + 2);
});

test('renderTable prints large integers and booleans in full', () => {
  assert.equal(
    renderTable([{ n: 1e21, ok: false }], ['n', 'ok']),
    'n                      | ok   \n' +
      '-----------------------+------\n' +
      '1000000000000000000000 | false\n'
  );
});

test('renderTable is idempotent', () => {
  assert.equal(renderTable(records, ['b', 'a']), renderTable(records, ['b', 'a']));
});

test('renderTable rejects empty records', () => {
  assert.throws(() => renderTable([], ['a']), EmptyInputError);
});

test('renderTable with no headers still emits one line per record', () => {
  assert.equal(renderTable([{ a: '1' }], []), '\n\n\n');
});

test('renderTable applies the missing-field policy', () => {
  const rows = [{ a: 'x' }, { a: 'y', b: 'zz' }];
  assert.equal(renderTable(rows, ['a', 'b']), 'a | b \n--+---\nx |   \ny | zz\n');
  assert.equal(
    renderTable(rows, ['a', 'b'], { onMissingField: { kind: 'placeholder', text: '-' } }),
    'a | b \n--+---\nx | - \ny | zz\n'
  );
  assert.throws(() => renderTable(rows, ['a', 'b'], { onMissingField: { kind: 'fail' } }), MissingFieldError);
});

test('renderTable uses the configured line break', () => {
  assert.equal(renderTable([{ a: '1' }], ['a'], { lineBreak: '\r\n' }), 'a\r\n-\r\n1\r\n');
});

test('renderTable logs a debug line per render', () => {
  const messages: string[] = [];
  const logger: Logger = { debug: (message) => messages.push(message) };
  renderTable(records, ['a', 'b', 'c'], { logger });
  assert.deepEqual(messages, ['fixed-width-table: rendered 2 rows x 3 columns']);
});

test('printTableForColumns writes the whole table once', () => {
  const chunks: string[] = [];
  printTableForColumns(records, ['a'], { sink: { write: (chunk: string) => chunks.push(chunk) } });
  assert.deepEqual(chunks, ['a\n-\n1\n4\n']);
});

test('printTableForColumns writes nothing when rendering fails', () => {
  const chunks: string[] = [];
  const sink = { write: (chunk: string) => chunks.push(chunk) };
  assert.throws(() => printTableForColumns([{ a: '1' }], ['b'], { sink, onMissingField: { kind: 'fail' } }));
  assert.equal(chunks.length, 0);
});
