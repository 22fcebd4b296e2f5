import assert from 'node:assert/strict';
import test from 'node:test';

import {
  assertGazetteerHeader,
  dedupeRecords,
  gazetteerHeaderProblem,
  loadGazetteer,
  parseGazetteerCsv,
  readGazetteerRows
} from '../lib/gazetteer.js';
import { withTempCwd, writeFixtureFile, writeGazetteerFixture } from './test_fs.js';

test('parseGazetteerCsv reads records with and without districts', () => {
  const records = parseGazetteerCsv(
    [
      'id,province,city,district',
      '1,广东省,深圳市,南山区',
      '',
      '2,广东省,东莞市,',
      '3, 广东省 , 中山市 '
    ].join('\n'),
    'guangdong.csv'
  );

  assert.deepEqual(records, [
    { province: '广东省', city: '深圳市', district: '南山区' },
    { province: '广东省', city: '东莞市' },
    { province: '广东省', city: '中山市' }
  ]);
});

test('readGazetteerRows keeps 1-based line numbers and column counts', () => {
  const rows = readGazetteerRows('id,province,city,district\r\n\r\n1,广东省\r\n2,广东省,深圳市,南山区', 'x.csv');

  assert.deepEqual(
    rows.map((row) => [row.line, row.columns]),
    [
      [3, 2],
      [4, 4]
    ]
  );
});

test('rows without a province or city are skipped', () => {
  const records = parseGazetteerCsv(
    ['id,province,city,district', '1,广东省', '2,,深圳市,南山区', '3,广东省,,南山区'].join('\n'),
    'broken.csv'
  );

  assert.deepEqual(records, []);
});

test('assertGazetteerHeader accepts a byte order mark', () => {
  assert.doesNotThrow(() => assertGazetteerHeader('\uFEFFid,province,city,district\n', 'bom.csv'));
});

test('assertGazetteerHeader names the file on a bad header', () => {
  assert.throws(
    () => assertGazetteerHeader('province,city\n', 'library/bad.csv'),
    /library\/bad\.csv must start with header 'id,province,city,district'\. Found: 'province,city'/
  );
});

test('gazetteerHeaderProblem describes the header without a file name', () => {
  assert.equal(gazetteerHeaderProblem('id,province,city,district\n1,广东省,深圳市,南山区'), undefined);
  assert.equal(
    gazetteerHeaderProblem('\n1,广东省,深圳市'),
    "must start with header 'id,province,city,district'. Found: ''"
  );
});

test('dedupeRecords keeps the first occurrence', () => {
  const records = dedupeRecords([
    { province: '广东省', city: '深圳市', district: '南山区' },
    { province: '广东省', city: '东莞市' },
    { province: '广东省', city: '深圳市', district: '南山区' },
    { province: '广东省', city: '东莞市' }
  ]);

  assert.deepEqual(records, [
    { province: '广东省', city: '深圳市', district: '南山区' },
    { province: '广东省', city: '东莞市' }
  ]);
});

test('loadGazetteer merges files in path order and drops duplicates', async () => {
  await withTempCwd('gazetteer-load-', async (root) => {
    await writeGazetteerFixture(root, 'data/b/zhejiang.csv', ['浙江省,杭州市,西湖区', '广东省,深圳市,南山区']);
    await writeGazetteerFixture(root, 'data/a.csv', ['广东省,深圳市,南山区']);
    await writeFixtureFile(root, 'data/notes.txt', 'ignored');

    const records = await loadGazetteer('data');

    assert.deepEqual(records, [
      { province: '广东省', city: '深圳市', district: '南山区' },
      { province: '浙江省', city: '杭州市', district: '西湖区' }
    ]);
  });
});

test('loadGazetteer reads the default directory under the working directory', async () => {
  await withTempCwd('gazetteer-default-', async (root) => {
    await writeGazetteerFixture(root, 'library/gazetteer/test.csv', ['测试省,样例市,']);

    assert.deepEqual(await loadGazetteer(), [{ province: '测试省', city: '样例市' }]);
  });
});

test('loadGazetteer rejects a missing directory, no files, or no records', async () => {
  await withTempCwd('gazetteer-errors-', async (root) => {
    await assert.rejects(loadGazetteer('missing'), /Gazetteer directory not found: missing/);

    await writeFixtureFile(root, 'empty/readme.txt', 'nothing here');
    await assert.rejects(loadGazetteer('empty'), /No gazetteer CSV files found in empty/);

    await writeGazetteerFixture(root, 'headers/only.csv', []);
    await assert.rejects(loadGazetteer('headers'), /Gazetteer in headers has no usable records/);

    await writeFixtureFile(root, 'bad/x.csv', 'province,city\n广东省,深圳市');
    await assert.rejects(loadGazetteer('bad'), /bad\/x\.csv must start with header/);
  });
});
