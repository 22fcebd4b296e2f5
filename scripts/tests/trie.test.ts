import assert from 'node:assert/strict';
import test from 'node:test';

import { Trie } from '../lib/trie.js';

function cityTrie(): Trie<string> {
  const trie = new Trie<string>();
  trie.insert('深圳', '深圳市');
  trie.insert('深圳市', '深圳市');
  trie.insert('广州市', '广州市');
  return trie;
}

test('findLongestPrefix keeps walking past a shorter hit', () => {
  const match = cityTrie().findLongestPrefix('深圳市南山区');

  assert.deepEqual(match, { matched: '深圳市', value: '深圳市', length: 3 });
});

test('findLongestPrefix falls back to the last complete key', () => {
  const match = cityTrie().findLongestPrefix('深圳南山');

  assert.deepEqual(match, { matched: '深圳', value: '深圳市', length: 2 });
});

test('findLongestPrefix ignores a path that never completes a key', () => {
  const trie = cityTrie();

  assert.equal(trie.findLongestPrefix('广州'), undefined);
  assert.equal(trie.findLongestPrefix('佛山市'), undefined);
  assert.equal(trie.findLongestPrefix(''), undefined);
});

test('findLongestPrefix reports UTF-16 lengths for astral characters', () => {
  const trie = new Trie<number>();
  trie.insert('𠀋村', 1);

  const text = '𠀋村东路';
  const match = trie.findLongestPrefix(text);

  assert.equal(match?.length, 3);
  assert.equal(text.slice(match?.length), '东路');
});

test('insert overwrites the value of an existing key', () => {
  const trie = new Trie<string>();
  trie.insert('北京', '北京市');
  trie.insert('北京', '北京');

  assert.equal(trie.get('北京'), '北京');
  assert.equal(trie.has('北'), false);
  assert.equal(trie.has('北京'), true);
});

test('findAll reports the longest match starting at each offset', () => {
  const matches = cityTrie().findAll('去深圳市和广州市');

  assert.deepEqual(
    matches.map((match) => [match.offset, match.matched]),
    [
      [1, '深圳市'],
      [5, '广州市']
    ]
  );
});
