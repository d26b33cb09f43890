import assert from 'node:assert/strict';
import test from 'node:test';

import { displayLabel, pickTranslation, toPlainText } from '../src/lib/display-label.js';

test('toPlainText strips markup and decodes entities', () => {
  assert.equal(toPlainText('<p>Azure <b>Interior</b></p>\n &amp; Co'), 'Azure Interior & Co');
});

test('pickTranslation prefers the requested locales, then the source term', () => {
  const value = { en_US: 'Chair', fr_FR: 'Chaise', de_DE: '' };

  assert.equal(pickTranslation(value, ['fr_FR', 'en_US']), 'Chaise');
  assert.equal(pickTranslation(value, ['de_DE']), 'Chair');
  assert.equal(pickTranslation({ nl_NL: 'Stoel' }, ['fr_FR']), 'Stoel');
  assert.equal(pickTranslation({}, ['fr_FR']), null);
});

test('displayLabel falls back to the record id', () => {
  assert.equal(displayLabel('Deco Addict', 4, ['en_US']), 'Deco Addict');
  assert.equal(displayLabel({ en_US: 'Chair', fr_FR: 'Chaise' }, 4, ['fr_FR']), 'Chaise');
  assert.equal(displayLabel('  ', 4, ['en_US']), '4');
  assert.equal(displayLabel(null, 'abc', ['en_US']), 'abc');
});
