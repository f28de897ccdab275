/**
 * View Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { SafeHtml, escape, hiddenInput, html, raw } from '../../framework/view/html.ts';

test('html - escapes interpolated values', () => {
  const name = '<script>"x" & \'y\'</script>';

  assert.equal(
    html`<p>${name}</p>`.toString(),
    '<p>&lt;script&gt;&quot;x&quot; &amp; &#39;y&#39;&lt;/script&gt;</p>'
  );
});

test('html - nested templates and raw content are not escaped twice', () => {
  const inner = html`<b>${'&'}</b>`;

  assert.equal(html`<p>${inner}${raw('<br>')}</p>`.content, '<p><b>&amp;</b><br></p>');
});

test('html - arrays are rendered item by item', () => {
  const items = ['a', '<b>'];

  assert.equal(
    html`<ul>${items.map((item) => html`<li>${item}</li>`)}</ul>`.content,
    '<ul><li>a</li><li>&lt;b&gt;</li></ul>'
  );
});

test('escape - treats null and undefined as empty', () => {
  assert.equal(escape(null), '');
  assert.equal(escape(undefined), '');
  assert.equal(escape(new SafeHtml('<i>')), '<i>');
});

test('hiddenInput - renders a hidden field', () => {
  assert.equal(
    hiddenInput('csrf_token', 'abc"def').content,
    '<input type="hidden" name="csrf_token" value="abc&quot;def">'
  );
});
