import { describe, it, expect } from 'vitest';
import { escapeHtml, html, SafeHtml } from '../../../../src/shared/views/html';

describe('escapeHtml', () => {
  it('escapes the five HTML-significant characters', () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;',
    );
  });
});

describe('html template', () => {
  it('escapes interpolated strings', () => {
    expect(html`<p>${'<b>hi</b>'}</p>`.value).toBe('<p>&lt;b&gt;hi&lt;/b&gt;</p>');
  });

  it('does not escape nested templates twice', () => {
    const items = ['a', '<'];
    expect(html`<ul>${items.map((i) => html`<li>${i}</li>`)}</ul>`.value).toBe(
      '<ul><li>a</li><li>&lt;</li></ul>',
    );
  });

  it('renders nothing for null, undefined and booleans', () => {
    expect(html`[${null}${undefined}${false}${true}]`.value).toBe('[]');
  });

  it('renders numbers', () => {
    expect(html`<td>${42}</td>`.value).toBe('<td>42</td>');
  });

  it('returns SafeHtml', () => {
    const out = html`<br>`;
    expect(out).toBeInstanceOf(SafeHtml);
    expect(String(out)).toBe('<br>');
  });
});
