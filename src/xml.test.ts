import { describe, test, expect } from '@jest/globals';
import { escapeXml, unescapeXml } from './xml';

describe('escapeXml', () => {
  test('escapes markup characters', () => {
    expect(escapeXml('<a href="x">&</a>')).toBe('&lt;a href=&quot;x&quot;&gt;&amp;&lt;/a&gt;');
  });

  test('leaves plain text alone', () => {
    expect(escapeXml("it's plain")).toBe("it's plain");
  });
});

describe('unescapeXml', () => {
  test('decodes the predefined entities', () => {
    expect(unescapeXml('R&amp;D &lt;b&gt; &quot;q&quot; it&apos;s')).toBe('R&D <b> "q" it\'s');
  });

  test('decodes decimal and hex character references', () => {
    expect(unescapeXml('&#65;&#x42;&#xe9;&#x1F449;')).toBe('ABé\u{1F449}');
  });

  test('decodes in a single pass', () => {
    expect(unescapeXml('&amp;lt;')).toBe('&lt;');
  });

  test('leaves unknown entities and out of range references as written', () => {
    expect(unescapeXml('&nbsp; &#x110000; & alone')).toBe('&nbsp; &#x110000; & alone');
  });

  test('undoes escapeXml', () => {
    const text = 'a < b && "c" > d';
    expect(unescapeXml(escapeXml(text))).toBe(text);
  });
});
