import { describe, expect, test } from 'vitest';
import { csvCell, toCsv } from '../lib/utils/csv.js';

describe('csv', () => {
  test('quotes separators and doubles quotes', () => {
    expect(csvCell('a,"b"')).toBe('"a,""b"""');
    expect(csvCell('line\nbreak')).toBe('"line\nbreak"');
    expect(csvCell(null)).toBe('');
  });

  test('neutralises formula-like text but not numbers', () => {
    expect(csvCell('=HYPERLINK("x")')).toBe('"\'=HYPERLINK(""x"")"');
    expect(csvCell('@ana')).toBe("'@ana");
    expect(csvCell(-5)).toBe('-5');
  });

  test('joins rows with CRLF', () => {
    expect(toCsv(['name', 'email'], [['Ana', 'ana@example.com'], ['Luis', null]])).toBe(
      'name,email\r\nAna,ana@example.com\r\nLuis,\r\n',
    );
  });
});
