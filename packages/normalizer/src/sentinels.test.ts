import { describe, expect, it } from 'vitest';
import { isMissingText, trimBlank } from './sentinels.ts';

describe('trimBlank', () => {
  it('strips space, tab, newline and carriage return only', () => {
    expect(trimBlank(' \t\r\nUSA \n')).toBe('USA');
    expect(trimBlank('\u00A0USA\t')).toBe('\u00A0USA');
    expect(trimBlank('\u00A0')).toBe('\u00A0');
  });
});

describe('isMissingText', () => {
  it('treats null, blank and the sentinel as missing', () => {
    expect(isMissingText(null)).toBe(true);
    expect(isMissingText(undefined)).toBe(true);
    expect(isMissingText(' \r\n\t')).toBe(true);
    expect(isMissingText(' Unknown\t')).toBe(true);
  });

  it('keeps values made of other whitespace', () => {
    expect(isMissingText('\u00A0')).toBe(false);
    expect(isMissingText(' \u00A0 ')).toBe(false);
  });
});
