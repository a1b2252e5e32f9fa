import { firstSentence, MAX_FIELD_LENGTH } from '../text';

describe('firstSentence', () => {
  it('keeps the text before the first period', () => {
    expect(firstSentence('Take 2 tablets daily. Do not exceed 8.')).toBe('Take 2 tablets daily');
  });

  it('returns text without a period unchanged when short', () => {
    expect(firstSentence('Apply a thin layer')).toBe('Apply a thin layer');
  });

  it('caps text without a period at the maximum length', () => {
    const long = 'a'.repeat(150);
    expect(firstSentence(long)).toBe('a'.repeat(MAX_FIELD_LENGTH));
  });

  it('caps the first sentence when it is longer than the maximum', () => {
    const sentence = 'b'.repeat(120);
    expect(firstSentence(`${sentence}. Second sentence.`)).toBe('b'.repeat(100));
  });

  it('yields an empty string when the text starts with a period', () => {
    expect(firstSentence('.5 mg per kg')).toBe('');
  });

  it('does not split a character outside the basic plane', () => {
    expect(firstSentence(`${'a'.repeat(99)}\u{1F600}tail`)).toBe(`${'a'.repeat(99)}\u{1F600}`);
    expect(firstSentence(`${'a'.repeat(100)}\u{1F600}`)).toBe('a'.repeat(100));
  });

  it('honours a custom limit', () => {
    expect(firstSentence('abcdef', 3)).toBe('abc');
  });
});
