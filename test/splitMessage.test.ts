import { splitMessage } from '../src/utils/splitMessage';

describe('splitMessage', () => {
  test('returns short messages unchanged', () => {
    expect(splitMessage('hello')).toEqual(['hello']);
    expect(splitMessage('')).toEqual(['']);
  });

  test('splits after the last newline that fits', () => {
    expect(splitMessage('line one\nline two\nline three', 20)).toEqual([
      'line one\nline two\n',
      'line three'
    ]);
  });

  test('hard-splits text without newlines', () => {
    expect(splitMessage('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
  });

  test('never cuts an emoji in half', () => {
    const chunks = splitMessage('🌱🌱🌱', 2);
    expect(chunks).toEqual(['🌱🌱', '🌱']);
  });
});
