import { assembleChunks } from '../ai/chunker';
import { IncompleteTranslationError } from '../ai/errors';
import { joinTranslations } from '../ai/joiner';
import { splitParagraphs } from '../ai/paragraphs';

describe('joinTranslations', () => {
  const chunks = assembleChunks(splitParagraphs('one two\n\nthree four\n\nfive six'), 2);

  it('joins chunk translations in chunk order with a blank line', () => {
    const result = new Map([
      [2, 'lima anim'],
      [0, 'isa dalawa'],
      [1, 'tatlo apat'],
    ]);

    expect(joinTranslations(result, chunks)).toBe('isa dalawa\n\ntatlo apat\n\nlima anim');
  });

  it('trims surrounding whitespace from each translation', () => {
    const result = new Map([
      [0, '\n  isa dalawa  \n'],
      [1, 'tatlo apat\n\n'],
      [2, ' lima anim'],
    ]);

    expect(joinTranslations(result, chunks)).toBe('isa dalawa\n\ntatlo apat\n\nlima anim');
  });

  it('keeps blank lines inside a translated chunk', () => {
    const [only] = assembleChunks(splitParagraphs('a b\n\nc d'), 10);

    expect(joinTranslations(new Map([[0, 'A B\n\nC D']]), [only])).toBe('A B\n\nC D');
  });

  it('returns an empty string for no chunks', () => {
    expect(joinTranslations(new Map(), [])).toBe('');
  });

  it('rejects a result with missing chunks', () => {
    const result = new Map([[1, 'tatlo apat']]);

    expect(() => joinTranslations(result, chunks)).toThrow(IncompleteTranslationError);
    expect(() => joinTranslations(result, chunks)).toThrow('Translation result is missing chunk(s): 0, 2');
  });
});
