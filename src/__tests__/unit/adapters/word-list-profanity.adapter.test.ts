import { createWordListProfanityAdapter } from '../../../adapters/moderation/word-list-profanity.adapter';

describe('WordListProfanityAdapter', () => {
  const classifier = createWordListProfanityAdapter(['darn', 'darnit', ' Heck ', '']);

  it('matches whole words regardless of case', () => {
    expect(classifier.containsProfanity('DARN this')).toBe(true);
    expect(classifier.containsProfanity('what the heck')).toBe(true);
    expect(classifier.containsProfanity('darned socks')).toBe(false);
  });

  it('gives the same answer on repeated calls', () => {
    expect(classifier.containsProfanity('darn')).toBe(true);
    expect(classifier.containsProfanity('darn')).toBe(true);
  });

  it('censors each match to its own length', () => {
    expect(classifier.censor('Darnit, darn HECK!')).toBe('******, **** ****!');
  });

  it('treats an empty list as clean', () => {
    const empty = createWordListProfanityAdapter([]);
    expect(empty.containsProfanity('anything')).toBe(false);
    expect(empty.censor('anything')).toBe('anything');
  });

  it('loads the bundled word list by default', () => {
    expect(createWordListProfanityAdapter().containsProfanity('a perfectly polite question')).toBe(false);
  });
});
