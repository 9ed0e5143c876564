import { describe, it, expect } from 'vitest';
import { SectionExtractor, matchHeader } from '../../src/services/chunking/section-extractor.js';
import { WordTokenizer } from '../fixtures/word-tokenizer.js';

describe('matchHeader', () => {
  it('should read markdown header depth and title', () => {
    expect(matchHeader('### Deep title ')).toEqual({ level: 3, title: 'Deep title' });
    expect(matchHeader('# Intro')).toEqual({ level: 1, title: 'Intro' });
  });

  it('should reject more than six hashes', () => {
    expect(matchHeader('####### Too deep')).toBeNull();
  });

  it('should accept short capitalised plain-text headings', () => {
    expect(matchHeader('Getting Started')).toEqual({ level: 1, title: 'Getting Started' });
    expect(matchHeader('Abc')).toEqual({ level: 1, title: 'Abc' });
  });

  it('should reject plain lines with punctuation, lowercase start or bad length', () => {
    expect(matchHeader('Hello, world')).toBeNull();
    expect(matchHeader('getting started')).toBeNull();
    expect(matchHeader('Ab')).toBeNull();
    expect(matchHeader('A' + 'b'.repeat(51))).toBeNull();
  });
});

describe('SectionExtractor', () => {
  const extractor = new SectionExtractor(new WordTokenizer());

  it('should split on headers and count tokens on trimmed content', () => {
    const sections = extractor.extract('# Intro\nhello world\n\n## Setup\nrun it now\n', 'doc');

    expect(sections).toEqual([
      { title: 'Intro', content: 'hello world', level: 1, tokenCount: 2 },
      { title: 'Setup', content: 'run it now', level: 2, tokenCount: 3 },
    ]);
  });

  it('should drop sections with an empty body', () => {
    const sections = extractor.extract('# Empty\n\n# Full\nsome text here', 'doc');

    expect(sections.map((s) => s.title)).toEqual(['Full']);
  });

  it('should discard lines before the first header', () => {
    const sections = extractor.extract('preamble text\n# Title\nbody text', 'doc');

    expect(sections).toEqual([{ title: 'Title', content: 'body text', level: 1, tokenCount: 2 }]);
  });

  it('should handle CRLF line endings', () => {
    const sections = extractor.extract('# A\r\nbody text\r\n', 'doc');

    expect(sections).toEqual([{ title: 'A', content: 'body text', level: 1, tokenCount: 2 }]);
  });

  it('should fall back to one section titled with the document id', () => {
    const sections = extractor.extract('  just some text.\nmore text.  ', 'guide');

    expect(sections).toEqual([
      { title: 'guide', content: 'just some text.\nmore text.', level: 1, tokenCount: 5 },
    ]);
  });

  it('should fall back when every header has an empty body', () => {
    const sections = extractor.extract('# A\n# B\n', 'doc');

    expect(sections).toEqual([{ title: 'doc', content: '# A\n# B', level: 1, tokenCount: 4 }]);
  });

  it('should return nothing for blank input', () => {
    expect(extractor.extract('   \n\n ', 'doc')).toEqual([]);
  });

  it('should be deterministic', () => {
    const text = '# One\nalpha beta.\nTwo Words\ngamma delta.\n';

    expect(extractor.extract(text, 'doc')).toEqual(extractor.extract(text, 'doc'));
    expect(extractor.extract(text, 'doc').map((s) => s.title)).toEqual(['One', 'Two Words']);
  });

  it('should return frozen sections', () => {
    const [section] = extractor.extract('# A\nbody text', 'doc');

    expect(Object.isFrozen(section)).toBe(true);
  });
});
