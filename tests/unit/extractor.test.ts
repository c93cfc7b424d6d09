import { describe, it, expect } from 'vitest';
import { ConditionExtractor, extract, splitRuleBlocks } from '../../src/policy/extractor.js';
import { createExtractorConfig } from '../../src/policy/config.js';
import { readFixture, ruleBlock } from './helpers.js';

describe('splitRuleBlocks()', () => {
  it('treats text before the first marker as block 0', () => {
    const blocks = splitRuleBlocks('package authz\nallowed contains x if {\n}');
    expect(blocks).toEqual([
      { index: 0, text: 'package authz\n', line: 1, column: 1 },
      { index: 1, text: '\n}', line: 2, column: 24 },
    ]);
  });

  it('returns the whole text as one block when there is no marker', () => {
    expect(splitRuleBlocks('no rules here')).toEqual([
      { index: 0, text: 'no rules here', line: 1, column: 1 },
    ]);
  });
});

describe('extract()', () => {

  // ---------------------------------------------------------------------------
  // Rule shape
  // ---------------------------------------------------------------------------
  describe('rule shape', () => {
    it('extracts the three posts rules into groups of 2, 1 and 1 conditions', () => {
      const groups = extract(readFixture('posts-policy.rego'));
      expect(groups.map((g) => g.length)).toEqual([2, 1, 1]);
      expect(groups).toEqual([
        [
          { iteratorVar: 'x', indexPath: 'elastic.posts', field: 'author', operator: '==', valueToken: 'input.user' },
          { iteratorVar: 'x', indexPath: 'elastic.posts', field: 'age', operator: '>=', valueToken: 'input.min_age' },
        ],
        [
          { iteratorVar: 'x', indexPath: 'elastic.posts', field: 'category', operator: '==', valueToken: '"Tech"' },
        ],
        [
          { iteratorVar: 'y', indexPath: 'elastic.posts.comments', field: 'author', operator: '==', valueToken: 'input.user' },
        ],
      ]);
    });

    it('accepts a comparison on the same line as the iteration header', () => {
      const groups = extract(ruleBlock('some p in data.posts p.author == input.user'));
      expect(groups).toEqual([
        [{ iteratorVar: 'p', indexPath: 'posts', field: 'author', operator: '==', valueToken: 'input.user' }],
      ]);
    });

    it('accepts semicolons between statements', () => {
      const groups = extract(ruleBlock('some p in data.posts; p.age < "30"; p.age > "18"'));
      expect(groups[0]?.map((c) => [c.field, c.operator, c.valueToken])).toEqual([
        ['age', '<', '"30"'],
        ['age', '>', '"18"'],
      ]);
    });

    it('recognizes every default operator', () => {
      const ops = ['==', '!=', '<', '<=', '>', '>=', 'contains', 're_match'];
      const policy = ruleBlock('some p in data.posts', ...ops.map((op) => `p.title ${op} "v"`));
      expect(extract(policy)[0]?.map((c) => c.operator)).toEqual(ops);
    });

    it('keeps nested field paths after stripping the iterator', () => {
      const groups = extract(ruleBlock('some p in data.posts', 'p.meta.owner.id == input.user'));
      expect(groups[0]?.[0]?.field).toBe('meta.owner.id');
    });

    it('takes an unqualified field verbatim under the current iterator', () => {
      const groups = extract(ruleBlock('some p in data.posts', 'status == "open"'));
      expect(groups).toEqual([
        [{ iteratorVar: 'p', indexPath: 'posts', field: 'status', operator: '==', valueToken: '"open"' }],
      ]);
    });

    it('keeps the path of a field qualified by an earlier iterator', () => {
      const policy = ruleBlock(
        'some p in data.posts',
        'some c in data.comments.replies',
        'p.author == input.user',
        'c.author == input.user',
      );
      expect(extract(policy)[0]?.map((c) => [c.iteratorVar, c.indexPath])).toEqual([
        ['p', 'posts'],
        ['c', 'comments.replies'],
      ]);
    });

    it('accepts multi-segment input references', () => {
      const groups = extract(ruleBlock('some p in data.posts', 'p.team == input.user.team'));
      expect(groups[0]?.[0]?.valueToken).toBe('input.user.team');
    });

    it('matches text before the first marker like any other block', () => {
      const groups = extract('some p in data.posts\np.owner == input.user\n');
      expect(groups).toHaveLength(1);
    });
  });

  // ---------------------------------------------------------------------------
  // Leniency
  // ---------------------------------------------------------------------------
  describe('leniency', () => {
    it('returns an empty list for empty text', () => {
      expect(extract('')).toEqual([]);
    });

    it('returns an empty list for text with no well-formed rule', () => {
      expect(extract('package authz\n\ndefault allow := false\n')).toEqual([]);
      expect(extract(ruleBlock('true'))).toEqual([]);
      expect(extract('allowed contains x if {')).toEqual([]);
    });

    it('drops a block whose comparisons precede any iteration header', () => {
      expect(extract(ruleBlock('x.owner == "alice"'))).toEqual([]);
    });

    it('ignores iterations over collections outside the data root', () => {
      expect(extract(ruleBlock('some p in other.posts', 'p.a == "b"'))).toEqual([]);
    });

    it('ignores numeric and iterator-valued comparisons', () => {
      const policy = ruleBlock('some p in data.posts', 'p.score > 10', 'p.owner == p.author');
      expect(extract(policy)).toEqual([]);
    });

    it('ignores operators outside the configured set', () => {
      expect(extract(ruleBlock('some p in data.posts', 'p.a =~ "b"'))).toEqual([]);
    });

    it('never throws on arbitrary text', () => {
      const inputs = ['}}}{{{', '"unterminated', 'some', 'some x in', 'some x in data.', '== == ==', '\u0000ÿ'];
      for (const input of inputs) {
        expect(() => extract(input)).not.toThrow();
      }
    });
  });

  // ---------------------------------------------------------------------------
  // Idempotence
  // ---------------------------------------------------------------------------
  it('returns structurally identical results for identical text', () => {
    const policy = readFixture('posts-policy.rego');
    expect(extract(policy)).toEqual(extract(policy));
  });
});

describe('ConditionExtractor', () => {
  it('reports skipped statements with their position', () => {
    const policy = [
      'package authz',
      'allowed contains x if {',
      '    x.owner == "alice"',
      '    some x in data.posts',
      '    x.score > 10',
      '    x.tags contains "news"',
      '}',
    ].join('\n');

    const { groups, diagnostics } = new ConditionExtractor().analyze(policy);

    expect(groups).toEqual([
      [{ iteratorVar: 'x', indexPath: 'posts', field: 'tags', operator: 'contains', valueToken: '"news"' }],
    ]);
    expect(diagnostics).toEqual([
      {
        block: 0,
        line: 1,
        column: 1,
        message: "expected a comparison operator after 'package', found 'authz'",
      },
      {
        block: 1,
        line: 3,
        column: 5,
        message: "comparison 'x.owner' appears before any 'some ... in' header",
      },
      {
        block: 1,
        line: 5,
        column: 5,
        message: "expected a string literal or 'input.' reference after 'x.score >'",
      },
    ]);
  });

  it('reports unknown collections and bare data roots', () => {
    const extractor = new ConditionExtractor();
    expect(extractor.analyze('some p in other.posts').diagnostics[0]?.message)
      .toBe("unknown collection 'other.posts': expected 'data.' or a bound iterator");
    expect(extractor.analyze('some p in data').diagnostics[0]?.message)
      .toBe("collection 'data' does not name an index");
  });

  it('reports unsupported symbolic operators', () => {
    const { diagnostics } = new ConditionExtractor().analyze('some p in data.posts\np.a := "b"');
    expect(diagnostics.map((d) => d.message)).toEqual(["unsupported operator ':=' after 'p.a'"]);
  });

  it('uses the roots and operators of its own configuration', () => {
    const extractor = new ConditionExtractor(
      createExtractorConfig({ dataRoot: 'idx', inputRoot: 'req', operators: ['==', 'startswith'] }),
    );
    const policy = ruleBlock(
      'some d in idx.docs',
      'd.owner == req.user',
      'd.path startswith "/pub"',
      'd.level >= "3"',
      'd.owner == input.user',
    );

    const { groups, diagnostics } = extractor.analyze(policy);

    expect(groups[0]?.map((c) => [c.field, c.operator, c.valueToken])).toEqual([
      ['owner', '==', 'req.user'],
      ['path', 'startswith', '"/pub"'],
    ]);
    expect(diagnostics.map((d) => d.message)).toEqual([
      "unsupported operator '>=' after 'd.level'",
      "expected a string literal or 'req.' reference after 'd.owner =='",
    ]);
  });

  it('leaves independently configured extractors unaffected by each other', () => {
    const strict = new ConditionExtractor(createExtractorConfig({ operators: ['=='] }));
    const policy = ruleBlock('some p in data.posts', 'p.a != "b"');
    expect(strict.extract(policy)).toEqual([]);
    expect(extract(policy)).toHaveLength(1);
  });
});
