import { buildServer } from '../../src/api/server.js';
import type { ServerOptions } from '../../src/api/server.js';

export const POSTS_POLICY = [
  'allowed contains x if {',
  '    some x in data.elastic.posts',
  '    x.author == input.user',
  '    x.age >= input.min_age',
  '}',
  '',
  'allowed contains x if {',
  '    some x in data.elastic.posts',
  '    x.category == "Tech"',
  '}',
  '',
  'allowed contains x if {',
  '    some x in data.elastic.posts.comments',
  '    some y in x.comments',
  '    y.author == input.user',
  '}',
  '',
].join('\n');

export const POSTS_RECORDS = [
  [
    { index: 'elastic.posts', field: 'author', operator: '==', value: 'input.user' },
    { index: 'elastic.posts', field: 'age', operator: '>=', value: 'input.min_age' },
  ],
  [{ index: 'elastic.posts', field: 'category', operator: '==', value: '"Tech"' }],
  [{ index: 'elastic.posts.comments', field: 'author', operator: '==', value: 'input.user' }],
];

export const POSTS_QUERY = {
  bool: {
    should: [
      {
        bool: {
          must: [
            { nested: { path: 'elastic.posts', query: { term: { author: 'bob' } } } },
            { nested: { path: 'elastic.posts', query: { range: { age: { gte: '25' } } } } },
          ],
        },
      },
      { bool: { must: [{ nested: { path: 'elastic.posts', query: { term: { category: 'Tech' } } } }] } },
      { bool: { must: [{ nested: { path: 'elastic.posts.comments', query: { term: { author: 'bob' } } } }] } },
    ],
  },
};

export function createTestServer(options: ServerOptions = {}) {
  return buildServer({ logLevel: 'silent', ...options });
}
