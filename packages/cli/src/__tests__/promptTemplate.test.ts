/* eslint-env jest */
import { afterEach, describe, expect, test } from '@jest/globals';

import { ConfigurationError } from '@bessie/core';

import {
  DEFAULT_PROMPT_TEMPLATE,
  compilePromptTemplate,
  loadPromptTemplate,
} from '../promptTemplate.js';
import { createWorkspace, removeWorkspace } from './helpers.js';

const files = [
  { path: 'src/a.ts', content: 'const a = 1;' },
  { path: 'src/b.ts', content: 'if (a < 2 && a > 0) {}' },
];

describe('compilePromptTemplate', () => {
  test('renders the request followed by each file in a fenced block', () => {
    const render = compilePromptTemplate(DEFAULT_PROMPT_TEMPLATE);

    expect(render({ request: 'Explain this', files })).toBe(
      [
        'Explain this',
        '',
        'src/a.ts:',
        '```',
        'const a = 1;',
        '```',
        '',
        'src/b.ts:',
        '```',
        'if (a < 2 && a > 0) {}',
        '```',
        '',
        '',
      ].join('\n'),
    );
  });

  test('renders only the request when no files matched', () => {
    expect(compilePromptTemplate(DEFAULT_PROMPT_TEMPLATE)({ request: 'Hi', files: [] })).toBe(
      'Hi\n\n',
    );
  });
});

describe('loadPromptTemplate', () => {
  let root = '';

  afterEach(async () => {
    if (root) {
      await removeWorkspace(root);
      root = '';
    }
  });

  test('loads a custom template relative to the working directory', async () => {
    root = await createWorkspace({ 'short.hbs': '{{request}} ({{files.length}} files)' });

    const render = await loadPromptTemplate('short.hbs', root);

    expect(render({ request: 'Review', files })).toBe('Review (2 files)');
  });

  test('reports an unreadable template as a configuration problem', async () => {
    root = await createWorkspace({});

    await expect(loadPromptTemplate('missing.hbs', root)).rejects.toBeInstanceOf(
      ConfigurationError,
    );
    await expect(loadPromptTemplate('missing.hbs', root)).rejects.toThrow(
      /^Cannot read prompt template "missing\.hbs": ENOENT/,
    );
  });
});
