/**
 * Handlebars rendering of the opening prompt.
 *
 * The template sees `{ request, files }`; HTML escaping is off because file
 * contents are source code.
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import Handlebars from 'handlebars';

import { ConfigurationError, describeError } from '@bessie/core';

import type { SourceFile } from './files.js';

export interface PromptContext {
  request: string;
  files: readonly SourceFile[];
}

export type PromptRenderer = (context: PromptContext) => string;

export const DEFAULT_PROMPT_TEMPLATE = [
  '{{request}}',
  '',
  '{{#each files}}',
  '{{path}}:',
  '```',
  '{{content}}',
  '```',
  '',
  '{{/each}}',
].join('\n');

export function compilePromptTemplate(source: string): PromptRenderer {
  const template = Handlebars.compile<PromptContext>(source, { noEscape: true });
  return (context) => template(context);
}

export async function loadPromptTemplate(
  templatePath: string | undefined,
  cwd: string = process.cwd(),
): Promise<PromptRenderer> {
  if (!templatePath) {
    return compilePromptTemplate(DEFAULT_PROMPT_TEMPLATE);
  }

  let source: string;
  try {
    source = await readFile(path.resolve(cwd, templatePath), 'utf8');
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read prompt template "${templatePath}": ${describeError(error)}`,
      { cause: error },
    );
  }

  return compilePromptTemplate(source);
}
