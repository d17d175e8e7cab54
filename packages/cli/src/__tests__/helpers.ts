import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

/** Creates a scratch directory populated with `files` (relative path to content). */
export async function createWorkspace(files: Record<string, string>): Promise<string> {
  const root = await mkdtemp(path.join(os.tmpdir(), 'bessie-cli-'));
  for (const [relativePath, content] of Object.entries(files)) {
    const target = path.join(root, relativePath);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content, 'utf8');
  }
  return root;
}

export async function removeWorkspace(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true });
}

const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

/** Drops the colour codes chalk adds so assertions can compare plain text. */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}
