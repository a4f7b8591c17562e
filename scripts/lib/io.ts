import fg from 'fast-glob';
import fs from 'fs-extra';
import path from 'node:path';

export interface RunOptions {
  check: boolean;
}

export const CHECK_FLAG = '--check';

export function getRunOptions(argv: string[]): RunOptions {
  return {
    check: argv.includes(CHECK_FLAG)
  };
}

export function repoPath(...parts: string[]): string {
  return path.join(process.cwd(), ...parts);
}

export function toPosixRelative(filePath: string): string {
  return path.relative(process.cwd(), filePath).split(path.sep).join('/');
}

export async function ensureParentDir(filePath: string): Promise<void> {
  await fs.ensureDir(path.dirname(filePath));
}

export function stableJson(data: unknown): string {
  return `${JSON.stringify(data, null, 2)}\n`;
}

export function stableText(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`;
}

/** A file's next content, compared with what is on disk but not yet written. */
export interface PendingWrite {
  filePath: string;
  next: string;
  changed: boolean;
}

async function prepareWrite(filePath: string, next: string): Promise<PendingWrite> {
  if (!(await fs.pathExists(filePath))) {
    return { filePath, next, changed: true };
  }
  if ((await fs.stat(filePath)).isDirectory()) {
    throw new Error(`${toPosixRelative(filePath)} is a directory`);
  }
  const current = await fs.readFile(filePath, 'utf8');
  return { filePath, next, changed: current !== next };
}

export async function prepareJsonWrite(filePath: string, data: unknown): Promise<PendingWrite> {
  return prepareWrite(filePath, stableJson(data));
}

export async function prepareTextWrite(filePath: string, content: string): Promise<PendingWrite> {
  return prepareWrite(filePath, stableText(content));
}

/** Write every changed target, unless this is a check run. */
export async function commitWrites(pending: PendingWrite[], options: RunOptions): Promise<void> {
  if (options.check) {
    return;
  }
  for (const write of pending) {
    if (!write.changed) {
      continue;
    }
    await ensureParentDir(write.filePath);
    await fs.writeFile(write.filePath, write.next, 'utf8');
  }
}

/**
 * Absolute paths of the files below `rootDir` matching `pattern`, sorted so
 * callers see the same order on every platform.
 */
export async function listFiles(rootDir: string, pattern: string): Promise<string[]> {
  if (!(await fs.pathExists(rootDir))) {
    return [];
  }

  const files = await fg(pattern, {
    cwd: rootDir,
    dot: false,
    onlyFiles: true
  });

  return files.sort().map((file) => path.join(rootDir, file));
}
