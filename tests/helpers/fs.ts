import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';

/**
 * Write a map of relative path -> content under root
 */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const full = join(root, relativePath);
    await mkdir(dirname(full), { recursive: true });
    await writeFile(full, content);
  }
}

/**
 * Every file under root as relative path -> content, keys in name order
 */
export async function readTree(root: string, prefix = ''): Promise<Record<string, string>> {
  const result: Record<string, string> = {};
  const entries = await readdir(join(root, prefix), { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of entries) {
    const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      Object.assign(result, await readTree(root, rel));
    } else if (entry.isFile()) {
      result[rel] = await readFile(join(root, rel), 'utf-8');
    }
  }
  return result;
}

/**
 * Every entry (files, directories, links) under root, sorted
 */
export async function listTree(root: string, prefix = ''): Promise<string[]> {
  const names: string[] = [];
  const entries = await readdir(join(root, prefix), { withFileTypes: true });
  for (const entry of entries) {
    const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
    names.push(entry.isDirectory() ? `${rel}/` : rel);
    if (entry.isDirectory()) {
      names.push(...(await listTree(root, rel)));
    }
  }
  return names.sort();
}
