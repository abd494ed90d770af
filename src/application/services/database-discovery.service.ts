import { glob } from 'glob';
import { promises as fs, type Stats } from 'node:fs';
import path from 'node:path';
import type { DiscoveryOptions } from '../../core/interfaces/schema-inspector.interface.js';
import { logger } from '../../utils/logger.js';

const log = logger.child({ component: 'DatabaseDiscovery' });

async function statOrNull(target: string): Promise<Stats | null> {
  try {
    return await fs.stat(target);
  } catch {
    return null;
  }
}

function hasExtension(filePath: string, extension: string): boolean {
  return path.extname(filePath).toLowerCase() === extension.toLowerCase();
}

/**
 * Expands files, directories and glob patterns into database files with the
 * given extension: absolute paths, one per real file, sorted.
 */
export async function discoverDatabases(targets: readonly string[], options: DiscoveryOptions): Promise<string[]> {
  const cwd = options.cwd ?? process.cwd();
  const discovered: string[] = [];

  for (const target of targets) {
    const targetPath = path.resolve(cwd, target);
    const stats = await statOrNull(targetPath);

    if (stats?.isFile()) {
      discovered.push(targetPath);
    } else if (stats?.isDirectory()) {
      const pattern = options.recursive ? `**/*${options.extension}` : `*${options.extension}`;
      const matches = await glob(pattern, { cwd: targetPath, nodir: true, absolute: true, nocase: true });
      discovered.push(...matches);
    } else {
      discovered.push(...(await glob(target, { cwd, nodir: true, absolute: true })));
    }
  }

  const seen = new Set<string>();
  const unique: string[] = [];
  for (const candidate of discovered.sort()) {
    if (!hasExtension(candidate, options.extension)) {
      continue;
    }
    const realPath = await fs.realpath(candidate);
    if (seen.has(realPath)) {
      continue;
    }
    seen.add(realPath);
    unique.push(path.resolve(candidate));
  }

  log.debug({ targets: targets.length, found: unique.length }, 'Database discovery finished');
  return unique.sort();
}
