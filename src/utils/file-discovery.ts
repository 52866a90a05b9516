import fs from 'fs/promises';
import path from 'path';
import { createComponentLogger } from './logger';

const logger = createComponentLogger('file-discovery');

const SKIPPED_DIRECTORIES = new Set(['node_modules', 'dist', 'build', 'coverage']);

export interface DiscoveryOptions {
  extensions?: string[];
  includeTestFiles?: boolean;
  includeDeclarationFiles?: boolean;
  maxFiles?: number;
}

/**
 * Collects source files below the given paths. Paths naming a file are taken as
 * they are. The result is sorted so that repeated runs see files in the same order.
 */
export async function discoverSourceFiles(
  inputPaths: string[],
  options: DiscoveryOptions = {}
): Promise<string[]> {
  const extensions = options.extensions ?? ['.ts'];
  const files = new Set<string>();

  const traverse = async (currentPath: string, explicit: boolean): Promise<void> => {
    const stats = await fs.stat(currentPath);

    if (stats.isDirectory()) {
      const dirName = path.basename(currentPath);
      if (!explicit && (SKIPPED_DIRECTORIES.has(dirName) || dirName.startsWith('.'))) {
        return;
      }
      const entries = await fs.readdir(currentPath);
      await Promise.all(entries.map(entry => traverse(path.join(currentPath, entry), false)));
    } else if (stats.isFile() && (explicit || shouldIncludeFile(currentPath, extensions, options))) {
      files.add(path.resolve(currentPath));
    }
  };

  for (const inputPath of inputPaths) {
    await traverse(inputPath, true);
  }

  const sorted = [...files].sort();
  logger.debug('File discovery completed', { totalFiles: sorted.length });

  if (options.maxFiles && sorted.length > options.maxFiles) {
    logger.warn(`Limiting analysis to ${options.maxFiles} files`);
    return sorted.slice(0, options.maxFiles);
  }
  return sorted;
}

function shouldIncludeFile(filePath: string, extensions: string[], options: DiscoveryOptions): boolean {
  const fileName = path.basename(filePath);
  if (!options.includeDeclarationFiles && fileName.endsWith('.d.ts')) return false;
  if (!options.includeTestFiles && /\.(test|spec)\.[cm]?tsx?$/.test(fileName)) return false;
  return extensions.includes(path.extname(fileName));
}
