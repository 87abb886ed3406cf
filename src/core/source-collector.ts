import * as path from 'path';
import { languageForPath } from '../analyzers/language-patterns';
import { ReadinessConfig, SourceFile } from '../types';
import { Logger } from '../utils/cli-utils';
import { fileStem, findFiles } from '../utils/file-utils';

export type CollectorOptions = Pick<
  ReadinessConfig,
  'sourceExtensions' | 'excludeDirectories' | 'excludePatterns'
>;

/**
 * Enumerate candidate source files under `rootPath`.
 *
 * Files are grouped by extension in allow-list order; within one extension they
 * keep directory traversal order. Unreadable directories are skipped and a
 * missing root yields an empty list.
 */
export async function collectSourceFiles(
  rootPath: string,
  options: CollectorOptions,
  logger?: Logger
): Promise<SourceFile[]> {
  const root = path.resolve(rootPath);
  const relativePaths = await findFiles(root, {
    excludeDirectories: options.excludeDirectories,
    excludePatterns: options.excludePatterns,
    logger,
  });

  const byExtension = new Map<string, string[]>();
  for (const extension of options.sourceExtensions) {
    byExtension.set(extension.toLowerCase(), []);
  }

  for (const relativePath of relativePaths) {
    const extension = path.extname(relativePath).toLowerCase();
    byExtension.get(extension)?.push(relativePath);
  }

  const files: SourceFile[] = [];
  for (const [extension, group] of byExtension) {
    for (const relativePath of group) {
      files.push({
        path: path.join(root, relativePath),
        relativePath,
        extension,
        language: languageForPath(extension),
        stem: fileStem(relativePath),
      });
    }
  }

  logger?.debug(`Collected ${files.length} source files under ${root}`);
  return files;
}
