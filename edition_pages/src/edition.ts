import fs from 'fs/promises';
import path from 'path';

import { format } from 'date-fns';
import fg from 'fast-glob';
import type { Logger } from 'pino';

import { defaultConfig, type EditionLayout } from './config.js';
import { NoEditionError } from './errors.js';
import { moduleLogger } from './logger.js';
import { Page } from './page.js';

export type EditionOptions = Partial<EditionLayout> & {
  logger?: Logger;
};

function resolveLayout(options: EditionOptions): EditionLayout {
  const config = defaultConfig();
  return {
    pagesRoot: options.pagesRoot ?? config.pagesRoot,
    pagesDirFormat: options.pagesDirFormat ?? config.pagesDirFormat,
    pressPdfsDirFormat: options.pressPdfsDirFormat ?? config.pressPdfsDirFormat,
    webPdfsDirFormat: options.webPdfsDirFormat ?? config.webPdfsDirFormat,
  };
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * The edition directory for `date`, e.g. `~/Server/Pages/2017-08-02 Wednesday Aug 2`.
 *
 * @throws NoEditionError when there is no such directory
 */
export async function editionDir(date: Date, options: EditionOptions = {}): Promise<string> {
  const layout = resolveLayout(options);
  const dir = path.join(layout.pagesRoot, format(date, layout.pagesDirFormat));
  if (!(await exists(dir))) {
    throw new NoEditionError(`Cannot find edition for ${format(date, 'yyyy-MM-dd')}`);
  }
  return fs.realpath(dir);
}

/** Pre-press PDFs directory inside the edition. It may not exist yet. */
export async function editionPressPdfsDir(date: Date, options: EditionOptions = {}): Promise<string> {
  const layout = resolveLayout(options);
  return path.join(await editionDir(date, layout), format(date, layout.pressPdfsDirFormat));
}

/** Low-quality e-edition PDFs directory inside the edition. It may not exist yet. */
export async function editionWebPdfsDir(date: Date, options: EditionOptions = {}): Promise<string> {
  const layout = resolveLayout(options);
  return path.join(await editionDir(date, layout), format(date, layout.webPdfsDirFormat));
}

/** Pages for the given paths, skipping files that don't follow the naming convention. */
export function pathsToPages(paths: Iterable<string>, log: Logger = moduleLogger('edition')): Page[] {
  const pages: Page[] = [];
  for (const filePath of paths) {
    const page = Page.tryParse(filePath);
    if (page) {
      pages.push(page);
    } else {
      log.debug({ path: filePath }, 'Skipping file that is not a page');
    }
  }
  return pages;
}

/**
 * Every InDesign page in `dir` and its subdirectories, sorted.
 *
 * Unlike the PDF listings this is recursive, since supplements and inserts
 * are usually kept in subdirectories of the edition.
 */
export async function directoryInddFiles(dir: string, options: Pick<EditionOptions, 'logger'> = {}): Promise<Page[]> {
  const files = await fg('**/*.indd', {
    cwd: dir,
    absolute: true,
    onlyFiles: true,
    caseSensitiveMatch: true,
    dot: false,
  });
  return pathsToPages(files, moduleLogger('edition', options.logger)).sort(Page.compare);
}

/** PDF pages directly inside `dir`, sorted; empty if the directory doesn't exist (yet). */
export async function directoryPdfFiles(dir: string, options: Pick<EditionOptions, 'logger'> = {}): Promise<Page[]> {
  if (!(await exists(dir))) {
    return [];
  }
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const pdfs = entries
    .filter((entry) => entry.isFile() && path.extname(entry.name) === '.pdf')
    .map((entry) => path.join(dir, entry.name));
  return pathsToPages(pdfs, moduleLogger('edition', options.logger)).sort(Page.compare);
}

export async function editionInddFiles(date: Date, options: EditionOptions = {}): Promise<Page[]> {
  return directoryInddFiles(await editionDir(date, options), options);
}

export async function editionPressPdfs(date: Date, options: EditionOptions = {}): Promise<Page[]> {
  return directoryPdfFiles(await editionPressPdfsDir(date, options), options);
}

export async function editionWebPdfs(date: Date, options: EditionOptions = {}): Promise<Page[]> {
  return directoryPdfFiles(await editionWebPdfsDir(date, options), options);
}
