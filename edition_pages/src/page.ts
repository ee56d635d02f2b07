import path from 'path';
import { inspect } from 'util';

import { format, isValid, parse } from 'date-fns';

import { defaultConfig } from './config.js';
import { PageNameError } from './errors.js';
import { expandHome } from './paths.js';
import type { PageComparisonKeys, PageNumbers, PageType, ParsedPageName } from './types.js';

/**
 * The house naming convention for page files, e.g. `1_Front_040516.indd`,
 * `10-11-FEATURES-251014.pdf` or `W4_Back_24-03-2014.indd`.
 *
 * The section is the shortest run of non-digits between the page numbers
 * and the date, so separators around it are dropped while separators inside
 * it are kept.
 */
const pageNamePattern = new RegExp(
  [
    '^',
    '(?<prefix>[A-Z]?)',
    '(?<firstPage>\\d+)',
    '(?:-(?<secondPage>\\d+))?',
    '[-_ ]*',
    '(?<section>\\D+?)',
    '[-_ ]*',
    '(?<date>\\d{6}|\\d{8}|\\d{2}-\\d{2}-(?:\\d{2}|\\d{4}))',
    '\\.',
    '(?<type>indd|pdf)',
    '$',
  ].join(''),
  'i',
);

// Two-digit years follow the POSIX strptime rule: 69-99 are 19xx, 00-68 are 20xx.
function expandYear(twoDigits: string): string {
  const year = Number.parseInt(twoDigits, 10);
  return String(year >= 69 ? 1900 + year : 2000 + year);
}

function parsePageDate(value: string): Date | undefined {
  const digits = value.replaceAll('-', '');
  const full = digits.length === 6 ? digits.slice(0, 4) + expandYear(digits.slice(4)) : digits;
  const date = parse(full, 'ddMMyyyy', new Date(2000, 0, 1));
  return isValid(date) ? date : undefined;
}

function isPageType(value: string): value is PageType {
  return value === 'indd' || value === 'pdf';
}

export function parsePageName(name: string): ParsedPageName {
  const groups = pageNamePattern.exec(name)?.groups;
  if (!groups) {
    throw new PageNameError(name);
  }

  const date = parsePageDate(groups.date);
  const type = groups.type.toLowerCase();
  if (!date || !isPageType(type)) {
    throw new PageNameError(name);
  }

  const firstPage = Number.parseInt(groups.firstPage, 10);
  const pages: PageNumbers =
    groups.secondPage === undefined ? [firstPage] : [firstPage, Number.parseInt(groups.secondPage, 10)];

  return {
    prefix: groups.prefix,
    pages,
    section: groups.section,
    date,
    type,
  };
}

function compareValues<T extends string | number>(a: T, b: T): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

function comparePageNumbers(a: PageNumbers, b: PageNumbers): number {
  const shared = Math.min(a.length, b.length);
  for (let index = 0; index < shared; index += 1) {
    const result = compareValues(a[index], b[index]);
    if (result !== 0) {
      return result;
    }
  }
  return compareValues(a.length, b.length);
}

export type ExternalNameOptions = {
  publicationCode?: string;
};

/**
 * A page file on disk, InDesign or PDF.
 *
 * Pages order by edition date, then file type, then prefix, then page
 * numbers, then section (ignoring case), so sorting an edition's files groups
 * each date's InDesign files ahead of its PDFs with inserts after the main
 * run of pages.
 */
export class Page {
  readonly path: string;
  readonly pages: PageNumbers;
  readonly date: Date;
  readonly prefix: string;
  readonly section: string;
  readonly type: PageType;

  constructor(pagePath: string) {
    const parsed = parsePageName(path.basename(pagePath));
    this.path = expandHome(pagePath);
    this.pages = parsed.pages;
    this.date = parsed.date;
    this.prefix = parsed.prefix;
    this.section = parsed.section;
    this.type = parsed.type;
  }

  static tryParse(pagePath: string): Page | undefined {
    try {
      return new Page(pagePath);
    } catch (error) {
      if (error instanceof PageNameError) {
        return undefined;
      }
      throw error;
    }
  }

  static compare(a: Page, b: Page): number {
    return a.compare(b);
  }

  get name(): string {
    return path.basename(this.path);
  }

  comparisonKeys(): PageComparisonKeys {
    return [this.date, this.type, this.prefix, this.pages, this.section.toLowerCase()];
  }

  compare(other: Page): number {
    const [date, type, prefix, pages, section] = this.comparisonKeys();
    const [otherDate, otherType, otherPrefix, otherPages, otherSection] = other.comparisonKeys();
    return (
      compareValues(date.getTime(), otherDate.getTime()) ||
      compareValues(type, otherType) ||
      compareValues(prefix, otherPrefix) ||
      comparePageNumbers(pages, otherPages) ||
      compareValues(section, otherSection)
    );
  }

  equals(other: Page): boolean {
    return this.compare(other) === 0;
  }

  isBefore(other: Page): boolean {
    return this.compare(other) < 0;
  }

  isAfter(other: Page): boolean {
    return this.compare(other) > 0;
  }

  hashKey(): string {
    const [date, type, prefix, pages, section] = this.comparisonKeys();
    return JSON.stringify([this.path, format(date, 'yyyy-MM-dd'), type, prefix, pages, section]);
  }

  /**
   * The name partners and printers know the page by:
   * `MS_2016_05_04_001.pdf`, `MS_2016_05_04_002-003.indd`, or with a prefix
   * `MS_W_2014_03_24_004.indd`.
   */
  externalName(options: ExternalNameOptions = {}): string {
    const code = options.publicationCode ?? defaultConfig().publicationCode;
    const numbers = this.pages.map((page) => String(page).padStart(3, '0')).join('-');
    const parts = [code, this.prefix, format(this.date, 'yyyy_MM_dd'), numbers].filter((part) => part.length > 0);
    return `${parts.join('_')}.${this.type}`;
  }

  toString(): string {
    return this.name;
  }

  [inspect.custom](): string {
    return `Page('${this.path}')`;
  }
}
