/**
 * Research collaborators
 *
 * Search results are converted to plain text and handed to the planner as
 * reference material. Which licenses are acceptable is the caller's policy.
 */

import { loggers, logError } from '../utils/logger';

const log = loggers.planner;

export type SearchScope = 'code_host' | 'package_registry' | 'documentation';

export interface SearchResult {
  title: string;
  url: string;
  summary: string;
  rank: number;
  license?: string;              // SPDX identifier when the source declares one
  html?: string;                 // Full page markup, when fetched
}

export interface SearchProvider {
  search(query: string, scope: SearchScope): Promise<SearchResult[]>;
}

export interface HtmlToText {
  convert(html: string): string;
}

export interface ResearchNote {
  title: string;
  url: string;
  scope: SearchScope;
  text: string;
}

export interface ResearchOptions {
  search: SearchProvider;
  htmlToText: HtmlToText;
  scopes?: SearchScope[];
  /** SPDX ids; results without a license pass only when `allowUnlicensed` is set */
  allowedLicenses?: string[];
  allowUnlicensed?: boolean;
  maxResults?: number;
  maxCharsPerNote?: number;
}

/**
 * Keep results whose license is in the allowed set (case-insensitive)
 */
export function filterByLicense(
  results: readonly SearchResult[],
  allowedLicenses: readonly string[],
  allowUnlicensed: boolean = false
): SearchResult[] {
  const allowed = new Set(allowedLicenses.map((license) => license.toLowerCase()));
  return results.filter((result) =>
    result.license === undefined ? allowUnlicensed : allowed.has(result.license.toLowerCase())
  );
}

/**
 * Search every scope, filter, rank and convert to notes for the planner.
 * A failing scope is logged and skipped.
 */
export async function gatherResearch(query: string, options: ResearchOptions): Promise<ResearchNote[]> {
  const scopes = options.scopes ?? ['documentation', 'package_registry', 'code_host'];
  const maxResults = options.maxResults ?? 5;
  const maxChars = options.maxCharsPerNote ?? 2000;

  const collected: Array<{ scope: SearchScope; result: SearchResult }> = [];
  for (const scope of scopes) {
    try {
      const results = await options.search.search(query, scope);
      const kept = options.allowedLicenses
        ? filterByLicense(results, options.allowedLicenses, options.allowUnlicensed)
        : results;
      for (const result of kept) collected.push({ scope, result });
    } catch (err) {
      logError(log, err, 'Search failed', { scope, query });
    }
  }

  collected.sort((a, b) => a.result.rank - b.result.rank);

  return collected.slice(0, maxResults).map(({ scope, result }) => {
    const body = result.html ? options.htmlToText.convert(result.html) : result.summary;
    return {
      title: result.title,
      url: result.url,
      scope,
      text: body.trim().slice(0, maxChars),
    };
  });
}
