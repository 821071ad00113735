import { parseHTML } from 'linkedom';

import type { ExtractedPage } from './types';

type SiteRule = {
  host: RegExp;
  pageUrl: (firstPageUrl: URL, pageNumber: number) => URL;
};

// Sites whose article pages are addressed by a query parameter and expose no usable next link.
const SITE_RULES: SiteRule[] = [
  {
    host: /(^|\.)tribunnews\.com$/,
    pageUrl: (firstPageUrl, pageNumber) => {
      const next = new URL(firstPageUrl.href);
      next.searchParams.set('page', String(pageNumber));
      next.searchParams.set('s', 'paging_new');
      return next;
    },
  },
];

const NEXT_LABELS = new Set(['next', 'next page', 'selanjutnya', 'berikutnya', 'halaman selanjutnya', '›', '»', '>']);

const PAGINATION_CONTAINERS = [
  '[class*="pagination"] a[href]',
  '[class*="paging"] a[href]',
  '[class*="pager"] a[href]',
  '[class*="page-nav"] a[href]',
].join(', ');

export type PaginationContext = {
  firstPageUrl: string;
  page: ExtractedPage;
  /** 1-based number of `page` within the article. */
  pageNumber: number;
};

/**
 * Candidate URLs for the page after `page`, best first, deduplicated and normalised.
 * Extractor hints win over markup, markup over site rules, site rules over
 * generic pager anchors. Hosts without a site rule finally get a `?page=N` guess;
 * sites that ignore it serve the same text again, which ends the walk.
 */
export function nextPageCandidates(context: PaginationContext): string[] {
  const { page, pageNumber } = context;
  const candidates: string[] = [];
  const seen = new Set<string>();

  const push = (href: string | null | undefined) => {
    const normalised = href ? resolveUrl(href, page.url) : undefined;
    if (normalised && !seen.has(normalised)) {
      seen.add(normalised);
      candidates.push(normalised);
    }
  };

  for (const hint of page.nextPageUrls ?? []) {
    push(hint);
  }

  const document = page.html ? parseHTML(page.html).document : undefined;
  if (document) {
    push(document.querySelector('link[rel~="next"]')?.getAttribute('href'));
    push(document.querySelector('a[rel~="next"]')?.getAttribute('href'));
  }

  const siteUrl = siteRulePageUrl(context.firstPageUrl, pageNumber + 1);
  if (siteUrl) {
    push(siteUrl);
  }

  if (document) {
    for (const anchor of document.querySelectorAll(PAGINATION_CONTAINERS)) {
      const href = anchor.getAttribute('href');
      const label = (anchor.textContent ?? '').replace(/\s+/g, ' ').trim().toLowerCase();
      if (NEXT_LABELS.has(label) || pointsToPage(href, page.url, pageNumber + 1)) {
        push(href);
      }
    }
  }

  if (!siteUrl) {
    push(genericPageUrl(context.firstPageUrl, pageNumber + 1));
  }

  return candidates;
}

export function genericPageUrl(firstPageUrl: string, pageNumber: number): string | undefined {
  const parsed = parseUrl(firstPageUrl);
  if (!parsed) {
    return undefined;
  }
  parsed.searchParams.set('page', String(pageNumber));
  return parsed.href;
}

export function siteRulePageUrl(firstPageUrl: string, pageNumber: number): string | undefined {
  const parsed = parseUrl(firstPageUrl);
  if (!parsed) {
    return undefined;
  }
  const rule = SITE_RULES.find((candidate) => candidate.host.test(parsed.hostname));
  return rule ? rule.pageUrl(parsed, pageNumber).href : undefined;
}

function pointsToPage(href: string | null, baseUrl: string, pageNumber: number): boolean {
  const resolved = href ? parseUrl(href, baseUrl) : undefined;
  if (!resolved) {
    return false;
  }
  const wanted = String(pageNumber);
  return resolved.searchParams.get('page') === wanted || resolved.searchParams.get('p') === wanted;
}

/** Absolute http(s) URL without fragment, or undefined when `href` is unusable. */
export function resolveUrl(href: string, baseUrl?: string): string | undefined {
  const parsed = parseUrl(href.trim(), baseUrl);
  if (!parsed || (parsed.protocol !== 'http:' && parsed.protocol !== 'https:')) {
    return undefined;
  }
  parsed.hash = '';
  return parsed.href;
}

function parseUrl(href: string, baseUrl?: string): URL | undefined {
  try {
    return new URL(href, baseUrl);
  } catch {
    return undefined;
  }
}
