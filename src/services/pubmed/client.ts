/**
 * PubMed E-utilities client
 *
 * Implements the LiteratureSearch contract: esearch (relevance order) for
 * PMIDs, esummary for titles, journal, date and PMC citation counts, and
 * optionally efetch for abstracts used as record snippets.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/pubmed/client
 */

import type { Dispatcher } from 'undici';
import { z } from 'zod';
import { MCPError } from '../../server/errors.js';
import { buildUrl, httpGetText, parseJsonBody, type HttpTextResponse } from '../../utils/http.js';
import type { DateRange, LiteratureRecord, LiteratureSearch } from '../collaborators.js';
import { applyDateFilter, buildDateFilter } from '../query/date-filter.js';
import { loadPubMedConfig, minRequestIntervalMs, type PubMedConfig } from './config.js';
import { RequestRateLimiter } from './rate-limiter.js';

// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const ESearchResponseSchema = z.object({
  esearchresult: z.object({
    count: z.coerce.number().int().nonnegative().default(0),
    idlist: z.array(z.string()).default([]),
  }),
});

const SummarySchema = z.object({
  uid: z.string(),
  title: z.string().default(''),
  fulljournalname: z.string().optional(),
  source: z.string().optional(),
  pubdate: z.string().optional(),
  // NCBI sends "" when the count is unknown
  pmcrefcount: z.union([z.number(), z.string()]).optional(),
  articleids: z.array(z.object({ idtype: z.string(), value: z.string() })).default([]),
});

const ESummaryResponseSchema = z.object({
  result: z
    .object({ uids: z.array(z.string()).default([]) })
    .catchall(z.unknown()),
});

type Summary = z.infer<typeof SummarySchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface PubMedArticle extends LiteratureRecord {
  doi: string | null;
  pmc_id: string | null;
  has_full_text: boolean;
}

export interface PubMedSearchOptions {
  dateRange?: DateRange;
  /** Keep only articles with a PMC copy */
  fullTextOnly?: boolean;
}

export interface PubMedSearchResult {
  query: string;
  total_count: number;
  articles: PubMedArticle[];
}

export interface PubMedClientOptions {
  config?: Partial<PubMedConfig>;
  /** undici dispatcher; tests pass a MockAgent */
  dispatcher?: Dispatcher;
  rateLimiter?: RequestRateLimiter;
}

/** esummary / efetch id batch size */
const ID_BATCH_SIZE = 200;

// ═══════════════════════════════════════════════════════════════════════════════
// CLIENT
// ═══════════════════════════════════════════════════════════════════════════════

export class PubMedClient implements LiteratureSearch {
  private readonly config: PubMedConfig;
  private readonly dispatcher?: Dispatcher;
  private readonly rateLimiter: RequestRateLimiter;

  constructor(options: PubMedClientOptions = {}) {
    this.config = loadPubMedConfig(options.config);
    this.dispatcher = options.dispatcher;
    this.rateLimiter = options.rateLimiter ?? new RequestRateLimiter(minRequestIntervalMs(this.config));
    if (!this.config.email) {
      console.error('[PubMed] PUBMED_EMAIL is not set; NCBI asks clients to identify themselves');
    }
  }

  /** LiteratureSearch contract */
  async search(query: string, maxResults: number, dateRange?: DateRange): Promise<LiteratureRecord[]> {
    const result = await this.searchArticles(query, maxResults, { dateRange });
    return result.articles;
  }

  /**
   * Search with the full PubMed options. The date range is ANDed onto the
   * query; full-text-only searches over-fetch and page until enough
   * PMC-backed articles are found or maxPages is reached.
   */
  async searchArticles(
    query: string,
    maxResults: number,
    options: PubMedSearchOptions = {}
  ): Promise<PubMedSearchResult> {
    const trimmed = query.trim();
    if (trimmed.length === 0 || maxResults <= 0) {
      return { query: trimmed, total_count: 0, articles: [] };
    }

    const filter = buildDateFilter(options.dateRange?.start, options.dateRange?.end);
    const finalQuery = applyDateFilter(trimmed, filter);

    if (!options.fullTextOnly) {
      const { ids, count } = await this.esearch(finalQuery, maxResults, 0);
      const articles = await this.fetchArticles(ids);
      console.error(`[PubMed] "${finalQuery.slice(0, 120)}" -> ${articles.length}/${count}`);
      return { query: finalQuery, total_count: count, articles };
    }

    const pageSize = maxResults * this.config.overfetchFactor;
    const collected: PubMedArticle[] = [];
    let total = 0;
    for (let page = 0; page < this.config.maxPages && collected.length < maxResults; page++) {
      const { ids, count } = await this.esearch(finalQuery, pageSize, page * pageSize);
      total = count;
      if (ids.length === 0) break;
      const articles = await this.fetchArticles(ids);
      for (const article of articles) {
        if (article.has_full_text && collected.length < maxResults) collected.push(article);
      }
      if ((page + 1) * pageSize >= count) break;
    }
    console.error(`[PubMed] "${finalQuery.slice(0, 120)}" (full text) -> ${collected.length}/${total}`);
    return { query: finalQuery, total_count: total, articles: collected };
  }

  getStatus(): { rateLimiter: { minIntervalMs: number; lastRequestAt: number }; hasApiKey: boolean } {
    return { rateLimiter: this.rateLimiter.getStatus(), hasApiKey: Boolean(this.config.apiKey) };
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // E-utilities
  // ─────────────────────────────────────────────────────────────────────────────

  private async esearch(term: string, retmax: number, retstart: number): Promise<{ ids: string[]; count: number }> {
    const text = await this.get('esearch.fcgi', {
      db: 'pubmed',
      term,
      retmax,
      retstart,
      sort: 'relevance',
      retmode: 'json',
    });
    const parsed = ESearchResponseSchema.safeParse(parseJsonBody(text));
    if (!parsed.success) {
      throw new MCPError('PUBMED_API_ERROR', 'esearch response did not have the expected shape', {
        issues: parsed.error.issues.slice(0, 5).map((i) => `${i.path.join('.')}: ${i.message}`),
      });
    }
    return { ids: parsed.data.esearchresult.idlist, count: parsed.data.esearchresult.count };
  }

  private async fetchArticles(ids: readonly string[]): Promise<PubMedArticle[]> {
    if (ids.length === 0) return [];

    const summaries = new Map<string, Summary>();
    const abstracts = new Map<string, string>();
    for (let i = 0; i < ids.length; i += ID_BATCH_SIZE) {
      const batch = ids.slice(i, i + ID_BATCH_SIZE);
      for (const summary of await this.esummary(batch)) {
        summaries.set(summary.uid, summary);
      }
      if (this.config.fetchAbstracts) {
        for (const [pmid, abstract] of await this.efetchAbstracts(batch)) {
          abstracts.set(pmid, abstract);
        }
      }
    }

    // esearch order is relevance order
    const articles: PubMedArticle[] = [];
    for (const id of ids) {
      const summary = summaries.get(id);
      if (summary === undefined) continue;
      articles.push(toArticle(summary, abstracts.get(id)));
    }
    return articles;
  }

  private async esummary(ids: readonly string[]): Promise<Summary[]> {
    const text = await this.get('esummary.fcgi', { db: 'pubmed', id: ids.join(','), retmode: 'json' });
    const parsed = ESummaryResponseSchema.safeParse(parseJsonBody(text));
    if (!parsed.success) {
      throw new MCPError('PUBMED_API_ERROR', 'esummary response did not have the expected shape', {
        issues: parsed.error.issues.slice(0, 5).map((i) => `${i.path.join('.')}: ${i.message}`),
      });
    }

    const out: Summary[] = [];
    for (const uid of parsed.data.result.uids) {
      const entry = SummarySchema.safeParse(parsed.data.result[uid]);
      if (entry.success) {
        out.push(entry.data);
      } else {
        console.error(`[PubMed] Skipping malformed summary for PMID ${uid}`);
      }
    }
    return out;
  }

  private async efetchAbstracts(ids: readonly string[]): Promise<Map<string, string>> {
    const xml = await this.get('efetch.fcgi', { db: 'pubmed', id: ids.join(','), rettype: 'abstract', retmode: 'xml' });
    return extractAbstracts(xml);
  }

  /**
   * Rate-limited GET against an E-utilities endpoint.
   *
   * @throws MCPError PUBMED_API_ERROR on transport failure or a non-2xx status
   */
  private async get(endpoint: string, params: Record<string, string | number | undefined>): Promise<string> {
    const url = buildUrl(`${this.config.baseUrl}/${endpoint}`, {
      ...params,
      tool: this.config.tool,
      email: this.config.email,
      api_key: this.config.apiKey,
    });

    await this.rateLimiter.acquire();

    let response: HttpTextResponse;
    try {
      response = await httpGetText(url, { dispatcher: this.dispatcher, timeoutMs: this.config.requestTimeoutMs });
    } catch (error) {
      throw new MCPError('PUBMED_API_ERROR', `PubMed request failed: ${error instanceof Error ? error.message : String(error)}`, {
        endpoint,
      });
    }

    if (response.statusCode < 200 || response.statusCode >= 300) {
      console.error(`[PubMed] ${endpoint} returned HTTP ${response.statusCode}`);
      throw new MCPError('PUBMED_API_ERROR', `PubMed returned HTTP ${response.statusCode}`, {
        endpoint,
        statusCode: response.statusCode,
        body: response.text.slice(0, 500),
      });
    }
    return response.text;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// PARSING HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

const XML_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

const MAX_CODE_POINT = 0x10ffff;

/** Numeric references outside the Unicode range stay as written */
function decodeCharacterReference(entity: string, code: number): string {
  return Number.isInteger(code) && code >= 0 && code <= MAX_CODE_POINT ? String.fromCodePoint(code) : entity;
}

/** One pass, so "&amp;#945;" stays the literal text "&#945;" */
function decodeXmlText(value: string): string {
  return value
    .replace(/<[^>]+>/g, '')
    .replace(
      /&(?:(amp|lt|gt|quot|apos)|#(\d+)|#[xX]([0-9a-fA-F]+));/g,
      (entity: string, named?: string, decimal?: string, hex?: string) => {
        if (named !== undefined) return XML_ENTITIES[named] ?? entity;
        if (decimal !== undefined) return decodeCharacterReference(entity, Number.parseInt(decimal, 10));
        if (hex !== undefined) return decodeCharacterReference(entity, Number.parseInt(hex, 16));
        return entity;
      }
    )
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * PMID -> abstract text from an efetch PubmedArticleSet. Labelled sections
 * are joined in document order.
 */
export function extractAbstracts(xml: string): Map<string, string> {
  const out = new Map<string, string>();
  const articles = xml.match(/<PubmedArticle>[\s\S]*?<\/PubmedArticle>/g) ?? [];
  for (const article of articles) {
    const pmid = /<PMID[^>]*>(\d+)<\/PMID>/.exec(article)?.[1];
    if (pmid === undefined) continue;
    const sections = [...article.matchAll(/<AbstractText[^>]*>([\s\S]*?)<\/AbstractText>/g)]
      .map((m) => decodeXmlText(m[1]))
      .filter((s) => s.length > 0);
    if (sections.length > 0) {
      out.set(pmid, sections.join(' '));
    }
  }
  return out;
}

function toArticle(summary: Summary, abstract: string | undefined): PubMedArticle {
  const ids = new Map(summary.articleids.map((a) => [a.idtype.toLowerCase(), a.value.trim()]));
  const pmcId = ids.get('pmc') || null;
  const citationCount = typeof summary.pmcrefcount === 'number' ? summary.pmcrefcount : Number(summary.pmcrefcount);
  const title = decodeXmlText(summary.title);

  return {
    record_id: summary.uid,
    title,
    snippet: abstract ?? title,
    citation_count: Number.isFinite(citationCount) ? citationCount : 0,
    journal: summary.fulljournalname ?? summary.source ?? null,
    pub_date: summary.pubdate ?? null,
    doi: ids.get('doi') || null,
    pmc_id: pmcId,
    has_full_text: pmcId !== null,
  };
}
