import { request, type Dispatcher } from 'undici';
import { QueryFailedError } from '../errors.js';
import { CDX_FIELDS, type CaptureQuery, type CdxField, type RawCaptureRow } from '../types/capture.js';
import { logger } from '../utils/logger.js';

/** Anything that can answer a windowed capture query. */
export interface ArchiveIndex {
  queryCaptures(query: CaptureQuery): Promise<RawCaptureRow[]>;
}

export interface CdxClientOptions {
  baseUrl: string;
  userAgent: string;
  headersTimeoutMs: number;
  bodyTimeoutMs: number;
  /** Routes requests through a custom undici dispatcher (proxy, mock agent) */
  dispatcher?: Dispatcher;
}

export function buildCdxUrl(baseUrl: string, query: CaptureQuery): string {
  const url = new URL(baseUrl);
  url.searchParams.set('url', query.urlPattern);
  url.searchParams.set('from', query.window.from);
  url.searchParams.set('to', query.window.to);
  url.searchParams.set('output', 'json');
  url.searchParams.set('fl', CDX_FIELDS.join(','));
  url.searchParams.append('filter', 'statuscode:200');
  url.searchParams.append('filter', 'mimetype:text/html');
  url.searchParams.set('limit', String(query.limit));
  return url.toString();
}

function isCdxField(name: string): name is CdxField {
  return (CDX_FIELDS as readonly string[]).includes(name);
}

/**
 * Decodes a CDX `output=json` body: a header row of column names followed by
 * positional rows. `[]` is a valid empty answer; anything unparseable is not.
 */
export function parseCdxResponse(urlPattern: string, body: string): RawCaptureRow[] {
  if (body.trim() === '') {
    throw new QueryFailedError(urlPattern, 'empty response body');
  }

  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (err) {
    throw new QueryFailedError(urlPattern, 'response is not valid JSON', err);
  }

  if (!Array.isArray(data)) {
    throw new QueryFailedError(urlPattern, 'response is not a JSON array');
  }
  if (data.length === 0) return [];

  const [header, ...rows] = data;
  if (!Array.isArray(header) || !header.every((col): col is string => typeof col === 'string')) {
    throw new QueryFailedError(urlPattern, 'response has no header row');
  }

  const columns: Array<[CdxField, number]> = [];
  header.forEach((name, position) => {
    if (isCdxField(name)) columns.push([name, position]);
  });

  return rows.map((row: unknown) => {
    const raw: RawCaptureRow = {};
    if (!Array.isArray(row)) return raw;
    for (const [field, position] of columns) {
      if (position < row.length) raw[field] = row[position];
    }
    return raw;
  });
}

export class CdxClient implements ArchiveIndex {
  constructor(private readonly options: CdxClientOptions) {}

  async queryCaptures(query: CaptureQuery): Promise<RawCaptureRow[]> {
    const url = buildCdxUrl(this.options.baseUrl, query);
    const log = logger.child({ pattern: query.urlPattern, from: query.window.from, to: query.window.to });

    let statusCode: number;
    let body: string;
    try {
      const res = await request(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.options.userAgent,
          Accept: 'application/json',
        },
        headersTimeout: this.options.headersTimeoutMs,
        bodyTimeout: this.options.bodyTimeoutMs,
        dispatcher: this.options.dispatcher,
      });
      statusCode = res.statusCode;
      body = await res.body.text();
    } catch (err) {
      throw new QueryFailedError(query.urlPattern, err instanceof Error ? err.message : String(err), err);
    }

    if (statusCode < 200 || statusCode >= 300) {
      throw new QueryFailedError(query.urlPattern, `HTTP ${statusCode}`);
    }

    const rows = parseCdxResponse(query.urlPattern, body);
    log.debug({ rows: rows.length }, 'CDX query completed');
    return rows;
  }
}
