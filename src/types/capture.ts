/** Columns requested from the CDX index, in request order. */
export const CDX_FIELDS = ['timestamp', 'original', 'statuscode', 'mimetype', 'length'] as const;

export type CdxField = (typeof CDX_FIELDS)[number];

/** A CDX row keyed by column name; nothing is validated yet. */
export type RawCaptureRow = Partial<Record<CdxField, unknown>>;

export interface CaptureRow {
  /** 14-digit `YYYYMMDDhhmmss` */
  timestamp: string;
  originalUrl: string;
  statusCode: string;
  mimeType: string;
  sizeBytes: number;
}

/** Inclusive calendar window, both ends `YYYYMMDD`. */
export interface DateWindow {
  from: string;
  to: string;
}

export interface CaptureQuery {
  /** A single URL or a domain wildcard such as `example.com/*` */
  urlPattern: string;
  window: DateWindow;
  limit: number;
}
