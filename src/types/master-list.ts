export interface MasterListEntry {
  /** Canonical URL, unique within a list */
  original: string;
  [key: string]: unknown;
}
