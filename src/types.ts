/**
 * Shared types across the pipeline
 */

/** One element of the upstream `data` array, untrusted. */
export type RawIpoRecord = Record<string, unknown>;

export type IpoEntry = {
  /** Upstream-assigned, never reused */
  id: number;
  /** Original markup, e.g. `<span>ABC</span>` (not persisted) */
  symbol: string;
  symbolClean: string;
  companyName: string;
  units: string;
  openingDate: string;
  closingDate: string;
  issueManager: string;
  price: string;
  status: string;
  url?: string;
};

export type StoredIpoEntry = Omit<IpoEntry, "symbol"> & {
  /** SQLite CURRENT_TIMESTAMP (UTC) at insertion */
  firstSeen: string;
};

/** Everything one upstream request needs, whichever tier sends it. */
export type CalendarRequest = {
  url: string;
  params: Record<string, string | number>;
  headers: Record<string, string>;
};
