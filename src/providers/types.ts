import type {
  FetchInvalidFormatError, FetchNotFoundError, FetchTransientError, FundamentalsUnavailableError
} from '../shared/errors.js';

export interface OhlcRow {
  date: string;            // YYYY-MM-DD
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface FundamentalsMeta {
  sector: string;
  industry: string;
  country: string;
}

export interface SnapshotField {
  label: string;
  value: string;
}

export interface Fundamentals {
  symbol: string;
  name: string;
  meta: FundamentalsMeta;
  snapshot: SnapshotField[];
  description: string;
}

export type SeriesError = FetchNotFoundError | FetchInvalidFormatError | FetchTransientError;

export type SeriesResult =
  | { ok: true; symbol: string; rows: OhlcRow[] }
  | { ok: false; symbol: string; error: SeriesError };

export type FundamentalsResult =
  | { ok: true; symbol: string; data: Fundamentals }
  | { ok: false; symbol: string; error: FundamentalsUnavailableError };
