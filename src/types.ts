export type SearchSource = "google-browser" | "serper" | "google-cse";

export type SearchResult = {
  url: string;
  title: string;
  domain: string;
  snippet?: string;
  source: SearchSource;
};

export type ExtractionSuccess = {
  status: "success";
  url: string;
  title: string;
  metaDescription: string;
  content: string;
  contentLength: number; // before truncation
  extractedAt: string; // ISO
};

export type ExtractionFailure = {
  status: "failed";
  url: string;
  error: string;
  extractedAt: string; // ISO
};

export type ExtractionRecord = ExtractionSuccess | ExtractionFailure;

export type SearchAnnotation = {
  searchTitle: string;
  domain: string;
  searchRank: number;
};

export type RankedSuccess = ExtractionSuccess & SearchAnnotation;
export type RankedFailure = ExtractionFailure & SearchAnnotation;
export type RankedRecord = RankedSuccess | RankedFailure;

export type DomainStat = {
  count: number;
  totalLength: number;
  pageTitles: string[];
};

export type DomainStats = Record<string, DomainStat>;

export type AggregateResult = {
  query: string;
  searchResults: SearchResult[];
  records: RankedRecord[];
  successful: RankedSuccess[];
  failed: RankedFailure[];
  totalContentLength: number;
  avgContentLength: number;
  domainStats: DomainStats;
  startedAt: string;
  finishedAt: string;
};

export type AggregateOutcome =
  | { status: "no-results"; query: string }
  | { status: "completed"; result: AggregateResult };

export interface SearchProvider {
  readonly name: string;
  search(query: string): Promise<SearchResult[]>;
}

export interface ContentExtractor {
  extract(url: string): Promise<ExtractionRecord>;
}
