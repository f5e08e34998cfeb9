export interface PageInput {
  filename: string;
  content: string;
  pageType: string; // display form, e.g. "Tutorial"
  topic: string;
}

export interface CreatedPage {
  filename: string;
  filePath: string;
  pageType: string;
  topic: string;
}

export interface IndexEntry {
  title: string;
  file: string;
  date: string; // last filename segment, expected YYYYMMDD
  summary: string;
}

export interface NewsArticle {
  title: string;
  description: string | null;
  url: string;
  source: string | null;
  publishedAt: string | null;
}

export interface PublishResult {
  message: string;
  remote: string;
  branch: string;
}

export interface RunSummary {
  page: CreatedPage;
  accentColor: string | null;
  indexEntries: IndexEntry[];
  commit: PublishResult;
}
