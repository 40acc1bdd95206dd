export type ExtractedItemKind = 'search_result' | 'product' | 'page_content';

export interface ExtractedItem {
  kind: ExtractedItemKind;
  title: string;
  link?: string;
  snippet?: string;
  price?: string;
  rating?: string;
  content?: string;
}

export type ExtractionMethod = 'search_engine' | 'product_listing' | 'generic_links' | 'page_content' | 'none';

export interface ExtractedResults {
  pageTitle: string;
  pageUrl: string;
  method: ExtractionMethod;
  results: ExtractedItem[];
  resultCount: number;
}
