export interface ExtractedDocument {
  pages: ExtractedPage[];
}

export interface ExtractedPage {
  pageIndex: number;
  height: number;
  fragments: ExtractedFragment[];
}

export interface ExtractedFragment {
  text: string;
  x: number;
  y: number;
}

export const LINE_Y_BUCKET_SIZE = 2;
export const MAX_REASONABLE_Y_MULTIPLIER = 2.5;
