import { normalizeSpacing } from "./line-normalize.ts";
import type { ExtractedDocument, ExtractedFragment, ExtractedPage } from "./pdf-types.ts";
import { LINE_Y_BUCKET_SIZE, MAX_REASONABLE_Y_MULTIPLIER } from "./pdf-types.ts";

/** Text lines per page, top to bottom, each line's fragments left to right. */
export function collectPageLines(document: ExtractedDocument): string[][] {
  return [...document.pages]
    .sort((left, right) => left.pageIndex - right.pageIndex)
    .map((page) => collectLinesOfPage(page));
}

function collectLinesOfPage(page: ExtractedPage): string[] {
  const buckets = bucketFragments(page);

  return [...buckets.entries()]
    .sort(([leftBucket], [rightBucket]) => rightBucket - leftBucket)
    .map(([, fragments]) =>
      normalizeSpacing(
        [...fragments]
          .sort((left, right) => left.x - right.x)
          .map((fragment) => fragment.text)
          .join(" "),
      ),
    )
    .filter((text) => text.length > 0);
}

function bucketFragments(page: ExtractedPage): Map<number, ExtractedFragment[]> {
  const buckets = new Map<number, ExtractedFragment[]>();

  for (const fragment of page.fragments) {
    if (fragment.y > page.height * MAX_REASONABLE_Y_MULTIPLIER) continue;

    const bucket = Math.round(fragment.y / LINE_Y_BUCKET_SIZE) * LINE_Y_BUCKET_SIZE;
    const existing = buckets.get(bucket);
    if (existing) {
      existing.push(fragment);
    } else {
      buckets.set(bucket, [fragment]);
    }
  }

  return buckets;
}
