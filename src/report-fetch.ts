const FETCH_TIMEOUT_MS = 60_000;

interface FetchReportDependencies {
  fetch: (url: string, init: { signal: AbortSignal }) => Promise<Response>;
}

export function buildBookedInUrl(baseUrl: string, day: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${day}.PDF`;
}

export async function fetchBookedInPdf(
  url: string,
  dependencies: FetchReportDependencies = { fetch: (input, init) => fetch(input, init) },
): Promise<Uint8Array> {
  let response: Response;
  try {
    response = await dependencies.fetch(url, { signal: AbortSignal.timeout(FETCH_TIMEOUT_MS) });
  } catch (error: unknown) {
    throw createFetchError(url, error instanceof Error ? error.message : String(error));
  }

  if (!response.ok) {
    throw createFetchError(url, `HTTP ${response.status}`);
  }

  return new Uint8Array(await response.arrayBuffer());
}

function createFetchError(url: string, detail: string): Error {
  return new Error(`Failed to fetch booked-in report from ${url}: ${detail}`);
}
