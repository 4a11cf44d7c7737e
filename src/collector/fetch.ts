import { NetworkError, describeError } from "../shared/errors.js";

export type FetchOptions = {
  userAgent: string;
  timeoutMs: number;
};

export type DocumentFetcher = (url: string) => Promise<string>;

export const fetchDocument = async (url: string, options: FetchOptions): Promise<string> => {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: {
        "User-Agent": options.userAgent,
        Accept: "text/html,application/xhtml+xml"
      },
      signal: AbortSignal.timeout(options.timeoutMs)
    });
  } catch (error) {
    throw new NetworkError(`Fetch failed for ${url}: ${describeError(error)}`, null, { cause: error });
  }

  if (!response.ok) {
    throw new NetworkError(`Fetch failed (${response.status}) for ${url}`, response.status);
  }
  try {
    return await response.text();
  } catch (error) {
    throw new NetworkError(`Reading body failed for ${url}: ${describeError(error)}`, response.status, { cause: error });
  }
};

export const createFetcher =
  (options: FetchOptions): DocumentFetcher =>
  (url) =>
    fetchDocument(url, options);
