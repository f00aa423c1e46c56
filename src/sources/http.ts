import { SourceUnavailableError, describeError } from "../core/errors.js";

export interface JsonRequestOptions {
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * GET a JSON document for a data source. Resolves null on 404 and 204,
 * rejects with SourceUnavailableError on transport failures and other
 * non-2xx responses.
 */
export async function getJson(
  sourceId: string,
  url: string,
  options: JsonRequestOptions = {}
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: "GET",
      headers: options.headers,
      signal: options.signal,
    });
  } catch (error) {
    throw new SourceUnavailableError(sourceId, describeError(error), { cause: error });
  }

  if (response.status === 404 || response.status === 204) {
    return null;
  }

  if (!response.ok) {
    throw new SourceUnavailableError(
      sourceId,
      `GET ${url} responded ${response.status} ${response.statusText}`.trim()
    );
  }

  try {
    return await response.json();
  } catch (error) {
    throw new SourceUnavailableError(sourceId, `invalid JSON from ${url}`, { cause: error });
  }
}
