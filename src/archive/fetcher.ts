import path from "node:path";
import type { Logger } from "../observability";
import type { FetchOutcome } from "../types";
import { isEmptyDigest } from "./classifier";
import { errorMessage } from "./errors";
import type { DigestSession, SessionResponse } from "./session";
import { digestFilename } from "./urls";

export interface FetchDigestDeps {
  outputDir: string;
  logger: Logger;
}

// Invalid byte sequences become U+FFFD instead of failing the page.
const decoder = new TextDecoder("utf-8", { fatal: false, ignoreBOM: true });

export function decodeBody(bytes: ArrayBuffer): string {
  return decoder.decode(bytes);
}

export async function fetchDigest(url: string, session: DigestSession, deps: FetchDigestDeps): Promise<FetchOutcome> {
  const { logger } = deps;

  let response: SessionResponse;
  try {
    response = await session.get(url);
  } catch (error) {
    const message = errorMessage(error);
    logger.error("digest_request_failed", { url, error: message });
    return { kind: "error", url, cause: { type: "network", message } };
  }

  let body: string;
  try {
    body = decodeBody(await response.arrayBuffer());
  } catch (error) {
    const message = errorMessage(error);
    logger.error("digest_decode_failed", { url, error: message });
    return { kind: "error", url, cause: { type: "decode", message } };
  }

  if (isEmptyDigest(body, logger)) {
    logger.debug("digest_empty", { url });
    return { kind: "empty", url };
  }

  if (response.status !== 200) {
    logger.error("digest_fetch_failed", { url, status: response.status });
    return { kind: "error", url, cause: { type: "http", status: response.status } };
  }

  // Name the file after where the archive actually served the page from.
  const finalUrl = response.url || url;
  let filename: string;
  try {
    filename = digestFilename(finalUrl);
  } catch (error) {
    const message = errorMessage(error);
    logger.error("digest_filename_failed", { url, finalUrl, error: message });
    return { kind: "error", url, cause: { type: "filename", message } };
  }

  logger.debug("digest_found", { url, finalUrl });
  return {
    kind: "success",
    url,
    finalUrl,
    path: path.resolve(deps.outputDir, filename),
    content: body,
  };
}
