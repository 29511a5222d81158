import type { Logger } from "../observability";
import { errorMessage } from "./errors";

// The archive answers a month without a digest with a short German notice.
export const EMPTY_DIGEST_MARKER = "existiert nicht";
export const EMPTY_DIGEST_MAX_LENGTH = 100;

export function isEmptyDigest(body: unknown, logger?: Logger): boolean {
  try {
    if (typeof body !== "string") {
      throw new TypeError(`expected a string body, received ${body === null ? "null" : typeof body}`);
    }
    return body.includes(EMPTY_DIGEST_MARKER) && body.length < EMPTY_DIGEST_MAX_LENGTH;
  } catch (error) {
    // Unclassifiable bodies count as real content so nothing is dropped silently.
    logger?.error("digest_classification_failed", { error: errorMessage(error) });
    return false;
  }
}
