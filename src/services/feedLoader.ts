import axios from "axios";
import { readFile } from "fs/promises";
import { parse, YAMLParseError } from "yaml";
import { ZodIssue } from "zod";
import { config } from "../config";
import { FeedDocument, ZFeedDocument } from "../validations/feed";
import {
  FetchError,
  InvalidSourceError,
  MissingFieldError,
  ParseError,
  errorMessage,
} from "../utils/errors";
import { createLogger } from "../utils/logger";

const logger = createLogger("feed-loader");

const SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;

export interface LoadFeedOptions {
  timeoutMs?: number;
}

export function isUrlSource(source: string) {
  return SCHEME.test(source);
}

/** Throws `InvalidSourceError` unless `url` is an absolute http(s) URL. */
export function assertFeedUrl(url: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new InvalidSourceError(`Invalid URL: ${url}`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new InvalidSourceError(`Unsupported URL scheme: ${parsed.protocol}`);
  }
  if (!parsed.hostname) {
    throw new InvalidSourceError(`Invalid URL: ${url}`);
  }
  return parsed;
}

/**
 * Loads a catalog feed from a local path or an http(s) URL. No retry happens
 * here; background jobs retry the whole import.
 */
export async function loadFeed(
  source: string,
  { timeoutMs = config.FEED_FETCH_TIMEOUT_MS }: LoadFeedOptions = {}
): Promise<FeedDocument> {
  const body = isUrlSource(source)
    ? await fetchFeed(assertFeedUrl(source), timeoutMs)
    : await readFeedFile(source);

  return parseFeed(body);
}

async function fetchFeed(url: URL, timeoutMs: number): Promise<string> {
  logger.info({ url: url.href }, "Fetching catalog feed");
  try {
    const { data } = await axios.get<string>(url.href, {
      timeout: timeoutMs,
      responseType: "text",
      transformResponse: (raw: string) => raw,
      headers: {
        "User-Agent": "MarketplaceImporter/1.0",
      },
    });
    return data;
  } catch (error) {
    if (axios.isAxiosError(error)) {
      if (error.response) {
        throw new FetchError(
          `Feed request failed with status ${error.response.status}`
        );
      }
      if (error.code === "ECONNREFUSED" || error.code === "ETIMEDOUT") {
        throw new FetchError(`Feed source ${url.host} is unreachable`);
      }
    }
    throw new FetchError(`Could not fetch feed: ${errorMessage(error)}`);
  }
}

async function readFeedFile(path: string): Promise<string> {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new FetchError(`Feed file not found: ${path}`);
    }
    throw new FetchError(`Could not read feed file: ${errorMessage(error)}`);
  }
}

export function parseFeed(body: string): FeedDocument {
  let document: unknown;
  try {
    document = parse(body);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new ParseError(`Malformed YAML: ${error.message}`);
    }
    throw new ParseError(`Could not parse feed: ${errorMessage(error)}`);
  }

  if (document === null || typeof document !== "object" || Array.isArray(document)) {
    throw new ParseError("Feed must be a mapping with categories and goods");
  }

  const result = ZFeedDocument.safeParse(document);
  if (!result.success) {
    throw feedShapeError(result.error.issues);
  }
  return result.data;
}

function feedShapeError(issues: ZodIssue[]) {
  const missing = issues.find(
    (issue) => issue.code === "invalid_type" && issue.received === "undefined"
  );
  if (missing) {
    return new MissingFieldError(missing.path.join("."));
  }
  const [first] = issues;
  const where = first.path.length ? `${first.path.join(".")}: ` : "";
  return new ParseError(`Invalid feed - ${where}${first.message}`);
}
