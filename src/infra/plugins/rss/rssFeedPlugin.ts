import * as cheerio from "cheerio";
import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { RawRecord } from "../../../core/entities/record";
import type {
  FetchRequest,
  SourcePluginPort,
} from "../../../core/ports/inboundPorts";
import type { ClockPort } from "../../../core/ports/outboundPorts";
import { validateFetchRequest } from "../../../core/rules/fetchRequest";
import { logger } from "../../../shared/logger/logger";
import { HttpClient } from "../../http/httpClient";
import { SystemClock } from "../../system/systemPorts";
import { malformed, toPluginError } from "../pluginErrors";

export type RssFeedPluginOptions = {
  urls: string[];
  timeoutMs: number;
  userAgent?: string;
};

type FeedItem = {
  title: string;
  link: string;
  summary: string;
  publishedAt?: Date;
  guid?: string;
  author?: string;
};

const collapseWhitespace = (value: string): string =>
  value.replace(/\s+/g, " ").trim();

/**
 * Feed summaries routinely embed HTML, either escaped or inside CDATA.
 */
export const stripHtml = (value: string): string =>
  collapseWhitespace(cheerio.load(value).root().text());

const parseDate = (value: string | undefined): Date | undefined => {
  if (!value?.trim()) {
    return undefined;
  }
  const parsed = new Date(value.trim());
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
};

/**
 * Parses RSS 2.0 and Atom documents. Returns null when the payload is neither.
 */
export const parseFeed = (
  xml: string,
): { title: string; items: FeedItem[] } | null => {
  const $ = cheerio.load(xml, { xml: true });
  const isRss = $("rss, channel").length > 0;
  const isAtom = $("feed").length > 0;

  if (!isRss && !isAtom) {
    return null;
  }

  const feedTitle = collapseWhitespace(
    (isRss ? $("channel > title") : $("feed > title")).first().text(),
  );

  const items = (isRss ? $("item") : $("entry"))
    .toArray()
    .map((element): FeedItem => {
      const node = $(element);
      const field = (...names: string[]): string => {
        for (const name of names) {
          const text = node.children(name).first().text();
          if (text.trim()) {
            return text;
          }
        }
        return "";
      };

      const atomLink =
        node.children("link[rel='alternate']").first().attr("href") ??
        node.children("link").first().attr("href");

      const guid = collapseWhitespace(field("guid", "id"));
      const author = collapseWhitespace(field("author", "dc\\:creator"));

      return {
        title: collapseWhitespace(field("title")),
        link: collapseWhitespace(isRss ? field("link") : (atomLink ?? "")),
        summary: stripHtml(field("description", "summary", "content")),
        publishedAt: parseDate(
          field("pubDate", "published", "updated", "dc\\:date"),
        ),
        ...(guid ? { guid } : {}),
        ...(author ? { author } : {}),
      };
    });

  return { title: feedTitle, items };
};

/**
 * News-feed source: aggregates every configured RSS/Atom feed in parallel. Relevance
 * to the company is left to semantic filtering, so items are not matched by name here.
 */
export class RssFeedPlugin implements SourcePluginPort {
  constructor(
    readonly name: string,
    private readonly options: RssFeedPluginOptions,
    private readonly httpClient = new HttpClient(),
    private readonly clock: ClockPort = new SystemClock(),
  ) {
    if (options.urls.length === 0) {
      throw new Error(`RSS plugin '${name}' requires at least one feed URL.`);
    }
    options.urls.forEach((url) => {
      if (!/^https?:\/\//i.test(url)) {
        throw new Error(`RSS plugin '${name}' received an invalid feed URL: ${url}`);
      }
    });
  }

  async fetch(
    request: FetchRequest,
  ): Promise<Result<RawRecord[], AppBoundaryError>> {
    const valid = validateFetchRequest(request, this.name, this.clock.now());
    if (valid.isErr()) {
      return err(valid.error);
    }

    const results = await Promise.all(
      this.options.urls.map((url) => this.fetchFeed(url, request.since, request.signal)),
    );

    const records: RawRecord[] = [];
    const failures: AppBoundaryError[] = [];

    results.forEach((result, index) => {
      const url = this.options.urls[index];
      if (result.isOk()) {
        records.push(...result.value);
        logger.debug(
          { plugin: this.name, url, itemCount: result.value.length },
          "RSS feed fetched",
        );
        return;
      }

      failures.push(result.error);
      logger.warn(
        { plugin: this.name, url, code: result.error.code, reason: result.error.message },
        "RSS feed failed; continuing with remaining feeds",
      );
    });

    const firstFailure = failures[0];
    if (records.length === 0 && firstFailure && failures.length === results.length) {
      return err(firstFailure);
    }

    logger.info(
      { plugin: this.name, recordCount: records.length, failedFeeds: failures.length },
      "RSS extraction completed",
    );
    return ok(records);
  }

  private async fetchFeed(
    url: string,
    since: Date | undefined,
    signal: AbortSignal | undefined,
  ): Promise<Result<RawRecord[], AppBoundaryError>> {
    const response = await this.httpClient.requestText({
      url,
      method: "GET",
      headers: {
        accept: "application/rss+xml, application/atom+xml, application/xml, text/xml",
        ...(this.options.userAgent ? { "user-agent": this.options.userAgent } : {}),
      },
      timeoutMs: this.options.timeoutMs,
      retries: 1,
      retryDelayMs: 250,
      signal,
    });

    if (response.isErr()) {
      return err(toPluginError(this.name, response.error, `RSS feed ${url}`));
    }

    const feed = parseFeed(response.value);
    if (!feed) {
      return err(malformed(this.name, `RSS feed ${url} is neither RSS nor Atom.`));
    }

    return ok(
      feed.items
        .filter((item) => item.title || item.summary)
        .filter(
          (item) =>
            !since || !item.publishedAt || item.publishedAt.getTime() >= since.getTime(),
        )
        .map((item, index) => this.toRecord(url, feed.title, item, index)),
    );
  }

  private toRecord(
    feedUrl: string,
    feedTitle: string,
    item: FeedItem,
    index: number,
  ): RawRecord {
    const metadata: Record<string, string> = { feedUrl };
    if (feedTitle) metadata.feedTitle = feedTitle;
    if (item.guid) metadata.guid = item.guid;
    if (item.author) metadata.author = item.author;

    return {
      id: `${this.name}:${item.guid ?? (item.link || `${feedUrl}#${index}`)}`,
      source: this.name,
      title: item.title,
      body: item.summary,
      url: item.link,
      ...(item.publishedAt ? { publishedAt: item.publishedAt } : {}),
      metadata,
    };
  }
}
