import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { RawRecord } from "../../../core/entities/record";
import type {
  FetchRequest,
  SourcePluginPort,
} from "../../../core/ports/inboundPorts";
import type { ClockPort } from "../../../core/ports/outboundPorts";
import { validateFetchRequest } from "../../../core/rules/fetchRequest";
import { SystemClock } from "../../system/systemPorts";

const HOUR_MS = 60 * 60 * 1_000;

const headlines = [
  { topic: "expansion", body: "announced a new production site and plans to hire local engineers" },
  { topic: "partnership", body: "signed a multi-year supply partnership with a regional distributor" },
  { topic: "funding", body: "closed a financing round to accelerate its product roadmap" },
  { topic: "leadership", body: "appointed a new chief operating officer to lead international growth" },
  { topic: "product", body: "launched an upgraded product line aimed at mid-size manufacturers" },
] as const;

/**
 * Supplies repeatable company news so the pipeline can run end to end without network access.
 */
export class MockNewsPlugin implements SourcePluginPort {
  constructor(
    readonly name = "mock",
    private readonly itemCount: number = headlines.length,
    private readonly clock: ClockPort = new SystemClock(),
  ) {}

  async fetch(
    request: FetchRequest,
  ): Promise<Result<RawRecord[], AppBoundaryError>> {
    const valid = validateFetchRequest(request, this.name, this.clock.now());
    if (valid.isErr()) {
      return err(valid.error);
    }

    const company = request.target.name.trim();
    const slug = company.toLowerCase().replace(/[^a-z0-9]+/g, "-");
    const now = this.clock.now().getTime();
    const since = request.since?.getTime();

    return ok(
      headlines
        .slice(0, Math.min(this.itemCount, headlines.length))
        .map((headline, index): RawRecord => ({
          id: `${this.name}:${slug}-${index}`,
          source: this.name,
          title: `${company} ${headline.topic} update`,
          body: `${company} ${headline.body}.`,
          url: `https://example.local/news/${slug}/${index}`,
          publishedAt: new Date(now - index * HOUR_MS),
          metadata: { topic: headline.topic },
        }))
        .filter(
          (record) =>
            since === undefined ||
            !record.publishedAt ||
            record.publishedAt.getTime() >= since,
        ),
    );
  }
}
