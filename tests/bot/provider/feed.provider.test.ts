import { describe, test } from "node:test";
import assert from "node:assert/strict";
import type { InternalAxiosRequestConfig } from "axios";
import {
  createFeedHttpClient,
  extractCloudflareRayId,
  HttpOpportunityFeed,
} from "../../../src/bot/provider/feed.provider";
import { FeedBlockedError, FeedPayloadError, FeedTransportError } from "../../../src/errors/app.errors";
import type { FeedQuery } from "../../../src/bot/types";
import { BASE_TIME, stubAxios, type StubReply } from "../../helpers/fakes";

const query: FeedQuery = {
  windowMinutes: 5,
  minGrade: "A",
  limit: 15,
  requireMicrostructure: false,
  marketQualityThreshold: 0.72,
};

const CLOUDFLARE_PAGE =
  '<html><body><h1>Sorry, you have been blocked</h1><span>Cloudflare Ray ID: <strong class="font-semibold">8a1b2c3d4e5f</strong></span></body></html>';

const makeFeed = (reply: StubReply, calls: InternalAxiosRequestConfig[] = []) =>
  new HttpOpportunityFeed({
    http: stubAxios(
      () => reply,
      calls,
      createFeedHttpClient({ baseUrl: "http://feed.test", apiKey: "test-key", timeoutMs: 5000 }),
    ),
    now: () => BASE_TIME,
  });

describe("HttpOpportunityFeed.fetch", () => {
  test("sends the query with bearer auth and parses candidates", async () => {
    const calls: InternalAxiosRequestConfig[] = [];
    const feed = makeFeed(
      {
        status: 200,
        data: {
          candidates: [
            { entry: { conditionId: "0xc1", sharpSide: "A", sharpSidePrice: 0.5 }, grade: { grade: "A" } },
            { entry: { sharpSide: "A", sharpSidePrice: 0.5 }, grade: { grade: "A" } },
          ],
          debug: { totalEntries: 40, upcomingEntries: 6, dedupDropped: 2 },
        },
      },
      calls,
    );
    const result = await feed.fetch(query);

    assert.equal(calls.length, 1);
    assert.equal(calls[0].url, "/api/bot/candidates");
    assert.equal(calls[0].method, "get");
    assert.equal(calls[0].timeout, 5000);
    assert.equal(calls[0].headers.Authorization, "Bearer test-key");
    assert.deepEqual(calls[0].params, {
      windowMinutes: "5",
      minGrade: "A",
      limit: "15",
      requireMicrostructure: "false",
      marketQualityThreshold: "0.72",
      debug: "true",
    });
    assert.deepEqual(
      result.opportunities.map((o) => [o.identity, o.trueProb, o.discoveredAt]),
      [["0xc1:A", 0.57, BASE_TIME]],
    );
    assert.deepEqual(result.rejected, [{ index: 1, reason: "missing_condition_id" }]);
    assert.deepEqual(result.debug, {
      totalEntries: 40,
      upcomingEntries: 6,
      excluded: undefined,
      dedupDropped: 2,
      dedupReasons: undefined,
    });
  });

  test("a 403 Cloudflare page is a block carrying the Ray ID", async () => {
    const feed = makeFeed({ status: 403, data: CLOUDFLARE_PAGE });
    await assert.rejects(feed.fetch(query), (err: unknown) => {
      assert.ok(err instanceof FeedBlockedError);
      assert.equal(err.rayId, "8a1b2c3d4e5f");
      assert.equal(err.endpoint, "/api/bot/candidates");
      return true;
    });
  });

  test("a Cloudflare challenge under another status is still a block", async () => {
    const feed = makeFeed({ status: 503, data: "Cloudflare Ray ID: 7f00aa11 performance & security" });
    await assert.rejects(feed.fetch(query), FeedBlockedError);
  });

  test("other HTTP failures are transport errors", async () => {
    const feed = makeFeed({ status: 502, data: { error: "upstream" } });
    await assert.rejects(feed.fetch(query), (err: unknown) => {
      assert.ok(err instanceof FeedTransportError);
      assert.equal(err.status, 502);
      return true;
    });
  });

  test("malformed payloads are rejected", async () => {
    await assert.rejects(makeFeed({ status: 200, data: "<html></html>" }).fetch(query), FeedPayloadError);
    await assert.rejects(makeFeed({ status: 200, data: { candidates: "none" } }).fetch(query), FeedPayloadError);
  });

  test("a missing candidates field is an empty batch", async () => {
    const result = await makeFeed({ status: 200, data: {} }).fetch(query);
    assert.deepEqual(result, { opportunities: [], rejected: [] });
  });
});

test("reportPick posts the pick as JSON", async () => {
  const calls: InternalAxiosRequestConfig[] = [];
  const feed = makeFeed({ status: 200, data: { ok: true } }, calls);
  await feed.reportPick({ conditionId: "0xc1", grade: "A", sharpSide: "A", price: 0.5 });
  assert.equal(calls[0].url, "/api/bot/picks");
  assert.equal(calls[0].method, "post");
  assert.deepEqual(JSON.parse(String(calls[0].data)), {
    conditionId: "0xc1",
    grade: "A",
    sharpSide: "A",
    price: 0.5,
  });
});

test("extractCloudflareRayId reads both page layouts", () => {
  assert.equal(extractCloudflareRayId(CLOUDFLARE_PAGE), "8a1b2c3d4e5f");
  assert.equal(extractCloudflareRayId("Cloudflare Ray ID: 7f00aa11"), "7f00aa11");
  assert.equal(extractCloudflareRayId("plain error"), undefined);
});
