import { describe, test } from "node:test";
import assert from "node:assert/strict";
import type { InternalAxiosRequestConfig } from "axios";
import { mapTokens, pickToken, VenueTokenResolver } from "../../../src/bot/executor/token-resolver";
import { stubAxios, type StubReply } from "../../helpers/fakes";

const makeResolver = (
  clob: (config: InternalAxiosRequestConfig) => StubReply,
  gamma: (config: InternalAxiosRequestConfig) => StubReply,
  cacheLimit?: number,
) => {
  const clobCalls: InternalAxiosRequestConfig[] = [];
  const gammaCalls: InternalAxiosRequestConfig[] = [];
  const resolver = new VenueTokenResolver({
    clobHost: "http://clob.test",
    gammaHost: "http://gamma.test",
    timeoutMs: 1000,
    cacheLimit,
    clobHttp: stubAxios(clob, clobCalls),
    gammaHttp: stubAxios(gamma, gammaCalls),
  });
  return { resolver, clobCalls, gammaCalls };
};

const notFound = (): StubReply => ({ status: 404, data: { error: "market not found" } });

describe("pickToken", () => {
  const tokens = [
    { outcome: "Detroit Lions", tokenId: "111" },
    { outcome: "Chicago Bears", tokenId: "222" },
  ];

  test("matches labels exactly, then by substring", () => {
    assert.equal(pickToken(tokens, "A", "  chicago   BEARS "), "222");
    assert.equal(pickToken(tokens, "A", "bears"), "222");
  });

  test("falls back to position for two-outcome markets", () => {
    assert.equal(pickToken(tokens, "A"), "111");
    assert.equal(pickToken(tokens, "B", "Packers"), "222");
    assert.equal(pickToken([...tokens, { outcome: "Draw", tokenId: "333" }], "B"), undefined);
  });
});

test("mapTokens accepts the venue's alternative field names", () => {
  assert.deepEqual(
    mapTokens([{ name: "Yes", clobTokenId: "9" }, { label: "No", id: 10 }, { outcome: "Void" }, "junk"]),
    [
      { outcome: "Yes", tokenId: "9" },
      { outcome: "No", tokenId: "10" },
    ],
  );
});

describe("VenueTokenResolver", () => {
  test("reads CLOB market tokens and caches them", async () => {
    const { resolver, clobCalls, gammaCalls } = makeResolver(
      () => ({
        status: 200,
        data: {
          tokens: [
            { outcome: "Lions", token_id: "111" },
            { outcome: "Bears", token_id: "222" },
          ],
        },
      }),
      notFound,
    );

    assert.equal(await resolver.resolve({ conditionId: "0xc1", side: "B", sideLabel: "Bears" }), "222");
    assert.equal(await resolver.resolve({ conditionId: "0xc1", side: "A" }), "111");
    assert.equal(clobCalls.length, 1);
    assert.equal(clobCalls[0].url, "/markets/0xc1");
    assert.equal(gammaCalls.length, 0);
  });

  test("falls back to Gamma when the CLOB has no tokens", async () => {
    const { resolver, gammaCalls } = makeResolver(notFound, () => ({
      status: 200,
      data: [{ tokens: [{ name: "Yes", clobTokenId: "9" }, { name: "No", id: 10 }] }],
    }));

    assert.equal(await resolver.resolve({ conditionId: "0xc2", side: "B" }), "10");
    assert.deepEqual(gammaCalls[0].params, { condition_id: "0xc2", active: "true", limit: "1" });
  });

  test("does not cache a miss", async () => {
    const { resolver, clobCalls, gammaCalls } = makeResolver(notFound, () => ({ status: 200, data: { data: [] } }));

    assert.equal(await resolver.resolve({ conditionId: "0xc3", side: "A" }), undefined);
    assert.equal(await resolver.resolve({ conditionId: "0xc3", side: "A" }), undefined);
    assert.equal(clobCalls.length, 2);
    assert.equal(gammaCalls.length, 2);
  });

  test("evicts the least recently used market past the cache limit", async () => {
    const { resolver, clobCalls } = makeResolver(
      () => ({ status: 200, data: { tokens: [{ outcome: "Yes", token_id: "1" }, { outcome: "No", token_id: "2" }] } }),
      notFound,
      2,
    );

    await resolver.resolve({ conditionId: "0xa", side: "A" });
    await resolver.resolve({ conditionId: "0xb", side: "A" });
    await resolver.resolve({ conditionId: "0xa", side: "B" });
    await resolver.resolve({ conditionId: "0xc", side: "A" });
    assert.equal(resolver.cacheSize(), 2);

    await resolver.resolve({ conditionId: "0xa", side: "A" });
    await resolver.resolve({ conditionId: "0xb", side: "A" });

    assert.deepEqual(
      clobCalls.map((c) => c.url),
      ["/markets/0xa", "/markets/0xb", "/markets/0xc", "/markets/0xb"],
    );
  });
});
