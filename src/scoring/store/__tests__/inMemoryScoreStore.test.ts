import { describe, it, expect } from "vitest";
import { MonotonicClock } from "../clock.js";
import { InMemoryScoreStore } from "../inMemoryScoreStore.js";
import { newScore } from "./fixtures.js";

describe("InMemoryScoreStore", () => {
  it("assigns distinct ids and increasing timestamps", async () => {
    const store = new InMemoryScoreStore(new MonotonicClock(() => 1_000));
    const a = await store.append(newScore());
    const b = await store.append(newScore());
    expect(a.id).not.toBe(b.id);
    expect(a.createdAtISO).toBe("1970-01-01T00:00:01.000Z");
    expect(b.createdAtISO).toBe("1970-01-01T00:00:01.001Z");
    expect(store.size).toBe(2);
  });

  it("lists newest first and honors the limit", async () => {
    const store = new InMemoryScoreStore();
    await store.append(newScore({ score: 10 }));
    await store.append(newScore({ score: 20 }));
    await store.append(newScore({ score: 30 }));
    const rows = await store.list({ limit: 2 });
    expect(rows.map((r) => r.score)).toEqual([30, 20]);
  });

  it("keeps scores at or below the threshold", async () => {
    const store = new InMemoryScoreStore();
    await store.append(newScore({ score: 74.9 }));
    await store.append(newScore({ score: 75 }));
    await store.append(newScore({ score: 75.1 }));
    const rows = await store.list({ limit: 25, threshold: 75 });
    expect(rows.map((r) => r.score)).toEqual([75, 74.9]);
  });

  it("filters by app id", async () => {
    const store = new InMemoryScoreStore();
    await store.append(newScore({ appId: "app-1" }));
    await store.append(newScore({ appId: "app-2" }));
    const rows = await store.list({ limit: 25, appId: "app-2" });
    expect(rows).toHaveLength(1);
    expect(rows[0].appId).toBe("app-2");
  });

  it("returns copies", async () => {
    const store = new InMemoryScoreStore();
    const stored = await store.append(newScore());
    stored.score = 0;
    const [row] = await store.list({ limit: 1 });
    expect(row.score).toBe(90);
  });
});
