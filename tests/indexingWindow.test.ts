import { describe, expect, it } from "vitest";
import {
  computeIndexingWindow,
  describeWindow,
  formatDay,
  startOfUtcDay,
} from "../src/pipelines/indexingWindow.js";

const NOW = new Date("2026-03-15T10:30:00.000Z");

describe("indexing window", () => {
  it("looks back 365 days for a connector that was never indexed", () => {
    const window = computeIndexingWindow(null, NOW);

    expect(window.since.toISOString()).toBe("2025-03-15T10:30:00.000Z");
    expect(window.until).toEqual(NOW);
  });

  it("honours a configured lookback", () => {
    const window = computeIndexingWindow(null, NOW, 7);

    expect(window.since.toISOString()).toBe("2026-03-08T10:30:00.000Z");
  });

  it("pulls a same-day checkpoint back to the start of yesterday", () => {
    const window = computeIndexingWindow(new Date("2026-03-15T08:00:00.000Z"), NOW);

    expect(formatDay(window.since)).toBe("2026-03-14");
    expect(window.since.toISOString()).toBe("2026-03-14T00:00:00.000Z");
  });

  it("treats a checkpoint at midnight today as same-day", () => {
    const window = computeIndexingWindow(new Date("2026-03-15T00:00:00.000Z"), NOW);

    expect(window.since.toISOString()).toBe("2026-03-14T00:00:00.000Z");
  });

  it("starts at an earlier checkpoint unchanged", () => {
    const checkpoint = new Date("2026-03-14T23:59:59.000Z");
    const window = computeIndexingWindow(checkpoint, NOW);

    expect(window.since).toEqual(checkpoint);
  });

  it("handles a checkpoint dated in the future like a same-day one", () => {
    const window = computeIndexingWindow(new Date("2026-03-20T00:00:00.000Z"), NOW);

    expect(window.since.toISOString()).toBe("2026-03-14T00:00:00.000Z");
  });

  it("formats days and windows in UTC", () => {
    expect(startOfUtcDay(NOW).toISOString()).toBe("2026-03-15T00:00:00.000Z");
    expect(
      describeWindow({ since: new Date("2026-03-14T00:00:00.000Z"), until: NOW }),
    ).toBe("2026-03-14T00:00:00.000Z and 2026-03-15T10:30:00.000Z");
  });
});
