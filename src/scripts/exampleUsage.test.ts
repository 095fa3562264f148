import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { main, resolveOutDir } from "./exampleUsage";

describe("resolveOutDir", () => {
  it("prefers the first argument", () => {
    expect(resolveOutDir(["charts", "extra"], { LABOR_MARKET_OUT_DIR: "from-env" })).toBe("charts");
  });

  it("falls back to the environment", () => {
    expect(resolveOutDir([], { LABOR_MARKET_OUT_DIR: "from-env" })).toBe("from-env");
  });

  it("defaults to the working directory", () => {
    expect(resolveOutDir([], {})).toBe(".");
  });
});

describe("main", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "labor-example-"));
    vi.spyOn(console, "info").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("writes the four charts and prints the comparative-statics table", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const out = join(dir, "nested");

    await main(out);

    expect((await readdir(out)).sort()).toEqual([
      "labor_market_dynamics.png",
      "labor_market_t0.png",
      "labor_market_t05.png",
      "labor_market_t1.png"
    ]);

    const lines = log.mock.calls.map(call => call[0]);
    expect(lines.slice(-5)).toEqual([
      "t=0.00: Employment=8.0000, Unemployment=6.0000",
      "t=0.25: Employment=7.2500, Unemployment=6.7500",
      "t=0.50: Employment=6.5000, Unemployment=7.5000",
      "t=0.75: Employment=5.7500, Unemployment=8.2500",
      "t=1.00: Employment=5.0000, Unemployment=9.0000"
    ]);
    expect(lines[0]).toContain("Labor Market Model Summary");
  }, 60_000);
});
