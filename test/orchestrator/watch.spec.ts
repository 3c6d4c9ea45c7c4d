// test/orchestrator/watch.spec.ts
// Tests for debounced regeneration

import { describe, it, expect, vi, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { debounce, watchDefinitions } from "../../src/orchestrator/watch";

describe("debounce", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("runs once after the last trigger of a burst", () => {
    vi.useFakeTimers();
    const run = vi.fn();
    const d = debounce(run, 100);

    d.trigger();
    vi.advanceTimersByTime(50);
    d.trigger();
    vi.advanceTimersByTime(50);
    d.trigger();
    vi.advanceTimersByTime(99);
    expect(run).not.toHaveBeenCalled();
    expect(d.pending).toBe(true);

    vi.advanceTimersByTime(1);
    expect(run).toHaveBeenCalledTimes(1);
    expect(d.pending).toBe(false);
  });

  it("drops a pending run on cancel", () => {
    vi.useFakeTimers();
    const run = vi.fn();
    const d = debounce(run, 100);
    d.trigger();
    d.cancel();
    vi.advanceTimersByTime(500);
    expect(run).not.toHaveBeenCalled();
    expect(d.pending).toBe(false);
  });
});

describe("watchDefinitions", () => {
  let tmpDir: string;

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("stops watching on close", () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "recurforge-watch-"));
    const rebuild = vi.fn();
    const watcher = watchDefinitions(tmpDir, rebuild, { debounceMs: 10 });
    watcher.close();
    fs.writeFileSync(path.join(tmpDir, "late.json"), "{}");
    expect(rebuild).not.toHaveBeenCalled();
  });
});
