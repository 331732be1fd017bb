import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createDebugRecorder } from "./debugDump.js";

describe("createDebugRecorder", () => {
  let tmp = "";

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), "research-debug-"));
  });
  afterEach(async () => {
    await fs.rm(tmp, { recursive: true, force: true });
  });

  it("writes numbered JSON dumps, creating the directory", async () => {
    const dir = path.join(tmp, "nested");
    const recorder = createDebugRecorder({ dir, now: () => 1000 });

    await recorder.dump("search plan", { a: 1 });
    await recorder.dump("search plan", { a: 2 });

    expect((await fs.readdir(dir)).sort()).toEqual(["search_plan_1000_1.json", "search_plan_1000_2.json"]);
    expect(await fs.readFile(path.join(dir, "search_plan_1000_1.json"), "utf8")).toBe('{\n  "a": 1\n}\n');
  });

  it("captures an exception with its context", async () => {
    const recorder = createDebugRecorder({ dir: tmp, now: () => 1000 });

    await recorder.captureError(new TypeError("bad input"), "planning");

    const body = await fs.readFile(path.join(tmp, "exception_1000_1.txt"), "utf8");
    expect(body.startsWith("Context: planning\n\nException type: TypeError\nException message: bad input\n\nStack:\n")).toBe(true);
  });

  it("captures non-Error values", async () => {
    const recorder = createDebugRecorder({ dir: tmp, now: () => 1000 });

    await recorder.captureError("plain", "writing");

    expect(await fs.readFile(path.join(tmp, "exception_1000_1.txt"), "utf8")).toBe(
      "Context: writing\n\nException type: string\nException message: plain\n\nStack:\n(none)\n",
    );
  });

  it("reports write failures instead of throwing", async () => {
    const blocker = path.join(tmp, "file");
    await fs.writeFile(blocker, "x");
    const onWriteError = vi.fn<(message: string) => void>();
    const recorder = createDebugRecorder({ dir: path.join(blocker, "sub"), now: () => 1000, onWriteError });

    await expect(recorder.dump("search_plan", {})).resolves.toBeUndefined();

    expect(onWriteError).toHaveBeenCalledTimes(1);
    expect(onWriteError.mock.calls[0]?.[0]).toMatch(/^debug dump search_plan_1000_1\.json failed: /);
  });
});
