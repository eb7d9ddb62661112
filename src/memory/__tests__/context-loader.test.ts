import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadContext } from "../context-loader.ts";

describe("loadContext", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "wake-memory-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("passes every check on a complete layout", async () => {
    await mkdir(join(dir, "hot"));
    await mkdir(join(dir, "warm", "blocks"), { recursive: true });
    await writeFile(join(dir, "hot", "MEMORY.md"), "# Memory\n");
    await writeFile(join(dir, "hot", "IDENTITY.md"), "# Identity\n");
    await writeFile(join(dir, "hot", "SESSION-STATE.md"), "active\n");
    await writeFile(join(dir, "warm", "blocks", "a.json"), "{}");
    await writeFile(join(dir, "warm", "blocks", "b.json"), "{}");
    await writeFile(join(dir, "warm", "blocks", "readme.txt"), "skip");

    const payload = await loadContext(dir);

    expect(payload.checks.map((c) => [c.name, c.status])).toEqual([
      ["primary", "ok"],
      ["identity", "ok"],
      ["session", "ok"],
      ["knowledge", "ok"],
    ]);
    expect(payload.knowledgeBlocks).toBe(2);
    expect(payload.checks[0]?.detail).toMatch(/^primary memory loaded \(9 bytes, updated /);
  });

  it("warns independently for each missing piece", async () => {
    await mkdir(join(dir, "hot"));
    await writeFile(join(dir, "hot", "MEMORY.md"), "# Memory\n");

    const payload = await loadContext(dir);

    expect(payload.checks.map((c) => c.status)).toEqual(["ok", "warn", "warn", "warn"]);
    expect(payload.checks[1]).toEqual({
      name: "identity",
      status: "warn",
      path: join(dir, "hot", "IDENTITY.md"),
      detail: "identity not found",
    });
    expect(payload.checks[3]?.detail).toBe("knowledge cache not found");
    expect(payload.knowledgeBlocks).toBe(0);
  });

  it("handles a missing memory root", async () => {
    const payload = await loadContext(join(dir, "absent"));
    expect(payload.checks.every((c) => c.status === "warn")).toBe(true);
  });
});
