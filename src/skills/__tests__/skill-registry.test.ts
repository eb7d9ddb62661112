import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  loadManifest,
  ManifestError,
  parseSkillJson,
  parseSkillMarkdown,
} from "../manifest.ts";
import {
  hasEntrypoint,
  scanSkills,
  SkillsRootError,
  summarizeRegistry,
} from "../skill-registry.ts";

// ── Fixture helpers ─────────────────────────────────────────────────────────

async function writeSkill(
  root: string,
  name: string,
  files: Record<string, string>,
): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    const full = join(root, name, rel);
    await mkdir(join(full, ".."), { recursive: true });
    await writeFile(full, content);
  }
  await mkdir(join(root, name), { recursive: true });
}

function skillMd(name: string, extra = ""): string {
  return `---\nname: ${name}\n${extra}---\n\n# ${name}\n`;
}

// ── Manifest parsing ────────────────────────────────────────────────────────

describe("parseSkillMarkdown", () => {
  it("reads name, version and description", () => {
    const manifest = parseSkillMarkdown(
      skillMd("weather", "version: 1.4.0\ndescription: Forecasts\n"),
      "SKILL.md",
    );
    expect(manifest).toEqual({
      file: "SKILL.md",
      name: "weather",
      version: "1.4.0",
      description: "Forecasts",
    });
  });

  it("falls back to metadata.version", () => {
    const manifest = parseSkillMarkdown(
      skillMd("notes", "metadata:\n  version: \"2.1\"\n"),
      "SKILL.md",
    );
    expect(manifest.version).toBe("2.1");
  });

  it("stringifies numeric versions", () => {
    expect(parseSkillMarkdown(skillMd("calc", "version: 3\n"), "SKILL.md").version).toBe("3");
  });

  it("rejects a file without front matter", () => {
    expect(() => parseSkillMarkdown("# Just docs\n", "SKILL.md")).toThrow(
      "SKILL.md has no front matter block",
    );
  });

  it("rejects front matter without a name", () => {
    expect(() => parseSkillMarkdown("---\nversion: 1.0.0\n---\n", "SKILL.md")).toThrow(
      'SKILL.md is missing a "name"',
    );
  });

  it("closes the block only on a line that starts with ---", () => {
    const manifest = parseSkillMarkdown(
      skillMd("dashes", "description: a---\nversion: 0.9.0\n"),
      "SKILL.md",
    );
    expect(manifest.description).toBe("a---");
    expect(manifest.version).toBe("0.9.0");
  });

  it("accepts an empty block and reports the missing object", () => {
    expect(() => parseSkillMarkdown("---\n---\n# Empty\n", "SKILL.md")).toThrow(
      "SKILL.md must describe an object",
    );
  });

  it("rejects invalid YAML", () => {
    expect(() => parseSkillMarkdown("---\nname: [unclosed\n---\n", "SKILL.md")).toThrow(
      ManifestError,
    );
  });
});

describe("parseSkillJson", () => {
  it("reads a JSON manifest", () => {
    expect(parseSkillJson('{"name":"lint","version":"0.3.1"}', "skill.json")).toEqual({
      file: "skill.json",
      name: "lint",
      version: "0.3.1",
      description: null,
    });
  });

  it("rejects broken JSON", () => {
    expect(() => parseSkillJson("{name", "skill.json")).toThrow(/^Invalid JSON: /);
  });
});

// ── Directory scanning ──────────────────────────────────────────────────────

describe("scanSkills", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "wake-skills-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("classifies healthy, degraded and broken skills", async () => {
    await writeSkill(root, "alpha", { "SKILL.md": skillMd("alpha"), "main.py": "" });
    await writeSkill(root, "beta", { "SKILL.md": skillMd("beta"), "scripts/run.ts": "" });
    await writeSkill(root, "gamma", { "skill.json": '{"name":"gamma"}', "src/index.js": "" });
    await writeSkill(root, "delta", { "SKILL.md": skillMd("delta") });
    await writeSkill(root, "epsilon", { "main.py": "" });

    const skills = await scanSkills(root);
    const payload = summarizeRegistry(root, skills);

    expect(skills.map((s) => s.name)).toEqual(["alpha", "beta", "delta", "epsilon", "gamma"]);
    expect(payload.total).toBe(5);
    expect(payload.healthy).toBe(3);
    expect(payload.degraded).toBe(1);
    expect(payload.broken).toBe(1);
    expect(payload.degradedNames).toEqual(["delta"]);
    expect(payload.brokenNames).toEqual(["epsilon"]);
    expect(payload.malformed).toEqual([]);
  });

  it("counts malformed manifests as broken and lists them", async () => {
    await writeSkill(root, "bad", { "SKILL.md": "---\nversion: 1\n---\n", "main.py": "" });

    const skills = await scanSkills(root);
    const payload = summarizeRegistry(root, skills);

    expect(skills[0]).toMatchObject({
      name: "bad",
      health: "broken",
      issue: "malformed_manifest",
      hasManifest: true,
      hasEntrypoint: true,
      issueDetail: 'SKILL.md is missing a "name"',
    });
    expect(payload.malformed).toEqual(["bad"]);
    expect(payload.broken).toBe(1);
  });

  it("treats allow-listed documentation skills as healthy", async () => {
    await writeSkill(root, "handbook", { "SKILL.md": skillMd("handbook") });
    const [record] = await scanSkills(root, { docOnly: ["handbook"] });
    expect(record?.health).toBe("healthy");
    expect(record?.issue).toBeNull();
  });

  it("ignores dot-directories and plain files", async () => {
    await writeSkill(root, ".cache", { "SKILL.md": skillMd("cache"), "main.py": "" });
    await writeFile(join(root, "README.md"), "not a skill");
    expect(await scanSkills(root)).toEqual([]);
  });

  it("records the declared version", async () => {
    await writeSkill(root, "pkg", { "SKILL.md": skillMd("pkg", "version: 0.9.0\n"), "run.sh": "" });
    const [record] = await scanSkills(root);
    expect(record?.declaredVersion).toBe("0.9.0");
  });

  it("throws SkillsRootError for a missing root", async () => {
    const missing = join(root, "nope");
    await expect(scanSkills(missing)).rejects.toThrow(`Skills root ${missing} does not exist`);
    await expect(scanSkills(missing)).rejects.toBeInstanceOf(SkillsRootError);
  });
});

describe("hasEntrypoint", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "wake-entry-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("ignores non-script files in scripts/", async () => {
    await mkdir(join(dir, "scripts"));
    await writeFile(join(dir, "scripts", "notes.md"), "");
    expect(await hasEntrypoint(dir)).toBe(false);
  });

  it("does not look deeper than scripts/", async () => {
    await mkdir(join(dir, "scripts", "nested"), { recursive: true });
    await writeFile(join(dir, "scripts", "nested", "tool.py"), "");
    expect(await hasEntrypoint(dir)).toBe(false);
  });
});

describe("loadManifest", () => {
  it("returns null when no manifest exists", async () => {
    const dir = await mkdtemp(join(tmpdir(), "wake-manifest-"));
    try {
      expect(await loadManifest(dir)).toBeNull();
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
