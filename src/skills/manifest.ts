import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";
import { errorMessage, isErrnoException } from "../state/errors.ts";

// ── Manifest ────────────────────────────────────────────────────────────────

export const MANIFEST_FILES = ["SKILL.md", "skill.json"] as const;
export type ManifestFile = (typeof MANIFEST_FILES)[number];

export interface SkillManifest {
  readonly file: ManifestFile;
  readonly name: string;
  readonly version: string | null;
  readonly description: string | null;
}

export class ManifestError extends Error {
  override readonly name = "ManifestError";

  constructor(
    message: string,
    readonly path: string,
  ) {
    super(message);
  }
}

// ── Parsing ─────────────────────────────────────────────────────────────────

const FRONTMATTER = /^---[ \t]*\r?\n(?:([\s\S]*?)\r?\n)?---[ \t]*(?:\r?\n|$)/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | null {
  if (typeof value === "string" && value.trim()) return value.trim();
  if (typeof value === "number") return String(value);
  return null;
}

function manifestFromFields(
  fields: unknown,
  file: ManifestFile,
  path: string,
): SkillManifest {
  if (!isRecord(fields)) {
    throw new ManifestError(`${file} must describe an object`, path);
  }
  const name = optionalString(fields["name"]);
  if (name === null) {
    throw new ManifestError(`${file} is missing a "name"`, path);
  }

  const metadata = fields["metadata"];
  const version =
    optionalString(fields["version"]) ??
    (isRecord(metadata) ? optionalString(metadata["version"]) : null);

  return { file, name, version, description: optionalString(fields["description"]) };
}

/** Parse `SKILL.md`: YAML front matter delimited by `---` lines. */
export function parseSkillMarkdown(content: string, path: string): SkillManifest {
  const match = content.trimStart().match(FRONTMATTER);
  if (!match) {
    throw new ManifestError("SKILL.md has no front matter block", path);
  }

  let fields: unknown;
  try {
    fields = parseYaml(match[1] ?? "");
  } catch (err) {
    throw new ManifestError(`Invalid front matter YAML: ${errorMessage(err)}`, path);
  }
  return manifestFromFields(fields, "SKILL.md", path);
}

export function parseSkillJson(content: string, path: string): SkillManifest {
  let fields: unknown;
  try {
    fields = JSON.parse(content);
  } catch (err) {
    throw new ManifestError(`Invalid JSON: ${errorMessage(err)}`, path);
  }
  return manifestFromFields(fields, "skill.json", path);
}

async function readOptional(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return null;
    throw new ManifestError(`Cannot read manifest: ${errorMessage(err)}`, path);
  }
}

/**
 * Load the manifest of a skill directory. `SKILL.md` wins over
 * `skill.json` when both exist.
 *
 * @returns null when neither file exists.
 * @throws ManifestError when the manifest exists but is unusable.
 */
export async function loadManifest(skillDir: string): Promise<SkillManifest | null> {
  const markdownPath = join(skillDir, "SKILL.md");
  const markdown = await readOptional(markdownPath);
  if (markdown !== null) return parseSkillMarkdown(markdown, markdownPath);

  const jsonPath = join(skillDir, "skill.json");
  const json = await readOptional(jsonPath);
  if (json !== null) return parseSkillJson(json, jsonPath);

  return null;
}
