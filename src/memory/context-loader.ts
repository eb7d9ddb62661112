import { readdir, stat } from "node:fs/promises";
import { extname, join } from "node:path";
import type { PhaseRunner } from "../orchestrator/context.ts";
import { errorMessage, isErrnoException } from "../state/errors.ts";
import type { MemoryCheck, MemoryPayload } from "../types/phase.ts";
import { okOrWarn } from "../types/phase.ts";

// ── Memory Layout ───────────────────────────────────────────────────────────

export const MEMORY_FILES = {
  primary: "hot/MEMORY.md",
  identity: "hot/IDENTITY.md",
  session: "hot/SESSION-STATE.md",
} as const;

export const KNOWLEDGE_DIR = "warm/blocks";

type FileCheckName = keyof typeof MEMORY_FILES;

const LABELS: Record<FileCheckName, string> = {
  primary: "primary memory",
  identity: "identity",
  session: "active session",
};

async function checkFile(memoryDir: string, name: FileCheckName): Promise<MemoryCheck> {
  const path = join(memoryDir, MEMORY_FILES[name]);
  try {
    const info = await stat(path);
    if (!info.isFile()) {
      return { name, status: "warn", path, detail: `${LABELS[name]} path is not a file` };
    }
    return {
      name,
      status: "ok",
      path,
      detail: `${LABELS[name]} loaded (${info.size} bytes, updated ${info.mtime.toISOString()})`,
    };
  } catch (err) {
    const detail =
      isErrnoException(err) && err.code === "ENOENT"
        ? `${LABELS[name]} not found`
        : `${LABELS[name]} unreadable: ${errorMessage(err)}`;
    return { name, status: "warn", path, detail };
  }
}

async function countKnowledgeBlocks(
  memoryDir: string,
): Promise<{ check: MemoryCheck; count: number }> {
  const path = join(memoryDir, KNOWLEDGE_DIR);
  try {
    const entries = await readdir(path, { withFileTypes: true });
    const count = entries.filter((e) => e.isFile() && extname(e.name) === ".json").length;
    return {
      count,
      check: {
        name: "knowledge",
        status: count > 0 ? "ok" : "warn",
        path,
        detail: count > 0 ? `${count} knowledge blocks cached` : "no knowledge blocks cached",
      },
    };
  } catch (err) {
    const detail =
      isErrnoException(err) && err.code === "ENOENT"
        ? "knowledge cache not found"
        : `knowledge cache unreadable: ${errorMessage(err)}`;
    return { count: 0, check: { name: "knowledge", status: "warn", path, detail } };
  }
}

/** Each check is independent; absence is advisory (warn), never fatal. */
export async function loadContext(memoryDir: string): Promise<MemoryPayload> {
  const [primary, identity, session, knowledge] = await Promise.all([
    checkFile(memoryDir, "primary"),
    checkFile(memoryDir, "identity"),
    checkFile(memoryDir, "session"),
    countKnowledgeBlocks(memoryDir),
  ]);

  return {
    checks: [primary, identity, session, knowledge.check],
    knowledgeBlocks: knowledge.count,
  };
}

export function createMemoryPhase(memoryDir: string): PhaseRunner<"memory"> {
  return async (ctx) => {
    const payload = await loadContext(memoryDir);
    const missing = payload.checks.filter((c) => c.status === "warn");

    ctx.logger.info("Context loaded", {
      knowledgeBlocks: payload.knowledgeBlocks,
      missing: missing.map((c) => c.name),
    });

    return okOrWarn(
      payload,
      missing.length > 0,
      payload.checks.map((c) => c.detail),
    );
  };
}
