import { statfs } from "node:fs/promises";
import { freemem } from "node:os";
import type { PhaseRunner } from "../orchestrator/context.ts";
import { errorMessage } from "../state/errors.ts";
import type { HealthCheck, HealthPayload } from "../types/phase.ts";
import { okOrWarn } from "../types/phase.ts";
import type { ConnectivityProbe } from "./connectivity.ts";

const GB = 1024 ** 3;

// ── System Sampler ──────────────────────────────────────────────────────────

export interface SystemSampler {
  diskFreeBytes(path: string): Promise<number>;
  memoryFreeBytes(): Promise<number>;
}

export const nodeSystemSampler: SystemSampler = {
  async diskFreeBytes(path) {
    const stats = await statfs(path);
    return stats.bavail * stats.bsize;
  },
  async memoryFreeBytes() {
    return freemem();
  },
};

// ── Health Probe ────────────────────────────────────────────────────────────

export interface HealthProbeOptions {
  readonly diskPath: string;
  readonly diskFloorGb: number;
  readonly memoryFloorGb: number;
  readonly sampler: SystemSampler;
  readonly connectivity: ConnectivityProbe;
}

function toGb(bytes: number): number {
  return Math.round((bytes / GB) * 10) / 10;
}

async function sampleFloor(
  name: "disk" | "memory",
  sample: () => Promise<number>,
  floorGb: number,
): Promise<{ check: HealthCheck; freeGb: number | null }> {
  try {
    const freeBytes = await sample();
    const freeGb = toGb(freeBytes);
    // Rounding is for display; the floor compares raw bytes
    const ok = freeBytes > floorGb * GB;
    return {
      freeGb,
      check: {
        name,
        status: ok ? "ok" : "warn",
        detail: ok
          ? `${freeGb} GB free`
          : `${freeGb} GB free, below the ${floorGb} GB floor`,
      },
    };
  } catch (err) {
    return {
      freeGb: null,
      check: { name, status: "warn", detail: `cannot sample ${name}: ${errorMessage(err)}` },
    };
  }
}

/** Disk, memory and network checks. Sampling errors degrade to warn. */
export async function probeHealth(
  options: HealthProbeOptions,
  signal?: AbortSignal,
): Promise<HealthPayload> {
  const [disk, memory, network] = await Promise.all([
    sampleFloor("disk", () => options.sampler.diskFreeBytes(options.diskPath), options.diskFloorGb),
    sampleFloor("memory", () => options.sampler.memoryFreeBytes(), options.memoryFloorGb),
    options.connectivity.check(signal),
  ]);

  const networkCheck: HealthCheck = {
    name: "network",
    status: network.reachable ? "ok" : "warn",
    detail: network.reachable
      ? `${network.host}:${network.port} reachable in ${network.latencyMs ?? 0}ms`
      : `${network.host}:${network.port} unreachable${network.error ? ` (${network.error})` : ""}`,
  };

  return {
    checks: [disk.check, memory.check, networkCheck],
    diskFreeGb: disk.freeGb,
    diskFloorGb: options.diskFloorGb,
    memoryFreeGb: memory.freeGb,
    memoryFloorGb: options.memoryFloorGb,
    network: {
      host: network.host,
      port: network.port,
      reachable: network.reachable,
      latencyMs: network.latencyMs,
    },
  };
}

export function createHealthPhase(options: HealthProbeOptions): PhaseRunner<"health"> {
  return async (ctx) => {
    const payload = await probeHealth(options, ctx.signal);
    const degraded = payload.checks.filter((c) => c.status === "warn");

    for (const check of degraded) {
      ctx.logger.warn("Health check degraded", { check: check.name, detail: check.detail });
    }

    return okOrWarn(
      payload,
      degraded.length > 0,
      payload.checks.map((c) => `${c.name}: ${c.detail}`),
    );
  };
}
