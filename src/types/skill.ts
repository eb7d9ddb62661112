// ── Skill Health ─────────────────────────────────────────────────────────────

export type SkillHealth = "healthy" | "degraded" | "broken";

export type SkillIssue =
  | "missing_manifest"
  | "malformed_manifest"
  | "no_entrypoint";

// ── Skill Record ─────────────────────────────────────────────────────────────

/**
 * One discovered skill directory. Derived on every scan, never persisted.
 */
export interface SkillRecord {
  readonly name: string;
  readonly path: string;
  readonly hasManifest: boolean;
  readonly hasEntrypoint: boolean;
  readonly declaredVersion: string | null;
  readonly health: SkillHealth;
  readonly issue: SkillIssue | null;
  readonly issueDetail?: string;
}

// ── Freshness ────────────────────────────────────────────────────────────────

export type FreshnessState = "up_to_date" | "update_available" | "unknown";

export interface SkillFreshness {
  readonly name: string;
  readonly declaredVersion: string | null;
  readonly latestVersion: string | null;
  readonly state: FreshnessState;
  readonly reason?: string;
}
