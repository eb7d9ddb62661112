import type { RuntimeConfig } from "./config.ts";
import { createLogger } from "./observability/logger.ts";
import type { Logger } from "./observability/logger.ts";
import { WakeOrchestrator } from "./orchestrator/orchestrator.ts";
import type { PhaseRunners } from "./orchestrator/context.ts";
import { createHealthPhase, nodeSystemSampler } from "./probes/health.ts";
import { TcpConnectivityProbe } from "./probes/connectivity.ts";
import { createSecurityPhase } from "./probes/security.ts";
import { createRegistryPhase } from "./skills/skill-registry.ts";
import { HttpVersionSource, createFreshnessPhase } from "./skills/freshness.ts";
import { createBackupPhase } from "./backup/backup-phase.ts";
import { CommandBackupTrigger } from "./backup/backup-trigger.ts";
import { createMemoryPhase } from "./memory/context-loader.ts";
import { CliGitClient, createSyncPhase } from "./sync/repo-sync.ts";
import { FileNotificationBus, type NotificationBus } from "./events/notification-bus.ts";
import { createBusPhase } from "./events/bus-phase.ts";
import { PsProcessLister } from "./tasks/process-lister.ts";
import { CrontabScheduleSource } from "./tasks/schedule-source.ts";
import { createTasksPhase } from "./tasks/task-reporter.ts";
import { createSummaryPhase } from "./report/summary.ts";
import { createStatePaths, type StatePaths } from "./state/paths.ts";
import { FileRunRecordStore, type RunRecordStore } from "./state/run-record-store.ts";
import { VERSION } from "./version.ts";

// ── Application Interface ──────────────────────────────────────────────────

export interface Application {
  readonly config: RuntimeConfig;
  readonly logger: Logger;
  readonly paths: StatePaths;
  readonly store: RunRecordStore;
  readonly bus: NotificationBus;
  readonly orchestrator: WakeOrchestrator;
}

/** Replacements for the real collaborators, used by tests. */
export interface ApplicationOverrides {
  readonly logger?: Logger;
  readonly runners?: Partial<PhaseRunners>;
  readonly now?: () => Date;
}

// ── Bootstrap ──────────────────────────────────────────────────────────────

/**
 * Wire every phase with its real collaborators.
 * This is the composition root: the single place where dependency injection happens.
 */
export function createApplication(
  config: RuntimeConfig,
  overrides: ApplicationOverrides = {},
): Application {
  // 1. Logger first, so all subsequent modules can log
  const logger =
    overrides.logger ??
    createLogger({
      level: config.logging.level,
      format: config.logging.format,
    });

  logger.debug("Bootstrapping application", {
    stateDir: config.stateDir,
    skillsDir: config.skills.rootDir,
    backupDir: config.backup.rootDir,
    concurrency: config.concurrency,
  });

  // 2. State store
  const paths = createStatePaths(config.stateDir);
  const store = new FileRunRecordStore(paths.lastRunFile);
  const bus = new FileNotificationBus(paths.notifications, paths.notificationArchive, {
    logger: logger.child({ module: "notification-bus" }),
    now: overrides.now,
  });

  // 3. Probes shared between phases
  const connectivity = new TcpConnectivityProbe(
    config.health.probeHost,
    config.health.probePort,
    config.health.probeTimeoutMs,
  );
  const versionSource =
    config.skills.versionSourceUrl === null
      ? null
      : new HttpVersionSource(config.skills.versionSourceUrl, config.skills.freshnessTimeoutMs);
  const trigger =
    config.backup.command === null
      ? null
      : new CommandBackupTrigger(
          config.backup.command,
          config.backup.commandTimeoutMs,
          logger.child({ module: "backup-trigger" }),
        );

  // 4. Phase table
  const runners: PhaseRunners = {
    health: createHealthPhase({
      diskPath: config.stateDir,
      diskFloorGb: config.health.diskFloorGb,
      memoryFloorGb: config.health.memoryFloorGb,
      sampler: nodeSystemSampler,
      connectivity,
    }),
    security: createSecurityPhase({
      roots: config.security.scanRoots,
      patternsFile: config.security.patternsFile,
    }),
    registry: createRegistryPhase({
      rootDir: config.skills.rootDir,
      docOnly: config.skills.docOnly,
    }),
    freshness: createFreshnessPhase({
      source: versionSource,
      connectivity,
      skillsRoot: config.skills.rootDir,
      docOnly: config.skills.docOnly,
      delayMs: config.skills.freshnessDelayMs,
    }),
    backup: createBackupPhase({
      rootDir: config.backup.rootDir,
      maxAgeHours: config.backup.maxAgeHours,
      requiredDirs: config.backup.requiredDirs,
      trigger,
    }),
    memory: createMemoryPhase(config.memoryDir),
    sync: createSyncPhase({ repoDir: config.syncRepoDir, git: new CliGitClient() }),
    bus: createBusPhase(bus, config.notificationLimit),
    tasks: createTasksPhase({
      processes: new PsProcessLister(),
      schedule: new CrontabScheduleSource(),
      patterns: config.tasks.patterns,
      lookaheadHours: config.tasks.lookaheadHours,
      selfPid: process.pid,
    }),
    summary: createSummaryPhase(),
    ...overrides.runners,
  };

  // 5. Orchestrator
  const orchestrator = new WakeOrchestrator({
    runners,
    store,
    paths,
    logger,
    version: VERSION,
    phaseTimeoutMs: config.phaseTimeoutMs,
    quickBudgetMs: config.quickBudgetMs,
    concurrency: config.concurrency,
    writeReports: config.writeReports,
    createStateRoot: config.createStateDir,
    now: overrides.now,
  });

  return { config, logger, paths, store, bus, orchestrator };
}
