import { describe, expect, it } from "vitest";
import type { PhaseContext } from "../../orchestrator/context.ts";
import { BufferLogger } from "../../observability/logger.ts";
import {
  describeActivity,
  matchWorkers,
  parseElapsed,
  parsePsOutput,
  type ProcessLister,
} from "../process-lister.ts";
import { jobName, parseCrontab, type ScheduleSource } from "../schedule-source.ts";
import { createTasksPhase, upcomingJobs } from "../task-reporter.ts";

const NOW = new Date(2026, 9, 19, 10, 20, 0);

function context(): PhaseContext {
  return {
    runId: "run-test",
    mode: "normal",
    signal: new AbortController().signal,
    logger: new BufferLogger(),
    now: () => NOW,
    startedAt: NOW,
    previousRun: null,
    results: {},
  };
}

describe("parseElapsed", () => {
  it("parses every ps elapsed format", () => {
    expect(parseElapsed("05:07")).toBe(307);
    expect(parseElapsed("02:05:07")).toBe(7507);
    expect(parseElapsed("3-02:05:07")).toBe(266_707);
    expect(parseElapsed("garbage")).toBeNull();
  });
});

describe("parsePsOutput", () => {
  it("reads pid, elapsed time and full command", () => {
    const output = [
      "    1    10-00:00:00 /sbin/init",
      "  812       01:02:03 python3 /opt/agents/worker.py --queue mail",
      "",
    ].join("\n");

    expect(parsePsOutput(output)).toEqual([
      { pid: 1, elapsedSeconds: 864_000, command: "/sbin/init" },
      { pid: 812, elapsedSeconds: 3723, command: "python3 /opt/agents/worker.py --queue mail" },
    ]);
  });
});

describe("matchWorkers", () => {
  const processes = [
    { pid: 10, elapsedSeconds: 5, command: "node /srv/Agent-Runner/index.js" },
    { pid: 11, elapsedSeconds: 5, command: "bash" },
    { pid: 12, elapsedSeconds: 5, command: "node skill-host.js" },
  ];

  it("matches patterns case-insensitively and excludes given pids", () => {
    expect(matchWorkers(processes, ["agent", "skill"], [12]).map((p) => p.pid)).toEqual([10]);
  });

  it("ignores empty patterns", () => {
    expect(matchWorkers(processes, [""])).toEqual([]);
  });
});

describe("describeActivity", () => {
  it("names the script being executed", () => {
    expect(describeActivity("python3 /opt/agents/worker.py --queue mail")).toBe("worker.py");
    expect(describeActivity("/usr/bin/agentd --daemon")).toBeNull();
  });
});

describe("parseCrontab", () => {
  it("reads jobs and macros, skipping comments, env lines and @reboot", () => {
    const parsed = parseCrontab(
      [
        "# nightly jobs",
        "MAILTO=ops@example.test",
        "30 2 * * * /usr/bin/python3 /opt/agents/backup.py --full",
        "@hourly /opt/agents/sync.sh",
        "@reboot /opt/agents/start.sh",
        "",
      ].join("\n"),
    );

    expect(parsed.warnings).toEqual([]);
    expect(parsed.jobs.map((j) => [j.name, j.schedule, j.command])).toEqual([
      ["backup.py", "30 2 * * *", "/usr/bin/python3 /opt/agents/backup.py --full"],
      ["sync.sh", "@hourly", "/opt/agents/sync.sh"],
    ]);
  });

  it("warns about invalid lines", () => {
    const parsed = parseCrontab("61 * * * * echo hi\n* * * * *\n");
    expect(parsed.jobs).toEqual([]);
    expect(parsed.warnings).toEqual([
      'crontab line 1: Value 61 out of range [0-59] in field "minute"',
      "crontab line 2: missing command",
    ]);
  });
});

describe("jobName", () => {
  it("falls back to the first word", () => {
    expect(jobName("FOO=1 /usr/local/bin/report --daily")).toBe("report");
  });
});

describe("upcomingJobs", () => {
  it("keeps jobs inside the window, soonest first", () => {
    const { jobs } = parseCrontab(
      ["0 6 * * * /a/daily.sh", "0 11 * * * /a/late.sh", "0 0 1 1 * /a/yearly.sh"].join("\n"),
    );
    const upcoming = upcomingJobs(jobs, NOW, 24);

    expect(upcoming.map((j) => j.name)).toEqual(["late.sh", "daily.sh"]);
    expect(upcoming[0]?.nextRunAt).toBe(new Date(2026, 9, 19, 11, 0).toISOString());
  });
});

describe("createTasksPhase", () => {
  const lister: ProcessLister = {
    list: async () => [
      { pid: 500, elapsedSeconds: 120, command: "python3 /opt/agents/worker.py" },
      { pid: 501, elapsedSeconds: 1, command: "vim notes.txt" },
    ],
  };
  const schedule: ScheduleSource = { read: async () => "0 11 * * * /opt/agents/report.py\n" };

  it("reports running workers and upcoming jobs", async () => {
    const outcome = await createTasksPhase({
      processes: lister,
      schedule,
      patterns: ["agent"],
      lookaheadHours: 24,
      selfPid: 1,
    })(context());

    expect(outcome.status).toBe("ok");
    if (outcome.status === "ok") {
      expect(outcome.payload.running).toEqual([
        {
          pid: 500,
          uptimeSeconds: 120,
          command: "python3 /opt/agents/worker.py",
          activity: "worker.py",
        },
      ]);
      expect(outcome.payload.upcoming.map((j) => j.name)).toEqual(["report.py"]);
    }
  });

  it("warns when process listing fails but still reports the schedule", async () => {
    const failing: ProcessLister = {
      list: async () => {
        throw new Error("ps: command not found");
      },
    };
    const outcome = await createTasksPhase({
      processes: failing,
      schedule,
      patterns: ["agent"],
      lookaheadHours: 24,
    })(context());

    expect(outcome.status).toBe("warn");
    if (outcome.status === "warn") {
      expect(outcome.payload.warnings).toEqual(["process listing failed: ps: command not found"]);
      expect(outcome.payload.upcoming).toHaveLength(1);
    }
  });

  it("treats an empty crontab as an empty schedule", async () => {
    const outcome = await createTasksPhase({
      processes: { list: async () => [] },
      schedule: { read: async () => "" },
      patterns: ["agent"],
      lookaheadHours: 24,
    })(context());

    expect(outcome.status).toBe("ok");
    if (outcome.status === "ok") {
      expect(outcome.payload.upcoming).toEqual([]);
    }
  });
});
