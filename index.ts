/**
 * wake-check
 *
 * Wake-up and status orchestrator for a long-lived personal-assistant host:
 * runs a fixed table of health, security, skill, backup, memory, sync,
 * notification and task checks and renders one status report.
 */
export * from "./src/index.ts";
