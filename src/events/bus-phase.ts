import type { PhaseRunner } from "../orchestrator/context.ts";
import type { KnownNotificationType, NotificationMessage } from "../types/notification.ts";
import type { BusPayload } from "../types/phase.ts";
import { okOrWarn } from "../types/phase.ts";
import type { NotificationBus } from "./notification-bus.ts";

export const ORCHESTRATOR_SENDER = "wake-check";
export const READY_TYPE: KnownNotificationType = "orchestrator_ready";

/** Announcements from earlier runs of this tool. */
export function isOwnAnnouncement(message: NotificationMessage): boolean {
  return message.from === ORCHESTRATOR_SENDER && message.type === READY_TYPE;
}

/**
 * Drain the inbox, then announce this run with an `orchestrator_ready`
 * message. Announcements, this run's and earlier ones, are not counted.
 */
export function createBusPhase(bus: NotificationBus, limit: number): PhaseRunner<"bus"> {
  return async (ctx) => {
    const drained = await bus.drain(limit, isOwnAnnouncement);

    const readyMessageId = await bus.publish({
      type: READY_TYPE,
      from: ORCHESTRATOR_SENDER,
      payload: { runId: ctx.runId, mode: ctx.mode },
    });

    const payload: BusPayload = {
      activeCount: drained.totalCount,
      recent: drained.messages,
      malformed: drained.malformed,
      readyMessageId,
    };

    ctx.logger.info("Inbox drained", {
      activeCount: payload.activeCount,
      malformed: payload.malformed.length,
      readyMessageId,
    });

    const details = [
      `${payload.activeCount} active notification(s)`,
      ...payload.recent.map((m) => `${m.timestamp} ${m.type} from ${m.from}`),
      ...payload.malformed.map((name) => `malformed: ${name}`),
    ];
    return okOrWarn(payload, payload.malformed.length > 0, details);
  };
}
