import { logger } from "../config/logger.js";
import type { ClassifiedError, InstanceHandle, InstanceStatus, LaunchFailure } from "./types.js";

export type LaunchEvent =
  | { type: "attempt_started"; attempt: number }
  | {
      type: "retry_scheduled";
      /** 1-based index of the retry about to happen. */
      retry: number;
      maxRetries: number;
      delayMs: number;
      /** Time spent in this launch so far, before the delay. */
      elapsedMs: number;
      error: ClassifiedError;
    }
  | { type: "launched"; instanceId: string; attempts: number }
  | { type: "poll_tick"; instanceId: string; status: InstanceStatus; ip: string | null; elapsedMs: number }
  | { type: "ready"; instance: InstanceHandle; attempts: number }
  | { type: "failed"; failure: LaunchFailure; attempts: number };

/** One-way channel for progress; must not throw. */
export type LaunchEventSink = (event: LaunchEvent) => void;

export const ignoreLaunchEvent: LaunchEventSink = () => {};

/** Default sink: structured log lines. */
export function logLaunchEvent(event: LaunchEvent): void {
  switch (event.type) {
    case "attempt_started":
      logger.debug(`Launch attempt ${event.attempt}`);
      break;
    case "retry_scheduled":
      logger.info(`Retrying launch in ${event.delayMs}ms`, {
        retry: event.retry,
        maxRetries: event.maxRetries,
        kind: event.error.kind,
        code: event.error.code,
      });
      break;
    case "launched":
      logger.info(`Instance ${event.instanceId} launched`, { attempts: event.attempts });
      break;
    case "poll_tick":
      logger.debug(`Instance ${event.instanceId} is ${event.status}`, { ip: event.ip, elapsedMs: event.elapsedMs });
      break;
    case "ready":
      logger.info(`Instance ${event.instance.id} ready`, { ip: event.instance.ip, attempts: event.attempts });
      break;
    case "failed":
      logger.warn(`Launch failed: ${event.failure.reason}`, { phase: event.failure.phase, attempts: event.attempts });
      break;
  }
}

/** Deliver every event to each sink in order. */
export function fanOut(...sinks: LaunchEventSink[]): LaunchEventSink {
  return (event) => {
    for (const sink of sinks) sink(event);
  };
}
