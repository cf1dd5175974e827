/**
 * CLI heartbeat command - Run the reflection schedule until interrupted.
 * Command: kindred heartbeat
 * Options: --once (single beat, then exit), --json
 */

import type { HeartbeatOutcome, HeartbeatService } from "../services/heartbeat.js";

export interface HeartbeatOptions {
  /** Beat once and return instead of scheduling */
  once?: boolean;
  /** Output as JSON (with --once) */
  json?: boolean;
  /** Aborting stops the schedule */
  signal?: AbortSignal;
}

function formatOutcome(outcome: HeartbeatOutcome): string {
  const lines: string[] = [`Heartbeat (${outcome.reason})`];
  if (outcome.skipped) {
    lines.push("Skipped: a beat is already running.");
    return lines.join("\n");
  }
  if (outcome.error !== undefined) {
    lines.push(`Error: ${outcome.error}`);
    return lines.join("\n");
  }
  lines.push(`Tool calls: ${outcome.toolCalls}`);
  lines.push(outcome.delivered && outcome.message !== null ? `Delivered: ${outcome.message}` : "No outgoing message.");
  return lines.join("\n");
}

function waitForAbort(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}

/**
 * HeartbeatCommand drives a HeartbeatService from the command line.
 */
export class HeartbeatCommand {
  private service: Pick<HeartbeatService, "start" | "stop" | "beat">;

  constructor(service: Pick<HeartbeatService, "start" | "stop" | "beat">) {
    this.service = service;
  }

  async execute(options: HeartbeatOptions = {}): Promise<string> {
    if (options.once) {
      const outcome = await this.service.beat("manual");
      return options.json ? JSON.stringify(outcome, null, 2) : formatOutcome(outcome);
    }

    await this.service.start();
    await waitForAbort(options.signal ?? new AbortController().signal);
    await this.service.stop();
    return "Heartbeat stopped.";
  }
}

export default HeartbeatCommand;
