/**
 * HeartbeatService - periodic autonomous reflection.
 *
 * Each beat runs a reflection; if the thought carries a [SEND MESSAGE]
 * marker the message is delivered and recorded as an assistant turn.
 * The time of the last beat is kept in the state store so a restart does
 * not beat again before the interval has passed.
 */

import type { StateStore } from "../db/state.js";
import type { ConversationOrchestrator } from "../core/orchestrator.js";
import { errorMessage } from "../core/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";

export { extractOutgoingMessage } from "../core/orchestrator.js";

export const LAST_BEAT_KEY = "heartbeat:last_beat";
export const BEAT_COUNT_KEY = "heartbeat:beat_count";

/**
 * Delivers an outgoing message to whoever listens on the session
 */
export type DeliverMessage = (sessionId: string, message: string) => Promise<void>;

export interface HeartbeatServiceOptions {
  orchestrator: Pick<ConversationOrchestrator, "autonomousReflection" | "recordAssistantMessage">;
  state: StateStore;
  sessionId: string;
  intervalMinutes: number;
  deliver: DeliverMessage;
  logger?: Logger;
  now?: () => Date;
}

export interface HeartbeatOutcome {
  reason: string;
  /** True when another beat was still running */
  skipped: boolean;
  thought: string;
  toolCalls: number;
  message: string | null;
  delivered: boolean;
  error?: string;
}

export class HeartbeatService {
  private readonly options: HeartbeatServiceOptions;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private intervalId: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<HeartbeatOutcome> | null = null;

  constructor(options: HeartbeatServiceOptions) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  get intervalMs(): number {
    return this.options.intervalMinutes * 60 * 1000;
  }

  isRunning(): boolean {
    return this.intervalId !== null;
  }

  /**
   * Whether a full interval has passed since the last recorded beat.
   * A missing or unreadable timestamp counts as overdue.
   */
  async shouldBeat(): Promise<boolean> {
    const last = await this.options.state.get(LAST_BEAT_KEY);
    if (typeof last !== "string") {
      return true;
    }
    const lastMs = Date.parse(last);
    if (Number.isNaN(lastMs)) {
      return true;
    }
    return this.now().getTime() - lastMs >= this.intervalMs;
  }

  /**
   * Start beating every interval. Beats once right away if one is overdue.
   */
  async start(): Promise<void> {
    if (this.intervalId !== null) {
      return;
    }

    this.intervalId = setInterval(() => {
      this.trigger("scheduled");
    }, this.intervalMs);
    this.logger.info(`Heartbeat started (every ${this.options.intervalMinutes} min)`, {
      sessionId: this.options.sessionId,
    });

    if (await this.shouldBeat()) {
      this.trigger("startup");
    }
  }

  /**
   * Stop the schedule and wait for a running beat to finish.
   */
  async stop(): Promise<void> {
    if (this.intervalId !== null) {
      clearInterval(this.intervalId);
      this.intervalId = null;
      this.logger.info("Heartbeat stopped");
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  /**
   * Run one beat now. Never rejects; failures are reported on the outcome.
   */
  async beat(reason = "manual"): Promise<HeartbeatOutcome> {
    if (this.inFlight) {
      return { reason, skipped: true, thought: "", toolCalls: 0, message: null, delivered: false };
    }
    const run = this.runBeat(reason);
    this.inFlight = run;
    try {
      return await run;
    } finally {
      this.inFlight = null;
    }
  }

  private trigger(reason: string): void {
    // beat() never rejects
    this.beat(reason).catch((error: unknown) => {
      this.logger.error("Heartbeat failed", { error: errorMessage(error) });
    });
  }

  private async runBeat(reason: string): Promise<HeartbeatOutcome> {
    const { orchestrator, sessionId, deliver, state } = this.options;
    const outcome: HeartbeatOutcome = {
      reason,
      skipped: false,
      thought: "",
      toolCalls: 0,
      message: null,
      delivered: false,
    };

    try {
      const reflection = await orchestrator.autonomousReflection(sessionId);
      outcome.thought = reflection.thought;
      outcome.toolCalls = reflection.toolCalls.length;
      outcome.message = reflection.message;

      if (reflection.message !== null) {
        await deliver(sessionId, reflection.message);
        outcome.delivered = true;
        await orchestrator.recordAssistantMessage(sessionId, reflection.message, { source: "heartbeat" });
      }

      const count = await state.get(BEAT_COUNT_KEY, 0);
      await state.set(BEAT_COUNT_KEY, typeof count === "number" ? count + 1 : 1);
      await state.set(LAST_BEAT_KEY, this.now().toISOString());
      this.logger.debug(`Heartbeat (${reason}) done`, { toolCalls: outcome.toolCalls, delivered: outcome.delivered });
    } catch (error) {
      outcome.error = errorMessage(error);
      this.logger.warn(`Heartbeat (${reason}) failed`, { error: outcome.error });
    }
    return outcome;
  }
}
