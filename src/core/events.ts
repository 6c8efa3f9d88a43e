import type { Logger } from "../utils/logger.js";

export interface StepwiseEvent {
  eventType: string;
  timestamp: string;
  source: string;
  payload: Record<string, unknown>;
  severity: "high" | "medium" | "low";
  eventId?: string;
}

export type EventHandler = (event: StepwiseEvent) => Promise<void>;

export interface EventBus {
  publish(event: StepwiseEvent): Promise<void>;
  subscribe(pattern: string, handler: EventHandler): void;
}

/** Convert a glob-like pattern to a regex: "task.*" → /^task\..*$/ */
export function patternToRegex(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(`^${escaped.replace(/\*/g, ".*")}$`);
}

/**
 * In-process event bus. Handlers run sequentially in subscription order;
 * a throwing handler is logged and does not affect the others or the
 * publisher.
 */
export class InProcessEventBus implements EventBus {
  private subscriptions: Array<{ pattern: RegExp; handler: EventHandler }> = [];
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async publish(event: StepwiseEvent): Promise<void> {
    this.logger.debug(
      { eventType: event.eventType, severity: event.severity },
      "Event published"
    );

    for (const sub of this.subscriptions) {
      if (sub.pattern.test(event.eventType)) {
        try {
          await sub.handler(event);
        } catch (err) {
          this.logger.error(
            { eventType: event.eventType, error: err },
            "Event handler error"
          );
        }
      }
    }
  }

  subscribe(pattern: string, handler: EventHandler): void {
    this.subscriptions.push({ pattern: patternToRegex(pattern), handler });
    this.logger.debug({ pattern }, "Event subscription registered");
  }
}
