import type { Logger } from "../utils/logger.js";
import type { ActionResult, JsonMap } from "../tasks/types.js";
import { UnknownActionError, describeError } from "./errors.js";

/**
 * Performs the side effect behind a substep. Opaque to the orchestrator:
 * a result other than `completed`, or a throw, counts as failure.
 */
export interface ActionExecutor {
  execute(actionType: string, params: JsonMap): Promise<ActionResult>;
}

export type ActionHandler = (params: JsonMap) => Promise<JsonMap | void>;

export type UnknownActionPolicy = "fail" | "acknowledge";

export interface ActionRegistryOptions {
  /**
   * `acknowledge` completes actions nobody registered with a placeholder
   * result; `fail` rejects them with UnknownActionError.
   */
  unknownActions?: UnknownActionPolicy;
}

/** Default ActionExecutor: a registry of handlers keyed by action type. */
export class ActionRegistry implements ActionExecutor {
  private handlers = new Map<string, ActionHandler>();
  private logger: Logger;
  private unknownActions: UnknownActionPolicy;

  constructor(logger: Logger, options: ActionRegistryOptions = {}) {
    this.logger = logger;
    this.unknownActions = options.unknownActions ?? "fail";
  }

  register(actionType: string, handler: ActionHandler): void {
    if (this.handlers.has(actionType)) {
      this.logger.warn({ actionType }, "Action handler already registered, replacing");
    }
    this.handlers.set(actionType, handler);
  }

  has(actionType: string): boolean {
    return this.handlers.has(actionType);
  }

  listActionTypes(): string[] {
    return Array.from(this.handlers.keys()).sort();
  }

  async execute(actionType: string, params: JsonMap): Promise<ActionResult> {
    const handler = this.handlers.get(actionType);

    if (!handler) {
      if (this.unknownActions === "fail") {
        throw new UnknownActionError(actionType);
      }
      this.logger.warn({ actionType }, "No action handler registered, acknowledging");
      return {
        status: "completed",
        result: { message: `Action ${actionType} executed` },
      };
    }

    try {
      const result = await handler(params);
      return { status: "completed", result: result ?? {} };
    } catch (err) {
      this.logger.warn({ actionType, error: err }, "Action handler failed");
      return { status: "failed", error: describeError(err) };
    }
  }
}
