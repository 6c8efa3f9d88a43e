/**
 * Forwards actions to an external HTTP endpoint (an automation workflow,
 * a mail relay). Uses native fetch.
 */
import type { ActionHandler } from "../core/action-executor.js";
import type { JsonMap } from "../tasks/types.js";

export interface WebhookActionOptions {
  url: string;
  timeoutMs: number;
  apiKey?: string;
}

function isRecord(value: unknown): value is JsonMap {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function createWebhookAction(actionType: string, options: WebhookActionOptions): ActionHandler {
  return async (params) => {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), options.timeoutMs);

    try {
      const headers: Record<string, string> = {
        "Content-Type": "application/json",
      };
      if (options.apiKey) {
        headers["Authorization"] = `Bearer ${options.apiKey}`;
      }

      const res = await fetch(options.url, {
        method: "POST",
        headers,
        body: JSON.stringify({ action_type: actionType, params }),
        signal: controller.signal,
      });

      if (!res.ok) {
        const text = await res.text().catch(() => "");
        throw new Error(`Webhook returned HTTP ${res.status}: ${text.slice(0, 200)}`);
      }

      const text = await res.text();
      if (!text) return { status_code: res.status };
      const parsed: unknown = JSON.parse(text);
      return isRecord(parsed) ? parsed : { response: parsed };
    } finally {
      clearTimeout(timer);
    }
  };
}
