// =============================================================================
// UsageAccountingMiddleware — Feeds AI SDK model calls into a UsageAccountant
// =============================================================================

import type { LanguageModelMiddleware } from "ai";

import type { UsageAccountant } from "../accounting/usage-accountant.js";
import { peekDefaultAccountant } from "../accounting/default-accountant.js";

export interface StreamFinish {
  usage: unknown;
  response: { modelId?: string };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Passes every part through unchanged and reports the `finish` part's usage,
 * with the model id from `response-metadata`, once the stream is drained.
 */
export function tapFinishPart<T>(
  stream: ReadableStream<T>,
  onFinish: (finish: StreamFinish) => Promise<void>,
): ReadableStream<T> {
  let usage: unknown = null;
  let modelId: string | undefined;

  return stream.pipeThrough(
    new TransformStream<T, T>({
      transform(part, controller) {
        if (isRecord(part)) {
          if (part.type === "response-metadata" && typeof part.modelId === "string") {
            modelId = part.modelId;
          } else if (part.type === "finish") {
            usage = part.usage;
          }
        }
        controller.enqueue(part);
      },
      async flush() {
        if (usage !== null) await onFinish({ usage, response: { modelId } });
      },
    }),
  );
}

/**
 * Wraps a model so each generate or stream call is accounted. Without an
 * explicit accountant, the process default is looked up per call and calls
 * pass through untouched while none exists.
 */
export function createUsageAccountingMiddleware(accountant?: UsageAccountant): LanguageModelMiddleware {
  const resolve = (): UsageAccountant | null => accountant ?? peekDefaultAccountant();

  return {
    wrapGenerate: async ({ doGenerate, model }) => {
      const target = resolve();
      target?.onCallStart({ name: model.modelId });
      const result = await doGenerate();
      await target?.onCallEnd(result);
      return result;
    },

    wrapStream: async ({ doStream, model }) => {
      const target = resolve();
      if (!target) return doStream();

      target.onCallStart({ name: model.modelId });
      const { stream, ...rest } = await doStream();
      return { ...rest, stream: tapFinishPart(stream, (finish) => target.onCallEnd(finish)) };
    },
  };
}
