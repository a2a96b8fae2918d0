import { errorMessage } from "./errors.js";
import type { DeadLetterQueue, DeadLetterResult } from "./types.js";

/**
 * Best-effort capture of a failed request. Never throws: a failure here is
 * reported in the result and must not replace the error being answered.
 */
export async function forwardToDeadLetter(
    queue: DeadLetterQueue,
    queueUrl: string | undefined,
    error: string,
    originalEvent: unknown
): Promise<DeadLetterResult> {
    if (!queueUrl) return { status: "skipped" };

    try {
        const messageId = await queue.send(queueUrl, JSON.stringify({ error, originalEvent }));
        console.log("[DLQ] Event pushed to DLQ.");
        return { status: "forwarded", messageId };
    } catch (dlqError) {
        const message = errorMessage(dlqError);
        console.error(`[DLQ] Failed to push to DLQ: ${message}`);
        return { status: "failed", error: message };
    }
}
