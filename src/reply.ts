import type { AgentReply } from "./types.js";

export const DEFAULT_REPLY = "Thank you for reaching out. We will assist you shortly.";

const REPLY_FIELDS = ["reply", "message", "raw_response"] as const;

/**
 * First non-empty text field wins. An empty answer, even an empty
 * `raw_response`, gets the generic acknowledgment rather than a blank reply.
 */
export function extractReply(reply: AgentReply): string {
    let text = DEFAULT_REPLY;
    for (const field of REPLY_FIELDS) {
        const value = reply[field];
        if (typeof value === "string" && value !== "") {
            text = value;
            break;
        }
    }
    // some agents double-escape newlines in their answers
    return text.replaceAll("\\n", "\n");
}
