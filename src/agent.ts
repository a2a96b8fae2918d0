import { UpstreamServiceError, errorMessage } from "./errors.js";
import type { AgentReply, AgentRuntime, AgentTarget, ClassificationVerdict, CompletionEvent } from "./types.js";

/**
 * Drains an agent completion stream into one string. Chunks are buffered as
 * bytes and decoded once so multi-byte characters split across chunks survive.
 */
export async function collectCompletion(stream: AsyncIterable<CompletionEvent>): Promise<string> {
    const parts: Uint8Array[] = [];
    for await (const event of stream) {
        const bytes = event.chunk?.bytes;
        if (bytes) parts.push(bytes);
    }
    return Buffer.concat(parts).toString("utf-8");
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Agents are prompted for JSON but may answer in prose. Anything that is not
 * a JSON object comes back as `{ raw_response }`.
 */
export function parseAgentOutput(output: string): AgentReply {
    let parsed: unknown;
    try {
        parsed = JSON.parse(output);
    } catch (error) {
        console.warn(`[AGENT] Agent output not JSON (${errorMessage(error)}). Returning raw response.`);
        return { raw_response: output };
    }
    if (isRecord(parsed)) return parsed;
    console.warn("[AGENT] Agent output is JSON but not an object. Returning raw response.");
    return { raw_response: output };
}

export async function invokeAgent(
    runtime: AgentRuntime,
    { agentId, aliasId }: AgentTarget,
    sessionId: string,
    inputText: string
): Promise<AgentReply> {
    console.log(`[AGENT] Invoking agent ${agentId} (alias ${aliasId}, session ${sessionId})`);
    const stream = await runtime.invoke({ agentId, aliasId, sessionId, inputText });
    const output = await collectCompletion(stream);
    console.log(`[AGENT] Raw output from ${agentId}:`, output);
    return parseAgentOutput(output);
}

export function buildClassificationPrompt(ticketText: string): string {
    return `
You are a support ticket classifier. Your task is to analyze the customer's issue and return a JSON response with two fields:
- category: one of ['cost_optimization', 'security', 'alarm', 'custom']
- confidence: a float between 0 and 1 representing your confidence level.

Example Output:
{"category": "cost_optimization", "confidence": 0.9}

Customer Ticket:
"${ticketText}"`;
}

function readConfidence(value: unknown): number {
    if (value === undefined) return 0;
    const confidence = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
    if (typeof confidence !== "number" || !Number.isFinite(confidence)) {
        throw new UpstreamServiceError(
            `Classifier returned a non-numeric confidence: ${JSON.stringify(value)}`,
            "classifier"
        );
    }
    return confidence;
}

export function readVerdict(reply: AgentReply): ClassificationVerdict {
    const category = typeof reply.category === "string" ? reply.category.toLowerCase() : "";
    return { category, confidence: readConfidence(reply.confidence) };
}

export async function classifyTicket(
    runtime: AgentRuntime,
    mainAgent: AgentTarget,
    sessionId: string,
    ticketText: string
): Promise<ClassificationVerdict> {
    const reply = await invokeAgent(runtime, mainAgent, sessionId, buildClassificationPrompt(ticketText));
    console.log("[AGENT] Main agent response:", JSON.stringify(reply));
    return readVerdict(reply);
}
