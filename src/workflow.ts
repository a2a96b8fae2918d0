import { classifyTicket, invokeAgent } from "./agent.js";
import { UnroutableCategoryError } from "./errors.js";
import { normalizeLanguage } from "./language.js";
import { sendReplyNotification, shouldNotify } from "./notifier.js";
import { extractReply } from "./reply.js";
import { describeTicket } from "./ticket.js";
import { CATEGORIES } from "./types.js";
import type {
    AgentRegistry,
    Category,
    ClassificationVerdict,
    FallbackOutcome,
    Services,
    Ticket,
    WorkflowOutcome
} from "./types.js";

export const FALLBACK_MESSAGE = "Low confidence score. Manual review needed.";

export interface WorkflowOptions {
    agents: AgentRegistry;
    confidenceThreshold: number;
    topicArn?: string;
    supportTeamName: string;
}

export type GateDecision =
    | { kind: "fallback"; outcome: FallbackOutcome }
    | { kind: "accepted"; category: Category; confidence: number };

export const isCategory = (value: string): value is Category =>
    CATEGORIES.some((category) => category === value);

/**
 * The only place a verdict is allowed through to a specialist. Low confidence
 * and an empty category are a normal fallback; a category no agent handles is
 * an error.
 */
export function applyConfidenceGate({ category, confidence }: ClassificationVerdict, threshold: number): GateDecision {
    if (confidence < threshold || category === "") {
        return {
            kind: "fallback",
            outcome: { status: "fallback", message: FALLBACK_MESSAGE, classification: category, confidence }
        };
    }
    if (!isCategory(category)) {
        throw new UnroutableCategoryError(category);
    }
    return { kind: "accepted", category, confidence };
}

export async function runWorkflow(ticket: Ticket, services: Services, options: WorkflowOptions): Promise<WorkflowOutcome> {
    const description = describeTicket(ticket);
    console.log("[WORKFLOW] Original ticket description:", description);

    const { text, languageCode } = await normalizeLanguage(description, services.languageDetector, services.translator);

    const verdict = await classifyTicket(services.agentRuntime, options.agents.main, ticket.id, text);
    const decision = applyConfidenceGate(verdict, options.confidenceThreshold);
    if (decision.kind === "fallback") {
        console.warn(`[GATE] Low confidence classification (${verdict.category || "none"}, ${verdict.confidence}). Returning fallback.`);
        return decision.outcome;
    }

    const { category, confidence } = decision;
    console.log(`[WORKFLOW] Routing ticket ${ticket.id} to ${category} agent`);
    const agentReply = await invokeAgent(services.agentRuntime, options.agents[category], ticket.id, text);
    console.log("[WORKFLOW] Agent response:", JSON.stringify(agentReply));

    const reply = extractReply(agentReply);

    if (shouldNotify(category)) {
        console.log("[WORKFLOW] Sending email via SNS...");
        await sendReplyNotification(services.publisher, ticket, reply, {
            topicArn: options.topicArn,
            supportTeamName: options.supportTeamName
        });
    }

    return {
        status: "success",
        ticketId: ticket.id,
        customerEmail: ticket.customerEmail,
        category,
        confidence,
        language: languageCode,
        agent_used: category,
        reply
    };
}
