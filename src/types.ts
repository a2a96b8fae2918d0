export const CATEGORIES = ["cost_optimization", "security", "alarm", "custom"] as const;

export type Category = typeof CATEGORIES[number];

// "main" is the routing agent; the rest are specialists, one per category
export type AgentName = "main" | Category;

export interface Ticket {
    readonly id: string;
    readonly subject: string;
    readonly body: string;
    readonly customerEmail: string | null;
}

export interface ClassificationVerdict {
    category: string;
    confidence: number;
}

/**
 * Decoded agent output. Agents are asked for JSON but are free to answer in
 * plain text, which arrives as `{ raw_response }`.
 */
export type AgentReply = Record<string, unknown>;

export interface AgentTarget {
    agentId: string;
    aliasId: string;
}

export type AgentRegistry = Readonly<Record<AgentName, AgentTarget>>;

export interface FallbackOutcome {
    status: "fallback";
    message: string;
    classification: string;
    confidence: number;
}

export interface SuccessOutcome {
    status: "success";
    ticketId: string;
    customerEmail: string | null;
    category: Category;
    confidence: number;
    language: string;
    agent_used: Category;
    reply: string;
}

export type WorkflowOutcome = FallbackOutcome | SuccessOutcome;

export interface ErrorBody {
    error: string;
}

export type DeadLetterResult =
    | { status: "skipped" }
    | { status: "forwarded"; messageId?: string }
    | { status: "failed"; error: string };

export interface HandlerResponse {
    statusCode: number;
    headers: Record<string, string>;
    body: string;
}

// Collaborator ports. AWS-backed implementations live in aws.ts; tests pass fakes.

export interface DetectedLanguage {
    languageCode: string;
    score: number;
}

export interface LanguageDetector {
    /** Ranked by score, most probable first. */
    detectLanguages(text: string): Promise<DetectedLanguage[]>;
}

export interface Translator {
    translate(text: string, sourceLanguage: string, targetLanguage: string): Promise<string | undefined>;
}

/** One event of an agent completion stream; only chunk events carry text. */
export interface CompletionEvent {
    chunk?: { bytes?: Uint8Array };
}

export interface AgentInvocation {
    agentId: string;
    aliasId: string;
    sessionId: string;
    inputText: string;
}

export interface AgentRuntime {
    invoke(invocation: AgentInvocation): Promise<AsyncIterable<CompletionEvent>>;
}

export interface Notification {
    topicArn: string;
    subject: string;
    message: string;
    attributes: Record<string, string>;
}

export interface NotificationPublisher {
    publish(notification: Notification): Promise<string | undefined>;
}

export interface DeadLetterQueue {
    send(queueUrl: string, body: string): Promise<string | undefined>;
}

export interface Services {
    languageDetector: LanguageDetector;
    translator: Translator;
    agentRuntime: AgentRuntime;
    publisher: NotificationPublisher;
    deadLetterQueue: DeadLetterQueue;
}
