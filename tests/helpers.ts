import { vi } from "vitest";
import type { Settings } from "../src/config.js";
import type { AgentInvocation, AgentRegistry, CompletionEvent, DetectedLanguage, Notification, Services } from "../src/types.js";

export const testAgents: AgentRegistry = {
    main: { agentId: "MAINAGENT1", aliasId: "MAINALIAS1" },
    cost_optimization: { agentId: "COSTAGENT1", aliasId: "COSTALIAS1" },
    security: { agentId: "SECAGENT01", aliasId: "SECALIAS01" },
    alarm: { agentId: "ALARMAGENT", aliasId: "ALARMALIAS" },
    custom: { agentId: "CUSTOMAGNT", aliasId: "CUSTOMALIA" }
};

export function testSettings(overrides: Partial<Settings> = {}): Settings {
    return {
        agents: testAgents,
        topicArn: "arn:aws:sns:us-east-1:000000000000:support-replies",
        deadLetterQueueUrl: "https://sqs.us-east-1.amazonaws.com/000000000000/ticket-dlq",
        confidenceThreshold: 0.7,
        supportTeamName: "Support Team",
        ...overrides
    };
}

/** Streams `text` back as UTF-8 chunks of at most `chunkSize` bytes. */
export async function* completion(text: string, chunkSize = 8): AsyncGenerator<CompletionEvent> {
    const bytes = Buffer.from(text, "utf-8");
    for (let offset = 0; offset < bytes.length; offset += chunkSize) {
        yield { chunk: { bytes: bytes.subarray(offset, offset + chunkSize) } };
    }
}

export interface FakeServicesOptions {
    languages?: DetectedLanguage[];
    translation?: string;
    /** Raw agent output keyed by agent id. */
    agentOutputs?: Record<string, string>;
}

export function fakeServices({ languages = [{ languageCode: "en", score: 0.99 }], translation = "translated", agentOutputs = {} }: FakeServicesOptions = {}) {
    const detectLanguages = vi.fn(async (_text: string) => languages);
    const translate = vi.fn(async (_text: string, _source: string, _target: string): Promise<string | undefined> => translation);
    const invoke = vi.fn(async ({ agentId }: AgentInvocation) => {
        const output = agentOutputs[agentId];
        if (output === undefined) throw new Error(`unexpected agent ${agentId}`);
        return completion(output);
    });
    const publish = vi.fn(async (_notification: Notification): Promise<string | undefined> => "sns-message-1");
    const send = vi.fn(async (_queueUrl: string, _body: string): Promise<string | undefined> => "sqs-message-1");

    const services: Services = {
        languageDetector: { detectLanguages },
        translator: { translate },
        agentRuntime: { invoke },
        publisher: { publish },
        deadLetterQueue: { send }
    };

    return { services, detectLanguages, translate, invoke, publish, send };
}
