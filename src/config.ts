import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import type { AgentName, AgentRegistry, AgentTarget } from "./types.js";

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.7;
export const WORKING_LANGUAGE = "en";
export const DEFAULT_TICKET_ID = "test-session";

const optionalString = z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined));

const requiredString = z.string().trim().min(1, "is required");

const EnvSchema = z.object({
    MAIN_AGENT_ID: requiredString,
    MAIN_AGENT_ALIAS_ID: requiredString,
    COST_OPTIMIZATION_AGENT_ID: requiredString,
    COST_OPTIMIZATION_AGENT_ALIAS_ID: requiredString,
    SECURITY_AGENT_ID: requiredString,
    SECURITY_AGENT_ALIAS_ID: requiredString,
    ALARM_AGENT_ID: requiredString,
    ALARM_AGENT_ALIAS_ID: requiredString,
    CUSTOM_AGENT_ID: requiredString,
    CUSTOM_AGENT_ALIAS_ID: requiredString,
    SNS_TOPIC_ARN: optionalString,
    DLQ_URL: optionalString,
    CONFIDENCE_THRESHOLD: optionalString.pipe(
        z.coerce.number().min(0).max(1).default(DEFAULT_CONFIDENCE_THRESHOLD)
    ),
    SUPPORT_TEAM_NAME: optionalString.transform((value) => value ?? "Support Team"),
    AWS_REGION: optionalString
});

export interface Settings {
    agents: AgentRegistry;
    topicArn?: string;
    deadLetterQueueUrl?: string;
    confidenceThreshold: number;
    supportTeamName: string;
    region?: string;
}

/**
 * Agents may be configured by bare id or by agent ARN
 * (arn:aws:bedrock:<region>:<account>:agent/<id>); the runtime wants the id.
 */
export function toAgentId(idOrArn: string): string {
    const segments = idOrArn.split("/");
    return segments[segments.length - 1];
}

const target = (agentId: string, aliasId: string): AgentTarget => ({
    agentId: toAgentId(agentId),
    aliasId
});

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`);
        throw new ConfigurationError(`Invalid configuration: ${problems.join("; ")}`);
    }

    const e = parsed.data;
    const agents: Record<AgentName, AgentTarget> = {
        main: target(e.MAIN_AGENT_ID, e.MAIN_AGENT_ALIAS_ID),
        cost_optimization: target(e.COST_OPTIMIZATION_AGENT_ID, e.COST_OPTIMIZATION_AGENT_ALIAS_ID),
        security: target(e.SECURITY_AGENT_ID, e.SECURITY_AGENT_ALIAS_ID),
        alarm: target(e.ALARM_AGENT_ID, e.ALARM_AGENT_ALIAS_ID),
        custom: target(e.CUSTOM_AGENT_ID, e.CUSTOM_AGENT_ALIAS_ID)
    };

    return {
        agents,
        topicArn: e.SNS_TOPIC_ARN,
        deadLetterQueueUrl: e.DLQ_URL,
        confidenceThreshold: e.CONFIDENCE_THRESHOLD,
        supportTeamName: e.SUPPORT_TEAM_NAME,
        region: e.AWS_REGION
    };
}
