import { describe, it, expect } from "vitest";
import { loadSettings, toAgentId } from "../src/config.js";
import { ConfigurationError } from "../src/errors.js";

const agentEnv = {
    MAIN_AGENT_ID: "arn:aws:bedrock:us-east-1:000000000000:agent/MAINAGENT1",
    MAIN_AGENT_ALIAS_ID: "MAINALIAS1",
    COST_OPTIMIZATION_AGENT_ID: "COSTAGENT1",
    COST_OPTIMIZATION_AGENT_ALIAS_ID: "COSTALIAS1",
    SECURITY_AGENT_ID: "SECAGENT01",
    SECURITY_AGENT_ALIAS_ID: "SECALIAS01",
    ALARM_AGENT_ID: "ALARMAGENT",
    ALARM_AGENT_ALIAS_ID: "ALARMALIAS",
    CUSTOM_AGENT_ID: "CUSTOMAGNT",
    CUSTOM_AGENT_ALIAS_ID: "CUSTOMALIA"
};

describe("toAgentId", () => {
    it("takes the id from an agent ARN", () => {
        expect(toAgentId("arn:aws:bedrock:us-east-1:000000000000:agent/ABC123")).toBe("ABC123");
    });

    it("passes a bare id through", () => {
        expect(toAgentId("ABC123")).toBe("ABC123");
    });
});

describe("loadSettings", () => {
    it("builds the agent registry and applies defaults", () => {
        const settings = loadSettings(agentEnv);

        expect(settings.agents.main).toEqual({ agentId: "MAINAGENT1", aliasId: "MAINALIAS1" });
        expect(settings.agents.custom).toEqual({ agentId: "CUSTOMAGNT", aliasId: "CUSTOMALIA" });
        expect(settings.confidenceThreshold).toBe(0.7);
        expect(settings.supportTeamName).toBe("Support Team");
        expect(settings.topicArn).toBeUndefined();
        expect(settings.deadLetterQueueUrl).toBeUndefined();
    });

    it("reads the optional settings", () => {
        const settings = loadSettings({
            ...agentEnv,
            SNS_TOPIC_ARN: "arn:aws:sns:us-east-1:000000000000:support-replies",
            DLQ_URL: "https://sqs.us-east-1.amazonaws.com/000000000000/ticket-dlq",
            CONFIDENCE_THRESHOLD: "0.85",
            SUPPORT_TEAM_NAME: "Cloud Desk",
            AWS_REGION: "eu-west-1"
        });

        expect(settings.topicArn).toBe("arn:aws:sns:us-east-1:000000000000:support-replies");
        expect(settings.deadLetterQueueUrl).toBe("https://sqs.us-east-1.amazonaws.com/000000000000/ticket-dlq");
        expect(settings.confidenceThreshold).toBe(0.85);
        expect(settings.supportTeamName).toBe("Cloud Desk");
        expect(settings.region).toBe("eu-west-1");
    });

    it("treats blank optional values as unset", () => {
        const settings = loadSettings({ ...agentEnv, SNS_TOPIC_ARN: "  ", CONFIDENCE_THRESHOLD: "" });

        expect(settings.topicArn).toBeUndefined();
        expect(settings.confidenceThreshold).toBe(0.7);
    });

    it("names the missing agent variables", () => {
        const { SECURITY_AGENT_ALIAS_ID: _omitted, ...env } = agentEnv;

        expect(() => loadSettings(env)).toThrow(ConfigurationError);
        expect(() => loadSettings(env)).toThrow(/SECURITY_AGENT_ALIAS_ID/);
    });

    it("rejects a threshold outside [0, 1]", () => {
        expect(() => loadSettings({ ...agentEnv, CONFIDENCE_THRESHOLD: "1.5" })).toThrow(/CONFIDENCE_THRESHOLD/);
    });
});
