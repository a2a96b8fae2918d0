import { BedrockAgentRuntimeClient, InvokeAgentCommand } from "@aws-sdk/client-bedrock-agent-runtime";
import { ComprehendClient, DetectDominantLanguageCommand } from "@aws-sdk/client-comprehend";
import { SNSClient, PublishCommand, type MessageAttributeValue } from "@aws-sdk/client-sns";
import { SQSClient, SendMessageCommand } from "@aws-sdk/client-sqs";
import { TranslateClient, TranslateTextCommand } from "@aws-sdk/client-translate";
import { UpstreamServiceError, errorMessage } from "./errors.js";
import type {
    AgentInvocation,
    AgentRuntime,
    CompletionEvent,
    DeadLetterQueue,
    DetectedLanguage,
    LanguageDetector,
    Notification,
    NotificationPublisher,
    Services,
    Translator
} from "./types.js";

// SDK failures keep their message (it ends up in the 500 body) but are typed as upstream errors
async function upstream<T>(service: string, call: () => Promise<T>): Promise<T> {
    try {
        return await call();
    } catch (error) {
        if (error instanceof UpstreamServiceError) throw error;
        throw new UpstreamServiceError(errorMessage(error), service, error);
    }
}

export class ComprehendLanguageDetector implements LanguageDetector {
    constructor(private readonly client: ComprehendClient) { }

    async detectLanguages(text: string): Promise<DetectedLanguage[]> {
        const response = await upstream("comprehend", () =>
            this.client.send(new DetectDominantLanguageCommand({ Text: text }))
        );
        const detected: DetectedLanguage[] = [];
        for (const language of response.Languages ?? []) {
            if (language.LanguageCode) {
                detected.push({ languageCode: language.LanguageCode, score: language.Score ?? 0 });
            }
        }
        return detected.sort((a, b) => b.score - a.score);
    }
}

export class AwsTranslator implements Translator {
    constructor(private readonly client: TranslateClient) { }

    async translate(text: string, sourceLanguage: string, targetLanguage: string): Promise<string | undefined> {
        const response = await upstream("translate", () =>
            this.client.send(new TranslateTextCommand({
                Text: text,
                SourceLanguageCode: sourceLanguage,
                TargetLanguageCode: targetLanguage
            }))
        );
        return response.TranslatedText;
    }
}

export class BedrockAgentRuntime implements AgentRuntime {
    constructor(private readonly client: BedrockAgentRuntimeClient) { }

    async invoke({ agentId, aliasId, sessionId, inputText }: AgentInvocation): Promise<AsyncIterable<CompletionEvent>> {
        const response = await upstream("bedrock-agent", () =>
            this.client.send(new InvokeAgentCommand({
                agentId,
                agentAliasId: aliasId,
                sessionId,
                inputText
            }))
        );
        if (!response.completion) {
            throw new UpstreamServiceError(`Agent ${agentId} returned no completion stream`, "bedrock-agent");
        }
        return response.completion;
    }
}

export class SnsNotificationPublisher implements NotificationPublisher {
    constructor(private readonly client: SNSClient) { }

    async publish({ topicArn, subject, message, attributes }: Notification): Promise<string | undefined> {
        const messageAttributes: Record<string, MessageAttributeValue> = {};
        for (const [name, value] of Object.entries(attributes)) {
            messageAttributes[name] = { DataType: "String", StringValue: value };
        }
        const response = await upstream("sns", () =>
            this.client.send(new PublishCommand({
                TopicArn: topicArn,
                Subject: subject,
                Message: message,
                MessageAttributes: messageAttributes
            }))
        );
        return response.MessageId;
    }
}

export class SqsDeadLetterQueue implements DeadLetterQueue {
    constructor(private readonly client: SQSClient) { }

    async send(queueUrl: string, body: string): Promise<string | undefined> {
        const response = await upstream("sqs", () =>
            this.client.send(new SendMessageCommand({ QueueUrl: queueUrl, MessageBody: body }))
        );
        return response.MessageId;
    }
}

export function createAwsServices(region?: string): Services {
    const clientConfig = region ? { region } : {};
    return {
        languageDetector: new ComprehendLanguageDetector(new ComprehendClient(clientConfig)),
        translator: new AwsTranslator(new TranslateClient(clientConfig)),
        agentRuntime: new BedrockAgentRuntime(new BedrockAgentRuntimeClient(clientConfig)),
        publisher: new SnsNotificationPublisher(new SNSClient(clientConfig)),
        deadLetterQueue: new SqsDeadLetterQueue(new SQSClient(clientConfig))
    };
}
