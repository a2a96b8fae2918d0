import { createAwsServices } from "./aws.js";
import { loadSettings, type Settings } from "./config.js";
import { forwardToDeadLetter } from "./dead-letter.js";
import { ValidationError, errorMessage } from "./errors.js";
import { parseTicket } from "./ticket.js";
import type { ErrorBody, HandlerResponse, Services, WorkflowOutcome } from "./types.js";
import { runWorkflow } from "./workflow.js";

export type TicketHandler = (event: unknown) => Promise<HandlerResponse>;

const json = (statusCode: number, body: WorkflowOutcome | ErrorBody): HandlerResponse => ({
    statusCode,
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body)
});

const text = (statusCode: number, body: string): HandlerResponse => ({
    statusCode,
    headers: { "Content-Type": "text/plain" },
    body
});

export function createTicketHandler(services: Services, settings: Settings): TicketHandler {
    return async (event) => {
        console.log("[HANDLER] Received event:", JSON.stringify(event));

        try {
            const ticket = parseTicket(event);
            const outcome = await runWorkflow(ticket, services, settings);
            return json(200, outcome);
        } catch (error) {
            if (error instanceof ValidationError) {
                console.warn(`[HANDLER] Rejected ticket: ${error.message}`);
                return text(400, error.message);
            }

            const message = errorMessage(error);
            console.error("[HANDLER] Unhandled exception:", error);
            await forwardToDeadLetter(services.deadLetterQueue, settings.deadLetterQueueUrl, message, event);
            return json(500, { error: message });
        }
    };
}

let lambdaHandler: TicketHandler | undefined;

/**
 * Lambda entry point. Accepts an API Gateway proxy event or the bare ticket
 * payload; clients and settings are built on the first invocation and reused.
 * A configuration problem is answered with a 500 like any other failure.
 */
export const handler: TicketHandler = async (event) => {
    if (!lambdaHandler) {
        try {
            const settings = loadSettings();
            lambdaHandler = createTicketHandler(createAwsServices(settings.region), settings);
        } catch (error) {
            // left unset so the next invocation tries again
            console.error("[HANDLER] Failed to initialize:", error);
            return json(500, { error: errorMessage(error) });
        }
    }
    return lambdaHandler(event);
};
