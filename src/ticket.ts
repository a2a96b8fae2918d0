import { z } from "zod";
import { DEFAULT_TICKET_ID } from "./config.js";
import { ValidationError } from "./errors.js";
import type { Ticket } from "./types.js";

export const MISSING_FIELDS_MESSAGE = "Missing 'ticketSubject' or 'ticketBody' in input";

// Lenient on the optional fields: a bad ticketId or customerEmail falls back instead of failing the request
const TicketPayloadSchema = z.object({
    ticketId: z.string().min(1).catch(DEFAULT_TICKET_ID),
    ticketSubject: z.string().min(1),
    ticketBody: z.string().min(1),
    customerEmail: z.string().nullable().catch(null)
});

/**
 * API Gateway delivers the payload as a JSON string in `body`; direct
 * invocations pass the ticket fields at the top level.
 */
export function extractPayload(event: unknown): unknown {
    if (typeof event === "object" && event !== null && "body" in event && typeof event.body === "string") {
        return JSON.parse(event.body);
    }
    return event;
}

export function parseTicket(event: unknown): Ticket {
    const parsed = TicketPayloadSchema.safeParse(extractPayload(event));
    if (!parsed.success) {
        throw new ValidationError(MISSING_FIELDS_MESSAGE);
    }

    const { ticketId, ticketSubject, ticketBody, customerEmail } = parsed.data;
    return Object.freeze({
        id: ticketId,
        subject: ticketSubject,
        body: ticketBody,
        customerEmail
    });
}

export const describeTicket = (ticket: Ticket): string => `${ticket.subject}\n\n${ticket.body}`;
