import { ConfigurationError } from "./errors.js";
import type { Category, NotificationPublisher, Ticket } from "./types.js";

// Only tickets routed to the custom agent get an email-style notification
export const NOTIFY_CATEGORIES: ReadonlySet<Category> = new Set<Category>(["custom"]);

const SNS_SUBJECT_LIMIT = 100;

export interface NotifierOptions {
    topicArn?: string;
    supportTeamName: string;
}

export function shouldNotify(category: Category): boolean {
    return NOTIFY_CATEGORIES.has(category);
}

export function formatNotification(replyText: string, supportTeamName: string): string {
    return `Dear Customer,

Thank you for reaching out to our ${supportTeamName}.

${replyText}

If you have any further questions or need additional assistance, feel free to reply to this email.

Best regards,
${supportTeamName}
`;
}

export function formatSubject(ticketSubject: string): string {
    // SNS rejects subjects with line breaks or over 100 characters
    const subject = `Re: ${ticketSubject}`.replace(/\s*[\r\n]+\s*/g, " ");
    return subject.length > SNS_SUBJECT_LIMIT ? subject.slice(0, SNS_SUBJECT_LIMIT) : subject;
}

export async function sendReplyNotification(
    publisher: NotificationPublisher,
    ticket: Ticket,
    replyText: string,
    { topicArn, supportTeamName }: NotifierOptions
): Promise<string | undefined> {
    if (!topicArn) {
        throw new ConfigurationError("SNS_TOPIC_ARN is not set in environment variables.");
    }

    const attributes: Record<string, string> = {};
    if (ticket.customerEmail) {
        attributes.customerEmail = ticket.customerEmail;
    } else {
        console.warn(`[NOTIFY] Ticket ${ticket.id} has no customerEmail; publishing without the attribute`);
    }

    const messageId = await publisher.publish({
        topicArn,
        subject: formatSubject(ticket.subject),
        message: formatNotification(replyText, supportTeamName),
        attributes
    });
    console.log(`[NOTIFY] Email sent via SNS. Message ID: ${messageId}`);
    return messageId;
}
