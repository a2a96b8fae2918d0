import express from "express";
import { config } from "dotenv";
import { randomUUID } from "node:crypto";
import { pathToFileURL } from "node:url";
import { createAwsServices } from "./aws.js";
import { loadSettings } from "./config.js";
import { createTicketHandler, type TicketHandler } from "./handler.js";

export function createApp(ticketHandler: TicketHandler): express.Express {
    const app = express();

    app.use(express.json());

    // Health check endpoint
    app.get("/health", (req, res) => {
        res.json({ status: "ok", timestamp: new Date().toISOString() });
    });

    // The parsed body is handed over as the event, same shape as a direct Lambda invocation
    const ticketRoute = async (req: express.Request, res: express.Response) => {
        const requestId = randomUUID().substring(0, 8);
        console.log(`[${requestId}] ${req.method} ${req.path}`);

        const result = await ticketHandler(req.body);
        console.log(`[${requestId}] Responding with ${result.statusCode}`);
        res.status(result.statusCode).set(result.headers).send(result.body);
    };

    const route = (req: express.Request, res: express.Response, next: express.NextFunction) => {
        ticketRoute(req, res).catch(next);
    };

    app.post("/api/tickets", route);
    app.post("/webhook", route);

    return app;
}

function main() {
    // Load environment variables
    config();

    const settings = loadSettings();
    const app = createApp(createTicketHandler(createAwsServices(settings.region), settings));
    const port = Number(process.env.PORT) || 3000;

    app.listen(port, () => {
        console.log(`🚀 Ticket router running on port ${port}`);
        console.log(`📍 Health check: http://localhost:${port}/health`);
        console.log(`🎫 Ticket endpoint: http://localhost:${port}/api/tickets`);
        console.log(`🔗 Webhook endpoint: http://localhost:${port}/webhook`);
    });
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
    main();
}
