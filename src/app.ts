import express, { Express, Request, Response } from "express";
import { authRoutes } from "./routes/auth";
import { documentRoutes } from "./routes/documents";
import { shareRoutes } from "./routes/shares";
import { createRequestLogger } from "./middleware/request-logger";
import { createErrorHandler, notFoundHandler } from "./middleware/error-handler";
import { getSettings } from "./config/settings";

export function createApp(): Express {
    const app = express();

    // Middleware
    app.use(createRequestLogger());
    app.use(express.json());
    app.use(express.urlencoded({ extended: true }));

    // Routes
    app.use("/", authRoutes);
    app.use("/documents", shareRoutes);
    app.use("/documents", documentRoutes);

    // Health check
    app.get("/health", (req: Request, res: Response) => {
        res.json({ status: "ok", timestamp: new Date().toISOString() });
    });

    // Root route
    app.get("/", (req: Request, res: Response) => {
        res.json({
            message: getSettings().PROJECT_NAME,
            version: "1.0.0",
            description: "Document storage with expiring, optionally code-protected share links",
            endpoints: {
                "Authentication": {
                    "POST /auth/register": "Create an account",
                    "POST /token": "Log in (OAuth2 password form), returns a bearer token",
                    "GET /users/me": "Current user",
                    "GET /users": "List users (admin)",
                    "PATCH /users/:id": "Activate/deactivate or promote a user (admin)"
                },
                "Documents": {
                    "POST /documents/upload": "Upload a file (multipart field 'file')",
                    "GET /documents/my-documents": "List your documents",
                    "GET /documents/preview/:id": "Presigned preview URL",
                    "GET /documents/download/:id": "Download, with Range support",
                    "PATCH /documents/:id": "Change visibility",
                    "DELETE /documents/:id": "Delete a document"
                },
                "Sharing": {
                    "POST /documents/:id/share": "Create or renew a share link",
                    "PUT /documents/:id/share": "Change share type, code or expiry",
                    "GET /documents/:id/share": "Share settings of a document",
                    "DELETE /documents/:id/share": "Cancel a share",
                    "GET /documents/share/:shareUuid": "Share settings by link",
                    "GET /documents/shared": "Your active shares",
                    "GET /documents/shared/:shareUuid": "Open a share link (public)",
                    "GET /documents/shared/:shareUuid/check": "Does a link need a code (public)"
                },
                "System": {
                    "GET /health": "Health check",
                    "GET /": "API information"
                }
            }
        });
    });

    app.use(notFoundHandler);
    app.use(createErrorHandler());

    return app;
}
