import { config } from "dotenv";
import { z } from "zod";

config();

const booleanFlag = (fallback: boolean) =>
    z.string()
        .trim()
        .toLowerCase()
        .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]))
        .default(fallback ? "true" : "false")
        .transform(value => value === "true" || value === "1" || value === "yes");

const emailList = z.string()
    .default("")
    .transform(value => value
        .split(",")
        .map(email => email.trim().toLowerCase())
        .filter(email => email.length > 0));

/**
 * Application settings, read from the environment (and `.env`).
 */
export const settingsSchema = z.object({
    PROJECT_NAME: z.string().default("Document Management System"),
    PORT: z.coerce.number().int().positive().default(8002),
    NODE_ENV: z.string().default("development"),
    LOG_LEVEL: z.string().default("info"),

    DATABASE_URL: z.string().min(1, "DATABASE_URL is required"),
    RUN_MIGRATIONS: booleanFlag(true),

    MINIO_ENDPOINT: z.string().min(1, "MINIO_ENDPOINT is required"),
    MINIO_EXTERNAL_URL: z.string().default(""),
    MINIO_SECURE: booleanFlag(false),
    MINIO_REGION: z.string().default("us-east-1"),
    MINIO_ACCESS_KEY: z.string().min(1, "MINIO_ACCESS_KEY is required"),
    MINIO_SECRET_KEY: z.string().min(1, "MINIO_SECRET_KEY is required"),
    MINIO_BUCKET_NAME: z.string().min(3, "MINIO_BUCKET_NAME must be at least 3 characters"),

    JWT_SECRET_KEY: z.string().min(1, "JWT_SECRET_KEY is required"),
    JWT_ALGORITHM: z.enum(["HS256", "HS384", "HS512"]).default("HS256"),
    ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(30),

    MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(100 * 1024 * 1024),
    UPLOAD_ADMIN_ONLY: booleanFlag(true),
    ADMIN_EMAILS: emailList,

    REDIS_URL: z.string().default("redis://localhost:6379"),
    MAINTENANCE_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),
    MAINTENANCE_BACKOFF_MS: z.coerce.number().int().nonnegative().default(1000),
    SHARE_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000)
});

export type Settings = z.infer<typeof settingsSchema>;

/**
 * Parse settings from an environment map. Throws with every invalid
 * key listed in the message.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
    const result = settingsSchema.safeParse(env);
    if (!result.success) {
        const problems = result.error.issues
            .map(issue => `${issue.path.join(".")}: ${issue.message}`)
            .join("; ");
        throw new Error(`Invalid configuration: ${problems}`);
    }
    return result.data;
}

let settings: Settings | null = null;

export function getSettings(): Settings {
    if (!settings) {
        settings = loadSettings();
    }
    return settings;
}
