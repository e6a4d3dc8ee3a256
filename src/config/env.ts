import "dotenv/config";
import { z } from "zod";

const booleanString = z
    .enum(["true", "false", "1", "0"])
    .transform((value) => value === "true" || value === "1");

const EnvSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    HOST: z.string().default("0.0.0.0"),
    NODE_ENV: z.string().default("development"),
    WAITER_PASSWORD: z.string().min(1).default("waiter123"),
    WHATSAPP_ACCESS_TOKEN: z.string().default(""),
    WHATSAPP_PHONE_NUMBER_ID: z.string().default(""),
    WHATSAPP_VERIFY_TOKEN: z.string().default(""),
    WHATSAPP_API_VERSION: z.string().default("v18.0"),
    DATA_FILE: z.string().optional(),
    SESSION_TTL_MINUTES: z.coerce.number().positive().default(60),
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
    LOG_PRETTY: booleanString.optional(),
});

export type Config = {
    port: number;
    host: string;
    waiterPassword: string;
    whatsapp: {
        accessToken: string;
        phoneNumberId: string;
        verifyToken: string;
        apiVersion: string;
    };
    dataFile?: string;
    sessionTtlMinutes: number;
    rateLimitMax: number;
    logLevel: z.infer<typeof EnvSchema>["LOG_LEVEL"];
    logPretty: boolean;
};

export function loadConfig(source: Record<string, string | undefined> = process.env): Config {
    const parsed = EnvSchema.safeParse(source);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
        throw new Error(`Invalid environment: ${issues}`);
    }
    const e = parsed.data;
    return {
        port: e.PORT,
        host: e.HOST,
        waiterPassword: e.WAITER_PASSWORD,
        whatsapp: {
            accessToken: e.WHATSAPP_ACCESS_TOKEN,
            phoneNumberId: e.WHATSAPP_PHONE_NUMBER_ID,
            verifyToken: e.WHATSAPP_VERIFY_TOKEN,
            apiVersion: e.WHATSAPP_API_VERSION,
        },
        dataFile: e.DATA_FILE || undefined,
        sessionTtlMinutes: e.SESSION_TTL_MINUTES,
        rateLimitMax: e.RATE_LIMIT_MAX,
        logLevel: e.LOG_LEVEL,
        logPretty: e.LOG_PRETTY ?? e.NODE_ENV !== "production",
    };
}
