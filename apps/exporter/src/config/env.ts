import { config } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { parseTagList } from "@pgstat/shared";

// Load .env from the repository root
const __dirname = dirname(fileURLToPath(import.meta.url));
config({ path: resolve(__dirname, "../../../../.env") });

const booleanFlag = (fallback: "true" | "false") =>
    z
        .string()
        .transform((v) => v.toLowerCase() !== "false" && v !== "0")
        .default(fallback);

export const envSchema = z
    .object({
        DATABASE_URL: z.string().url(),
        PG_DATABASE: z.string().min(1).optional(),
        NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
        LOG_LEVEL: z
            .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
            .default("info"),
        EXPORTER_PORT: z.coerce.number().int().min(0).max(65_535).default(9187),
        PG_POOL_MAX: z.coerce.number().int().min(1).default(2),
        PG_STATEMENT_TIMEOUT_MS: z.coerce.number().int().min(0).default(5000),
        METRIC_TAGS: z
            .string()
            .default("")
            .transform((raw, ctx) => {
                try {
                    return parseTagList(raw);
                } catch (err) {
                    ctx.addIssue({
                        code: z.ZodIssueCode.custom,
                        message: err instanceof Error ? err.message : String(err),
                    });
                    return z.NEVER;
                }
            }),
        COLLECT_DEFAULT_METRICS: booleanFlag("true"),
    })
    .transform((raw, ctx) => {
        const database = raw.PG_DATABASE ?? databaseFromUrl(raw.DATABASE_URL);
        if (!database) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ["PG_DATABASE"],
                message: "PG_DATABASE is required when DATABASE_URL names no database",
            });
            return z.NEVER;
        }
        return { ...raw, PG_DATABASE: database };
    });

export type Env = z.infer<typeof envSchema>;

/**
 * Extract the database name from a postgres:// connection string.
 */
export function databaseFromUrl(url: string): string | undefined {
    const name = decodeURIComponent(new URL(url).pathname.replace(/^\//, ""));
    return name === "" ? undefined : name;
}

function loadEnv(): Env {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
        console.error("❌ Invalid environment variables:");
        console.error(result.error.format());
        process.exit(1);
    }
    return result.data;
}

export const env = loadEnv();
