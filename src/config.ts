import { flattenError, z } from "zod";

const ConfigSchema = z
  .object({
    port: z.coerce.number().default(3000),
    databaseUrl: z.string().min(1, "DATABASE_URL is required"),
    nodeEnv: z.enum(["development", "production", "test"]).default("development"),
    logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
    maxUploadBytes: z.coerce.number().int().positive().default(16 * 1024 * 1024),
    llmProvider: z.enum(["openai", "anthropic", "google", "ollama"]).default("openai"),
    llmModel: z.string().optional(),
    openaiApiKey: z.string().optional(),
    anthropicApiKey: z.string().optional(),
    googleApiKey: z.string().optional(),
    ollamaBaseUrl: z.string().default("http://localhost:11434"),
    smtpHost: z.string().default("smtp.gmail.com"),
    smtpPort: z.coerce.number().default(587),
    smtpUser: z.string().optional(),
    smtpPassword: z.string().optional(),
    senderEmail: z.string().optional(),
    senderName: z.string().default("Tenant Dashboard"),
    otelServiceName: z.string().default("lease-alerts"),
    otelExporterEndpoint: z.string().default("http://localhost:4318"),
    // default("true") before transform so the transform always runs on a string
    otelEnabled: z
      .string()
      .default("true")
      .transform((v) => v === "true"),
  })
  .superRefine((data, ctx) => {
    if (data.llmProvider === "openai" && !data.openaiApiKey) {
      ctx.addIssue({
        code: "custom",
        message: "OPENAI_API_KEY is required when LLM_PROVIDER=openai",
        path: ["openaiApiKey"],
      });
    }
    if (data.llmProvider === "anthropic" && !data.anthropicApiKey) {
      ctx.addIssue({
        code: "custom",
        message: "ANTHROPIC_API_KEY is required when LLM_PROVIDER=anthropic",
        path: ["anthropicApiKey"],
      });
    }
    if (data.llmProvider === "google" && !data.googleApiKey) {
      ctx.addIssue({
        code: "custom",
        message: "GOOGLE_GENERATIVE_AI_API_KEY is required when LLM_PROVIDER=google",
        path: ["googleApiKey"],
      });
    }
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

const parsed = ConfigSchema.safeParse({
  port: process.env.PORT,
  databaseUrl: process.env.DATABASE_URL,
  nodeEnv: process.env.NODE_ENV,
  logLevel: process.env.LOG_LEVEL,
  maxUploadBytes: process.env.MAX_UPLOAD_BYTES,
  llmProvider: process.env.LLM_PROVIDER,
  llmModel: process.env.LLM_MODEL,
  openaiApiKey: process.env.OPENAI_API_KEY,
  anthropicApiKey: process.env.ANTHROPIC_API_KEY,
  googleApiKey: process.env.GOOGLE_GENERATIVE_AI_API_KEY,
  ollamaBaseUrl: process.env.OLLAMA_BASE_URL,
  smtpHost: process.env.SMTP_HOST,
  smtpPort: process.env.SMTP_PORT,
  smtpUser: process.env.SMTP_USER,
  smtpPassword: process.env.SMTP_PASSWORD,
  senderEmail: process.env.SENDER_EMAIL,
  senderName: process.env.SENDER_NAME,
  otelServiceName: process.env.OTEL_SERVICE_NAME,
  otelExporterEndpoint: process.env.OTEL_EXPORTER_OTLP_ENDPOINT,
  otelEnabled: process.env.OTEL_ENABLED,
});

if (!parsed.success) {
  console.error("Configuration error:", flattenError(parsed.error).fieldErrors);
  throw new Error("Invalid configuration, check environment variables");
}

export const config = parsed.data;
