import { z } from "zod";
import { DEFAULT_STYLE, DESIGN_STYLES, type DesignStyle } from "@shirtsmith/contracts";
import type { LogLevel } from "./logger";

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const EnvSchema = z
  .object({
    OPENAI_API_KEY: optionalString,
    OPENAI_PARSER_MODEL: z.string().default("gpt-4o-mini"),
    PARSER_TIMEOUT_MS: positiveInt(12000),
    TRIGGER_KEYWORDS: z.string().default("tshirt,t-shirt,shirt,merch"),
    DEFAULT_STYLE: z.enum(DESIGN_STYLES).default(DEFAULT_STYLE),
    FULFILLMENT_VENDOR: z.enum(["printify", "prodigi"]).default("printify"),
    PRINTIFY_API_KEY: optionalString,
    PRINTIFY_SHOP_ID: optionalString,
    PRINTIFY_BLUEPRINT_ID: positiveInt(5),
    PRINTIFY_PRINT_PROVIDER_ID: z.coerce.number().int().positive().optional(),
    PRODIGI_API_KEY: optionalString,
    PRODIGI_SANDBOX: booleanFlag,
    PRODIGI_SKU: z.string().default("GLOBAL-TSHU-CLAS-MENS-MEDI-WHIT"),
    RETRY_MAX_ATTEMPTS: positiveInt(3),
    RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(500),
    CANVAS_WIDTH: positiveInt(4500),
    CANVAS_HEIGHT: positiveInt(5400),
    FONT_SIZE_MIN: positiveInt(120),
    FONT_SIZE_MAX: positiveInt(600),
    FONT_FAMILY: optionalString,
    DESIGN_OUTPUT_DIR: optionalString,
    REFERENCE_PREFIX: z
      .string()
      .regex(/^[a-z0-9]+$/, "must be lowercase letters and digits")
      .default("tee"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info")
  })
  .superRefine((env, ctx) => {
    if (env.FONT_SIZE_MIN > env.FONT_SIZE_MAX) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["FONT_SIZE_MIN"],
        message: "must not exceed FONT_SIZE_MAX"
      });
    }

    if (env.FULFILLMENT_VENDOR === "printify") {
      for (const key of ["PRINTIFY_API_KEY", "PRINTIFY_SHOP_ID"] as const) {
        if (!env[key]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: "is required when FULFILLMENT_VENDOR=printify"
          });
        }
      }
    }

    if (env.FULFILLMENT_VENDOR === "prodigi" && !env.PRODIGI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["PRODIGI_API_KEY"],
        message: "is required when FULFILLMENT_VENDOR=prodigi"
      });
    }
  });

export interface PrintifySettings {
  apiKey: string;
  shopId: string;
  blueprintId: number;
  printProviderId?: number;
}

export interface ProdigiSettings {
  apiKey: string;
  sandbox: boolean;
  sku: string;
}

export type FulfillmentSettings =
  | { vendor: "printify"; printify: PrintifySettings }
  | { vendor: "prodigi"; prodigi: ProdigiSettings };

export interface AppConfig {
  llm: {
    apiKey?: string;
    model: string;
    timeoutMs: number;
  };
  triggerKeywords: string[];
  defaultStyle: DesignStyle;
  fulfillment: FulfillmentSettings;
  retry: {
    maxAttempts: number;
    backoffBaseMs: number;
  };
  render: {
    canvas: { width: number; height: number };
    fontSize: { min: number; max: number };
    fontFamily?: string;
    outputDir?: string;
  };
  referencePrefix: string;
  logLevel: LogLevel;
}

export function parseKeywordList(raw: string): string[] {
  return raw
    .split(",")
    .map((keyword) => keyword.trim().toLowerCase())
    .filter(Boolean);
}

function fulfillmentSettings(env: z.infer<typeof EnvSchema>): FulfillmentSettings {
  if (env.FULFILLMENT_VENDOR === "prodigi") {
    return {
      vendor: "prodigi",
      prodigi: {
        apiKey: env.PRODIGI_API_KEY ?? "",
        sandbox: env.PRODIGI_SANDBOX,
        sku: env.PRODIGI_SKU
      }
    };
  }

  return {
    vendor: "printify",
    printify: {
      apiKey: env.PRINTIFY_API_KEY ?? "",
      shopId: env.PRINTIFY_SHOP_ID ?? "",
      blueprintId: env.PRINTIFY_BLUEPRINT_ID,
      printProviderId: env.PRINTIFY_PRINT_PROVIDER_ID
    }
  };
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"} ${issue.message}`)
    );
  }

  const values = parsed.data;

  return {
    llm: {
      apiKey: values.OPENAI_API_KEY,
      model: values.OPENAI_PARSER_MODEL,
      timeoutMs: values.PARSER_TIMEOUT_MS
    },
    triggerKeywords: parseKeywordList(values.TRIGGER_KEYWORDS),
    defaultStyle: values.DEFAULT_STYLE,
    fulfillment: fulfillmentSettings(values),
    retry: {
      maxAttempts: values.RETRY_MAX_ATTEMPTS,
      backoffBaseMs: values.RETRY_BACKOFF_MS
    },
    render: {
      canvas: { width: values.CANVAS_WIDTH, height: values.CANVAS_HEIGHT },
      fontSize: { min: values.FONT_SIZE_MIN, max: values.FONT_SIZE_MAX },
      fontFamily: values.FONT_FAMILY,
      outputDir: values.DESIGN_OUTPUT_DIR
    },
    referencePrefix: values.REFERENCE_PREFIX,
    logLevel: values.LOG_LEVEL
  };
}
