import { z } from "zod";
import { ConfigurationError } from "../errors";

/** Empty strings from CI inputs mean "not set". */
const optionalText = z
  .string()
  .optional()
  .transform((val) => {
    const trimmed = val?.trim();
    return trimmed ? trimmed : undefined;
  });

const textWithDefault = (fallback: string) => optionalText.transform((val) => val ?? fallback);

const numberWithDefault = (fallback: number) =>
  z.preprocess(
    (val) => (typeof val === "string" && val.trim() === "" ? undefined : val),
    z.coerce.number().int().positive().default(fallback),
  );

const booleanFlag = z
  .string()
  .optional()
  .transform((val) => {
    if (val === undefined || val.trim() === "") return true;
    return !["false", "0", "no", "off"].includes(val.trim().toLowerCase());
  });

const exportEnvSchema = z.object({
  DB_HOST: z.string().trim().min(1, "DB_HOST is required"),
  DB_PORT: numberWithDefault(5432),
  DB_NAME: textWithDefault("postgres"),
  // Checked by validateDbCredentials so a bad value surfaces as a ConnectionError
  DB_USER: optionalText,
  DB_PASS: z.string().optional(),
  DB_SSL: booleanFlag,
  TARGET_PROJECTS: z.string().trim().min(1, "TARGET_PROJECTS must list at least one project"),
  DATE_FILTER: optionalText,
  CUSTOM_START_DATE: optionalText,
  CUSTOM_END_DATE: optionalText,
  EXPORT_DIR: textWithDefault("exports"),
  GITHUB_OUTPUT: optionalText,
});

const reportEnvSchema = z.object({
  DATA_API_URL: z
    .string()
    .trim()
    .url("DATA_API_URL must be an absolute URL")
    .transform((url) => url.replace(/\/+$/, "")),
  DATA_API_KEY: z.string().trim().min(1, "DATA_API_KEY is required"),
  REPORT_LOOKBACK_DAYS: numberWithDefault(90),
  REPORT_OUTPUT_DIR: textWithDefault("reports"),
  REPORT_TITLE: textWithDefault("Timesheet Report"),
});

export type ExportEnv = z.infer<typeof exportEnvSchema>;
export type ReportEnv = z.infer<typeof reportEnvSchema>;

type EnvSource = Record<string, string | undefined>;

function parseEnv<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, source: EnvSource, label: string): T {
  const result = schema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid ${label} environment — ${issues.join("; ")}`);
  }
  return result.data;
}

export function getExportEnv(source: EnvSource = process.env): ExportEnv {
  return parseEnv(exportEnvSchema, source, "export job");
}

export function getReportEnv(source: EnvSource = process.env): ReportEnv {
  return parseEnv(reportEnvSchema, source, "report");
}
