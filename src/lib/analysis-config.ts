import { readFileSync } from "fs";
import { join } from "path";
import { z } from "zod";
import {
  COMPARISON_METHODS,
  EXPORT_FORMATS,
  EXTRACTION_METHODS,
  type AnalysisParameters,
  type ClassificationOptions,
  type ComparisonMethod,
  type ExportFormat,
  type ExtractionTuning,
} from "../types";
import { InvalidParametersError } from "./errors";

export const DEFAULT_CONFIG_FILE = "analysis-config.json";

const extractionMethodSchema = z.enum(EXTRACTION_METHODS);
const comparisonMethodSchema = z.enum(COMPARISON_METHODS);
const exportFormatSchema = z.enum(EXPORT_FORMATS);

const parametersSchema = z.object({
  minThemeFreq: z.number().int().min(1),
  numThemes: z.number().int().min(1),
  extractionMethod: extractionMethodSchema,
});

const configSchema = z.object({
  database: z
    .object({
      path: z.string().min(1).default("dbs/projects.sqlite"),
      description: z.string().optional(),
    })
    .default({}),
  analysis: z
    .object({
      minThemeFreq: z.number().int().min(1).default(2),
      numThemes: z.number().int().min(1).default(5),
      extractionMethod: extractionMethodSchema.default("Keyword Extraction"),
      comparisonMethod: comparisonMethodSchema.default("Theme Prevalence"),
      exportFormat: exportFormatSchema.default("Excel"),
    })
    .default({}),
  extraction: z
    .object({
      keywordsPerTheme: z.number().int().min(1).default(8),
      maxIterations: z.number().int().min(1).default(50),
      topicIterations: z.number().int().min(1).default(200),
      alpha: z.number().positive().default(0.1),
      beta: z.number().positive().default(0.01),
      seed: z.number().int().default(42),
      description: z.string().optional(),
    })
    .default({}),
  classification: z
    .object({
      similarityFloor: z.number().min(0).max(1).default(0),
      maxThemesPerRecord: z.number().int().min(0).default(0),
      description: z.string().optional(),
    })
    .default({}),
  concurrency: z.number().int().min(1).default(3),
});

export type AnalysisConfig = z.infer<typeof configSchema>;

let configCache: AnalysisConfig | null = null;

export function loadAnalysisConfig(configPath?: string): AnalysisConfig {
  if (configCache && !configPath) {
    return configCache;
  }

  const path = configPath || join(process.cwd(), DEFAULT_CONFIG_FILE);

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    if (configPath) {
      throw new InvalidParametersError(`Could not read config ${path}: ${error instanceof Error ? error.message : String(error)}`);
    }
    console.warn(`⚠️  Could not load analysis config from ${path}, using defaults`);
    raw = {};
  }

  const config = parseAnalysisConfig(raw);
  if (!configPath) {
    configCache = config;
  }
  return config;
}

export function parseAnalysisConfig(raw: unknown): AnalysisConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidParametersError(`Invalid analysis config: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function resetConfigCache() {
  configCache = null;
}

export function getDatabasePath(config: AnalysisConfig): string {
  return process.env.THEMES_DB_PATH || config.database.path;
}

export function getExtractionTuning(config: AnalysisConfig): ExtractionTuning {
  const { keywordsPerTheme, maxIterations, topicIterations, alpha, beta, seed } = config.extraction;
  return { keywordsPerTheme, maxIterations, topicIterations, alpha, beta, seed };
}

export function getClassificationOptions(config: AnalysisConfig): ClassificationOptions {
  const { similarityFloor, maxThemesPerRecord } = config.classification;
  return { similarityFloor, maxThemesPerRecord };
}

/**
 * Validate extraction parameters. Values outside the enumerations or
 * below 1 are rejected before any processing starts.
 */
export function parseAnalysisParameters(input: {
  minThemeFreq: unknown;
  numThemes: unknown;
  extractionMethod: unknown;
}): AnalysisParameters {
  const result = parametersSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidParametersError(`Invalid analysis parameters: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function parseComparisonMethod(value: unknown): ComparisonMethod {
  const result = comparisonMethodSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidParametersError(
      `Unknown comparison method "${String(value)}" (expected one of: ${COMPARISON_METHODS.join(", ")})`
    );
  }
  return result.data;
}

export function parseExportFormat(value: unknown): ExportFormat {
  const result = exportFormatSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidParametersError(
      `Unknown export format "${String(value)}" (expected one of: ${EXPORT_FORMATS.join(", ")})`
    );
  }
  return result.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
