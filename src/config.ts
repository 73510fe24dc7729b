import "dotenv/config";

import { mkdir } from "node:fs/promises";
import { join, resolve } from "node:path";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigError } from "./errors.js";

// ============================================================================
// Schema
// ============================================================================

export const DATASETS = ["vulnrichment", "cpes", "epss"] as const;

export type DatasetName = (typeof DATASETS)[number];

const LogLevelSchema = Type.Union([
  Type.Literal("trace"),
  Type.Literal("debug"),
  Type.Literal("info"),
  Type.Literal("warn"),
  Type.Literal("error"),
  Type.Literal("fatal"),
  Type.Literal("silent"),
]);

const HttpConfigSchema = Type.Object({
  maxAttempts: Type.Integer({ minimum: 1 }),
  retryBaseDelayMs: Type.Integer({ minimum: 0 }),
  politenessDelayMs: Type.Integer({ minimum: 0 }),
  requestTimeoutMs: Type.Integer({ minimum: 1 }),
  probeTimeoutMs: Type.Integer({ minimum: 1 }),
  userAgent: Type.String({ minLength: 1 }),
});

const VulnrichmentConfigSchema = Type.Object({
  repoUrl: Type.String({ minLength: 1 }),
  branch: Type.String({ minLength: 1 }),
  connectivityUrl: Type.String({ minLength: 1 }),
  logRetention: Type.Integer({ minimum: 1 }),
});

const CpesConfigSchema = Type.Object({
  apiUrl: Type.String({ minLength: 1 }),
  resultsPerPage: Type.Integer({ minimum: 1 }),
  testModePages: Type.Integer({ minimum: 1 }),
  apiKey: Type.Optional(Type.String({ minLength: 1 })),
  logRetention: Type.Integer({ minimum: 1 }),
});

const EpssConfigSchema = Type.Object({
  baseUrl: Type.String({ minLength: 1 }),
  logRetention: Type.Integer({ minimum: 1 }),
});

export const PipelineConfigSchema = Type.Object({
  rootDir: Type.String({ minLength: 1 }),
  logLevel: LogLevelSchema,
  http: HttpConfigSchema,
  vulnrichment: VulnrichmentConfigSchema,
  cpes: CpesConfigSchema,
  epss: EpssConfigSchema,
});

export type LogLevel = Static<typeof LogLevelSchema>;
export type HttpConfig = Static<typeof HttpConfigSchema>;
export type VulnrichmentConfig = Static<typeof VulnrichmentConfigSchema>;
export type CpesConfig = Static<typeof CpesConfigSchema>;
export type EpssConfig = Static<typeof EpssConfigSchema>;
export type PipelineConfig = Static<typeof PipelineConfigSchema>;

export interface ConfigOverrides {
  rootDir?: string;
  logLevel?: string;
  http?: Partial<HttpConfig>;
  vulnrichment?: Partial<VulnrichmentConfig>;
  cpes?: Partial<CpesConfig>;
  epss?: Partial<EpssConfig>;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_CONFIG: PipelineConfig = {
  rootDir: ".",
  logLevel: "info",
  http: {
    maxAttempts: 5,
    retryBaseDelayMs: 5_000,
    politenessDelayMs: 7_000,
    requestTimeoutMs: 180_000,
    probeTimeoutMs: 30_000,
    userAgent: "secref-loader/0.1",
  },
  vulnrichment: {
    repoUrl: "https://github.com/cisagov/vulnrichment.git",
    branch: "develop",
    connectivityUrl: "https://github.com",
    logRetention: 5,
  },
  cpes: {
    apiUrl: "https://services.nvd.nist.gov/rest/json/cpes/2.0",
    resultsPerPage: 10_000,
    testModePages: 5,
    logRetention: 3,
  },
  epss: {
    baseUrl: "https://epss.empiricalsecurity.com",
    logRetention: 3,
  },
};

// ============================================================================
// Environment
// ============================================================================

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

// Non-numeric input becomes NaN and is rejected by the schema check
function readInteger(env: Env, name: string): number | undefined {
  const value = readString(env, name);
  return value === undefined ? undefined : Number(value);
}

function overlay<T extends object>(base: T, layer: Partial<T> = {}): T {
  const result = { ...base };
  for (const [key, value] of Object.entries(layer)) {
    if (value !== undefined) {
      Reflect.set(result, key, value);
    }
  }
  return result;
}

function fromEnv(env: Env): ConfigOverrides {
  return {
    rootDir: readString(env, "SECREF_ROOT_DIR"),
    logLevel: readString(env, "LOG_LEVEL"),
    http: {
      maxAttempts: readInteger(env, "SECREF_MAX_ATTEMPTS"),
      retryBaseDelayMs: readInteger(env, "SECREF_RETRY_BASE_DELAY_MS"),
      politenessDelayMs: readInteger(env, "SECREF_POLITENESS_DELAY_MS"),
      requestTimeoutMs: readInteger(env, "SECREF_REQUEST_TIMEOUT_MS"),
    },
    vulnrichment: {
      repoUrl: readString(env, "VULNRICHMENT_REPO_URL"),
      branch: readString(env, "VULNRICHMENT_BRANCH"),
    },
    cpes: {
      apiKey: readString(env, "NVD_API_KEY"),
    },
  };
}

// ============================================================================
// Loading
// ============================================================================

function merge(base: PipelineConfig, layer: ConfigOverrides): unknown {
  return {
    rootDir: layer.rootDir ?? base.rootDir,
    logLevel: layer.logLevel ?? base.logLevel,
    http: overlay(base.http, layer.http),
    vulnrichment: overlay(base.vulnrichment, layer.vulnrichment),
    cpes: overlay(base.cpes, layer.cpes),
    epss: overlay(base.epss, layer.epss),
  };
}

/**
 * Build the run configuration once: defaults, then environment, then the
 * caller's overrides (usually CLI flags). The result is frozen.
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: Env = process.env
): PipelineConfig {
  const withEnv = merge(DEFAULT_CONFIG, fromEnv(env));

  if (!Value.Check(PipelineConfigSchema, withEnv)) {
    throw invalidConfig(withEnv);
  }

  const candidate = merge(withEnv, overrides);

  if (!Value.Check(PipelineConfigSchema, candidate)) {
    throw invalidConfig(candidate);
  }

  return Object.freeze({
    ...candidate,
    http: Object.freeze(candidate.http),
    vulnrichment: Object.freeze(candidate.vulnrichment),
    cpes: Object.freeze(candidate.cpes),
    epss: Object.freeze(candidate.epss),
  });
}

function invalidConfig(candidate: unknown): ConfigError {
  const errors = [...Value.Errors(PipelineConfigSchema, candidate)].map(
    (error) => `${error.path || "/"}: ${error.message}`
  );
  return new ConfigError(`Invalid configuration: ${errors.join("; ")}`, {
    errors,
  });
}

// ============================================================================
// Directories
// ============================================================================

export interface DatasetDirs {
  dataDir: string;
  logDir: string;
}

export function datasetDirs(
  config: PipelineConfig,
  dataset: DatasetName,
  overrides: Partial<DatasetDirs> = {}
): DatasetDirs {
  return {
    dataDir: resolve(overrides.dataDir ?? join(config.rootDir, dataset, "data")),
    logDir: resolve(overrides.logDir ?? join(config.rootDir, dataset, "logs")),
  };
}

export async function ensureDatasetDirs(dirs: DatasetDirs): Promise<void> {
  await mkdir(dirs.dataDir, { recursive: true });
  await mkdir(dirs.logDir, { recursive: true });
}
