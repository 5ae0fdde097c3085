/**
 * @fileoverview Loads, validates, and exports SDK configuration.
 * Values are sourced from environment variables (optionally via a `.env`
 * file) and from `package.json`, and validated with Zod. Invalid values are
 * reported and replaced by defaults so the package stays importable.
 * @module src/config/index
 */

import dotenv from "dotenv";
import { existsSync, mkdirSync, readFileSync, statSync } from "fs";
import path, { dirname, join } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

dotenv.config();

const findProjectRoot = (startDir: string): string => {
  let currentDir = startDir;
  if (path.basename(currentDir) === "dist") {
    currentDir = path.dirname(currentDir);
  }
  while (true) {
    if (existsSync(join(currentDir, "package.json"))) {
      return currentDir;
    }
    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      throw new Error(
        `Could not find project root (package.json) starting from ${startDir}`,
      );
    }
    currentDir = parentDir;
  }
};

let projectRoot: string;
try {
  projectRoot = findProjectRoot(dirname(fileURLToPath(import.meta.url)));
} catch {
  projectRoot = process.cwd();
}

const PackageJsonSchema = z.object({
  name: z.string().default("entrez-eutils-sdk"),
  version: z.string().default("0.0.0"),
  description: z.string().default("No description provided."),
});

/**
 * Loads name, version and description from the project's package.json,
 * falling back to defaults when the file is missing or malformed.
 * @private
 */
const loadPackageJson = (): z.infer<typeof PackageJsonSchema> => {
  const pkgPath = join(projectRoot, "package.json");
  if (!existsSync(pkgPath)) {
    return PackageJsonSchema.parse({});
  }
  try {
    const parsed = PackageJsonSchema.safeParse(
      JSON.parse(readFileSync(pkgPath, "utf-8")),
    );
    return parsed.success ? parsed.data : PackageJsonSchema.parse({});
  } catch {
    return PackageJsonSchema.parse({});
  }
};

const pkg = loadPackageJson();

const EnvSchema = z.object({
  NODE_ENV: z.string().default("development"),

  // Logging
  EUTILS_LOG_LEVEL: z
    .enum(["debug", "info", "notice", "warning", "error", "crit"])
    .default("info"),
  LOGS_DIR: z.string().optional(),

  // NCBI E-utilities
  NCBI_TOOL_IDENTIFIER: z.string().min(1).optional(),
  NCBI_ADMIN_EMAIL: z.string().email().optional(),
  NCBI_API_KEY: z.string().min(1).optional(),

  // Tracing
  OTEL_SERVICE_NAME: z.string().optional(),
  OTEL_SERVICE_VERSION: z.string().optional(),
});

const parsedEnv = EnvSchema.safeParse(process.env);

if (!parsedEnv.success && process.stderr.isTTY) {
  console.error(
    "Invalid environment variables:",
    parsedEnv.error.flatten().fieldErrors,
  );
}

const env = parsedEnv.success ? parsedEnv.data : EnvSchema.parse({});

/**
 * Resolves and creates the logs directory. Returns null when the path
 * cannot be used, in which case file logging stays disabled.
 */
const ensureDirectory = (dirPath: string): string | null => {
  const resolvedDirPath = path.isAbsolute(dirPath)
    ? dirPath
    : path.resolve(projectRoot, dirPath);

  try {
    if (!existsSync(resolvedDirPath)) {
      mkdirSync(resolvedDirPath, { recursive: true });
    } else if (!statSync(resolvedDirPath).isDirectory()) {
      return null;
    }
  } catch (err: unknown) {
    if (process.stderr.isTTY) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      console.error(
        `Error preparing logs directory at ${resolvedDirPath}: ${errorMessage}`,
      );
    }
    return null;
  }
  return resolvedDirPath;
};

export type LogLevel = z.infer<typeof EnvSchema>["EUTILS_LOG_LEVEL"];

export const config = Object.freeze({
  pkg,
  environment: env.NODE_ENV,
  logLevel: env.EUTILS_LOG_LEVEL,
  logsPath: env.LOGS_DIR ? ensureDirectory(env.LOGS_DIR) : null,
  ncbiToolIdentifier: env.NCBI_TOOL_IDENTIFIER || `${pkg.name}/${pkg.version}`,
  ncbiAdminEmail: env.NCBI_ADMIN_EMAIL,
  ncbiApiKey: env.NCBI_API_KEY,
  openTelemetry: Object.freeze({
    serviceName: env.OTEL_SERVICE_NAME || pkg.name,
    serviceVersion: env.OTEL_SERVICE_VERSION || pkg.version,
  }),
});
