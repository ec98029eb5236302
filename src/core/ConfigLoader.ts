import { promises as fs } from "fs";
import path from "path";
import { z } from "zod";

import type { IAppConfig } from "../types";

const SourceSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("sheet"),
    spreadsheetId: z.string().min(1),
    sheetName: z.string().min(1),
  }),
  z.object({
    type: z.literal("file"),
    path: z.string().min(1),
    sheetName: z.string().min(1).optional(),
  }),
]);

const ConfigSchema = z.object({
  meta: z.object({
    appName: z.string().min(1),
    description: z.string().min(1),
  }),
  source: SourceSchema,
  cache: z.object({
    ttlSeconds: z.number().int().nonnegative(),
    dir: z.string().min(1),
  }),
  history: z.object({
    retentionYears: z.number().int().positive(),
  }),
  aggregation: z.object({
    minProportion: z.number().min(0).max(100),
  }),
  allocation: z.object({
    maxItems: z.number().int().positive(),
  }),
  output: z.object({
    dir: z.string().min(1),
    logDir: z.string().min(1),
  }),
});

const formatZodError = (error: z.ZodError): string =>
  error.issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "config";
      return `${location}: ${issue.message}`;
    })
    .join("\n");

/** Lets SPREADSHEET_ID stand in for a sheet id left blank in the file. */
const normalizeConfig = (parsed: unknown, env: NodeJS.ProcessEnv): unknown => {
  if (!parsed || typeof parsed !== "object") {
    return parsed;
  }
  const candidate = parsed as Record<string, unknown>;
  const source = candidate.source;
  if (source && typeof source === "object") {
    const sourceObj = source as Record<string, unknown>;
    const envId = env.SPREADSHEET_ID?.trim();
    if (sourceObj.type === "sheet" && envId) {
      sourceObj.spreadsheetId = envId;
    }
  }
  return candidate;
};

export class ConfigLoader {
  static async loadAppConfig(
    configPath = path.join(process.cwd(), "config", "app.json"),
    env: NodeJS.ProcessEnv = process.env
  ): Promise<IAppConfig> {
    return ConfigLoader.loadFromFile(configPath, env);
  }

  static async loadFromFile(
    filePath: string,
    env: NodeJS.ProcessEnv = process.env
  ): Promise<IAppConfig> {
    const raw = await fs.readFile(filePath, "utf-8");
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Invalid JSON in ${filePath}: ${message}`);
    }

    const result = ConfigSchema.safeParse(normalizeConfig(parsed, env));
    if (!result.success) {
      throw new Error(
        `Config validation failed for ${filePath}:\n${formatZodError(result.error)}`
      );
    }

    return result.data;
  }
}
