import { readFile } from "node:fs/promises";
import path from "node:path";
import type { Logger, ProductsConfig } from "@issueroll/core";
import { parse } from "yaml";
import { z } from "zod";

export const CONFIG_FILE_NAME = ".issueroll.yml";
export const DEFAULT_PRODUCTS_FILE = "conf/products.yaml";

const repoNamePattern = /^[^/\s]+$/;

export const stateFilterSchema = z.enum(["open", "closed", "all"]);
export const reportKindSchema = z.enum(["planning", "known_bugs"]);

const reportSchema = z
  .object({
    type: reportKindSchema.default("planning"),
    state: stateFilterSchema.default("all"),
    groupByComponent: z.boolean().default(false),
    showParentChild: z.boolean().default(false),
    includeExternalParents: z.boolean().default(false),
    productsFile: z.string().min(1).default(DEFAULT_PRODUCTS_FILE),
    title: z.string().min(1).optional()
  })
  .default({});

export const issuerollConfigSchema = z.object({
  org: z.string().min(1).optional(),
  repos: z.array(z.string().regex(repoNamePattern, "Repository must be a name without owner")).default([]),
  providers: z
    .object({
      github: z
        .object({
          tokenEnv: z.string().min(1).default("GITHUB_TOKEN")
        })
        .default({})
    })
    .default({}),
  report: reportSchema
});

export type IssuerollConfig = z.infer<typeof issuerollConfigSchema>;

const productInfoSchema = z
  .object({
    repositories: z.array(z.string()).optional(),
    ignore: z.boolean().optional(),
    description: z.string().optional()
  })
  .passthrough();

export const productsConfigSchema = z.object({
  products: z.record(productInfoSchema)
});

export function createDefaultConfig(): IssuerollConfig {
  return issuerollConfigSchema.parse({});
}

export function parseConfigString(raw: string): IssuerollConfig {
  const doc: unknown = parse(raw) ?? {};
  return issuerollConfigSchema.parse(doc);
}

export async function loadConfig(cwd: string, fileName = CONFIG_FILE_NAME): Promise<IssuerollConfig> {
  const configPath = path.join(cwd, fileName);
  const raw = await readFile(configPath, "utf-8");
  return parseConfigString(raw);
}

export function parseProductsString(raw: string): ProductsConfig {
  const doc: unknown = parse(raw) ?? {};
  return productsConfigSchema.parse(doc);
}

/**
 * Reads the product → repositories mapping. A missing or invalid file yields
 * null and a warning; callers then report without component grouping.
 */
export async function loadComponentConfig(filePath: string, logger: Logger): Promise<ProductsConfig | null> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (error: unknown) {
    logger.warn(`Cannot read products file ${filePath}: ${formatConfigError(error)}`);
    return null;
  }

  try {
    const config = parseProductsString(raw);
    logger.debug(`Loaded ${Object.keys(config.products).length} products from ${filePath}`);
    return config;
  } catch (error: unknown) {
    logger.warn(`Invalid products file ${filePath}: ${formatConfigError(error)}`);
    return null;
  }
}

export function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export function formatConfigError(error: unknown): string {
  if (error instanceof z.ZodError) {
    return error.issues
      .map((issue) => {
        const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
        return `${where}: ${issue.message}`;
      })
      .join("\n");
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
