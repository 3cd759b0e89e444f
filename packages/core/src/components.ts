import type { ComponentMap, ProductsConfig } from "./types.js";

export const OTHER_COMPONENT = "other";
export const OTHER_METRICS_BUCKET = "Other";

const ACRONYMS = new Set(["api", "ui", "ux", "doi", "cli", "sdk", "ci", "cd", "db", "im", "ldd", "mcp", "wp", "swg", "i&t"]);

export function buildComponentMap(config: ProductsConfig | null | undefined): ComponentMap {
  const map: ComponentMap = new Map();
  if (!config) {
    return map;
  }

  for (const [productName, productInfo] of Object.entries(config.products)) {
    if (productInfo.ignore) {
      continue;
    }
    for (const repo of productInfo.repositories ?? []) {
      map.set(repo, { productName, productInfo });
    }
  }
  return map;
}

/** Product key for report layout; repositories without a product go to `"other"`. */
export function componentForRepo(map: ComponentMap, repo: string): string {
  return map.get(repo)?.productName ?? OTHER_COMPONENT;
}

/** `cloud-api-gateway` → `Cloud API Gateway`. */
export function formatComponentName(name: string): string {
  return name
    .replace(/-/g, " ")
    .split(/\s+/)
    .filter(Boolean)
    .map((word) => {
      const lower = word.toLowerCase();
      if (ACRONYMS.has(lower)) {
        return word.toUpperCase();
      }
      return lower.charAt(0).toUpperCase() + lower.slice(1);
    })
    .join(" ");
}
