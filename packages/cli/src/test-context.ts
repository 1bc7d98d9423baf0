/**
 * Command context over the shop fixture catalog, for tests
 */

import { fileURLToPath } from "node:url";
import { resolveConfig } from "./config.js";
import { createCommandContext, type CommandContext } from "./commands/context.js";
import type { ClrcallConfig } from "./types.js";

export const SHOP_CATALOG = fileURLToPath(
  new URL("../testcases/shop-catalog.yaml", import.meta.url)
);

export const createShopContext = async (
  config: ClrcallConfig = {},
  log?: (message: string) => void
): Promise<CommandContext> => {
  const resolved = resolveConfig(
    { ...config, catalogs: [SHOP_CATALOG, ...(config.catalogs ?? [])] },
    {}
  );
  const context = await createCommandContext(resolved, log);
  if (!context.ok) throw new Error(context.error);
  return context.value;
};
