import prod from "./prod.config";
import dev from "./dev.config";
import type { HttpConfig } from "./types";

function getConfig(): HttpConfig {
  return process.env.ENVIRONMENT === "prod" ? prod : dev;
}

export default getConfig();
export type { HttpConfig };
export * from "./tracking";
