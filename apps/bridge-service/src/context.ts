import type { BridgeProgram } from "@idbridge/dispatch";
import type { Logger, MetricsRegistry } from "@idbridge/shared";
import type { AppConfig } from "./config.js";

/** What route handlers run against; built once per server. */
export type ServiceContext = {
  config: AppConfig;
  program: BridgeProgram;
  log: Logger;
  metrics: MetricsRegistry;
};
