import { createLogger } from "@idbridge/shared";

export const log = createLogger("bridge-service");
