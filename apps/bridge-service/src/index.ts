import net from "node:net";
import { createBridgeProgram } from "./bridge.js";
import { getConfig } from "./config.js";
import { log } from "./log.js";
import { buildServer } from "./server.js";

const isPrivateBindAddress = (value: string) => {
  const trimmed = value.trim().toLowerCase();
  if (!trimmed || trimmed === "0.0.0.0" || trimmed === "::") return false;
  if (trimmed === "localhost" || trimmed === "::1") return true;
  const mapped = trimmed.startsWith("::ffff:") ? trimmed.slice(7) : trimmed;
  const ipType = net.isIP(mapped);
  if (ipType === 4) {
    const [a, b] = mapped.split(".").map((part) => Number(part));
    if (a === 10 || a === 127) return true;
    if (a === 192 && b === 168) return true;
    if (a === 172 && b >= 16 && b <= 31) return true;
    return false;
  }
  if (ipType === 6) {
    return trimmed.startsWith("fc") || trimmed.startsWith("fd");
  }
  return false;
};

const config = getConfig();

const requireEnv = (names: string[]) => {
  const missing = names.filter(
    (name) => !process.env[name] || String(process.env[name]).trim() === ""
  );
  if (missing.length) {
    throw new Error(`missing_required_envs:${missing.join(",")}`);
  }
};

if (config.NODE_ENV === "production") {
  requireEnv([
    "DATABASE_URL",
    "SERVICE_JWT_SECRET",
    "TRUSTED_EMITTER_ADDRESS",
    "HEDERA_OPERATOR_ID",
    "HEDERA_OPERATOR_PRIVATE_KEY",
    "HEDERA_TOKEN_ID",
    "HEDERA_REPLY_TOPIC_ID"
  ]);
  if (!isPrivateBindAddress(config.SERVICE_BIND_ADDRESS)) {
    throw new Error("refusing_to_bind_publicly_in_production");
  }
}

const program = await createBridgeProgram(config, log);
const app = buildServer({ config, program, log });

app
  .listen({ port: config.PORT, host: config.SERVICE_BIND_ADDRESS })
  .then((address) => {
    log.info("listening", { address, store: config.STORE_DRIVER });
  })
  .catch((error) => {
    log.error("failed to start", { error });
    process.exit(1);
  });
