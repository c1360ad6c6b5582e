#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { LanAdapter } from "./adapters/lan.js";
import { LanController } from "./lan/controller.js";
import { createServer } from "./server.js";
import { loadConfig } from "./util/config.js";
import { TokenBucketLimiter } from "./util/limiter.js";
import { createLogger, errorMessage } from "./util/logger.js";

async function main() {
  const config = loadConfig();
  const log = createLogger("lanlight", { debug: config.debug });

  const controller = new LanController({
    ...config.lan,
    log,
    onDiscovered: (device, isNew) => {
      if (isNew) log.info(`discovered ${device.sku} ${device.fingerprint} at ${device.ip}`);
      return true;
    },
    onEvicted: (device) => log.info(`evicted ${device.fingerprint} (last seen at ${device.ip})`),
  });
  for (const ip of config.manualDevices) controller.addToDiscoveryQueue(ip);
  await controller.start();

  const server = createServer({
    adapter: new LanAdapter(controller),
    allowlist: config.allowlist,
    limiter: new TokenBucketLimiter(config.rateRps),
    batchWindowMs: config.batchWindowMs,
    log,
  });
  await server.connect(new StdioServerTransport());
  log.info("lanlight MCP server running (stdio)");

  const shutdown = () => {
    controller.cleanup().then(
      () => process.exit(0),
      (err) => {
        log.error(`shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
