import { config, isEmailConfigured, isSmsConfigured, isTelegramConfigured } from "./config.js";
import { log } from "./logger.js";
import { TargetRegistry } from "./registry.js";
import { MonitorLoop } from "./scheduler.js";
import { createApp } from "./server.js";
import { ChannelNotifier, configuredChannels } from "./services/notifier.js";
import { createPriceSource } from "./services/price-source.js";

console.log("Dip Entry Alerts");
console.log("================");
console.log(`Price source: ${config.priceSource}`);
console.log(`Interval:     ${config.checkIntervalSeconds}s`);
console.log(`Cooldown:     ${config.errorCooldownSeconds}s after errors`);
console.log(`Telegram:     ${isTelegramConfigured() ? "configured" : "not configured"}`);
console.log(`Email:        ${isEmailConfigured() ? "configured" : "not configured"}`);
console.log(`SMS:          ${isSmsConfigured() ? "configured" : "not configured"}`);
console.log();

const registry = new TargetRegistry();
const priceSource = await createPriceSource(config);
const monitor = new MonitorLoop(registry, priceSource, new ChannelNotifier(configuredChannels()), {
  intervalMs: config.checkIntervalSeconds * 1000,
  errorCooldownMs: config.errorCooldownSeconds * 1000,
});

const server = createApp({ registry, priceSource, monitor }).listen(config.port, () => {
  log.info(`API listening on http://localhost:${config.port}`);
  monitor.start();
});

function shutdown(signal: string): void {
  log.info(`${signal} received, shutting down`);
  monitor.stop();
  server.close();
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
