import { Command } from "commander";
import { AlertsClient, parseTargetPrice } from "./client.js";
import { config } from "./config.js";
import { errorMessage } from "./errors.js";
import { formatSignedPercent, formatUsd } from "./services/message-format.js";

const STATUS_ICONS = { hit: "🚨", watching: "👀", unknown: "❓" } as const;

const program = new Command();

program
  .name("dip-alerts")
  .description("Set price levels and get alerted once when price drops to them")
  .requiredOption("-u, --user <id>", "User id to operate as")
  .option("-s, --server <url>", "Alerts server base URL", config.serverUrl);

program
  .command("add <symbol> <price>")
  .description("Add or replace the target level for a symbol")
  .action(async (symbol: string, rawPrice: string) => {
    const targetPrice = parseTargetPrice(rawPrice);
    if (targetPrice == null) {
      fail("Error: price must be a positive number");
    }

    const res = await client().add(symbol, targetPrice);
    const { level } = res;

    if (res.warning) {
      console.warn(`Warning: target ${formatUsd(level.targetPrice)} is at or above current price ${formatUsd(res.currentPrice)}`);
    }
    if (res.isUpdate && res.previousPrice != null) {
      console.log(`Level updated: ${level.symbol}`);
      console.log(`  Old target: ${formatUsd(res.previousPrice)}`);
      console.log(`  New target: ${formatUsd(level.targetPrice)}`);
    } else {
      console.log(`Level added: ${level.symbol}`);
      console.log(`  Target:   ${formatUsd(level.targetPrice)}`);
    }
    console.log(`  Current:  ${formatUsd(res.currentPrice)}`);
    console.log(`  Distance: ${formatSignedPercent(res.distancePercent)}`);
  });

program
  .command("list")
  .description("List your active target levels")
  .action(async () => {
    const levels = await client().list();
    if (levels.length === 0) {
      console.log("No active levels. Use 'add' to create one.");
      return;
    }

    console.log(`\n   ${"Symbol".padEnd(14)} ${"Target".padEnd(18)} ${"Current".padEnd(18)} ${"Distance".padEnd(10)} Added`);
    console.log("-".repeat(80));

    for (const l of levels) {
      const current = l.currentPrice != null ? formatUsd(l.currentPrice) : "N/A";
      const distance = l.distancePercent != null ? formatSignedPercent(l.distancePercent) : "N/A";
      console.log(
        `${STATUS_ICONS[l.status]} ${l.symbol.padEnd(14)} ${formatUsd(l.targetPrice).padEnd(18)} ${current.padEnd(18)} ${distance.padEnd(10)} ${new Date(l.createdAt).toLocaleString()}`,
      );
    }
    console.log();
  });

program
  .command("remove <symbol>")
  .description("Stop monitoring a symbol")
  .action(async (symbol: string) => {
    const removed = await client().remove(symbol);
    console.log(`Stopped monitoring ${removed.symbol} @ ${formatUsd(removed.targetPrice)}`);
  });

function client(): AlertsClient {
  const { user, server } = program.opts<{ user: string; server: string }>();
  return new AlertsClient(server, user);
}

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

try {
  await program.parseAsync();
} catch (err) {
  fail(`Error: ${errorMessage(err)}`);
}
