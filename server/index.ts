import { loadConfig } from "./config";
import { log } from "./log";
import { SerialConnection } from "./serial";
import { ProtocolDriver } from "./protocol";
import { FilePatternStorage } from "./storage";
import { ExecutionController } from "./controller";

/**
 * Connect to the table, run one pattern, disconnect.
 * Usage: tsx server/index.ts <pattern-file>
 */
async function main() {
  const config = loadConfig();
  const patterns = new FilePatternStorage(config.patternDir);
  const patternName = process.argv[2];

  if (!patternName) {
    const available = await patterns.listPatterns();
    log(`No pattern given. Patterns in ${config.patternDir}: ${available.join(", ") || "(none)"}`, "main");
    return;
  }

  if (!config.connection.path) {
    throw new Error("SERIAL_PORT is not set");
  }

  const connection = new SerialConnection({
    openTimeoutMs: config.connection.openTimeoutMs,
    settleMs: config.connection.settleMs,
  });
  const driver = new ProtocolDriver(connection, config.motion);
  const controller = new ExecutionController(driver, patterns, config.motion);

  controller.setMessageCallback((entry) => {
    if (entry.type === "error") log(entry.message, "main");
  });
  controller.setStateCallback((status) => {
    if (status.totalBatches > 0) {
      log(`${status.state} ${status.batchesSent}/${status.totalBatches} batches`, "main");
    }
  });

  await connection.connect(config.connection.path, config.connection.baudRate);

  try {
    if (config.homeBeforeRun) {
      await controller.sendCommand("HOME");
    }

    const handle = await controller.run(patternName);
    const onInterrupt = () => {
      controller.stop();
    };
    process.once("SIGINT", onInterrupt);

    const outcome = await handle.completion;
    process.off("SIGINT", onInterrupt);

    if (outcome.status === "failed") {
      log(`Run failed: ${outcome.error.message}`, "main");
      process.exitCode = 1;
    } else {
      log(`Run ${outcome.status}: ${outcome.batchesSent} batches, ${outcome.pointsSent} points`, "main");
    }
  } finally {
    driver.dispose();
    await connection.disconnect();
  }
}

// Run the application
main().catch((err) => {
  console.error("Failed to run pattern:", err);
  process.exit(1);
});
