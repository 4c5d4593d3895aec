/**
 * Basic vnetlab Example
 *
 * This example demonstrates:
 *   - Creating a vpcs device from environment settings
 *   - Attaching a UDP tunnel to its only port
 *   - Starting the process and checking its console
 *   - Stopping and deleting the device
 *
 * Prerequisites:
 *   - vpcs installed (or VPCS_PATH pointing at it)
 *   - a free TCP console port (CONSOLE_PORT, default 4501)
 */

import { setTimeout as sleep } from "node:timers/promises";
import { createLogger } from "@vnetlab/logger";
import {
  TcpConsoleChannel,
  VpcsDevice,
  loadVpcsSettings,
  udpTunnel,
  withConsoleChannel,
  withLogger,
} from "@vnetlab/vpcs";

const CONSOLE_PORT = Number(process.env.CONSOLE_PORT ?? 4501);

async function main() {
  console.log("=== vnetlab Basic Example ===\n");

  const settingsResult = loadVpcsSettings();
  if (settingsResult.isErr()) {
    console.error("Invalid configuration:", settingsResult.error.message);
    process.exit(1);
  }
  const settings = settingsResult.unwrap();
  const logger = createLogger({ component: "vpcs" }, { level: settings.logLevel });

  // Step 1: Create the device
  console.log("1. Creating vpcs device...");
  const createResult = VpcsDevice.create(
    {
      path: settings.vpcsPath,
      workingDir: settings.workingDir,
      host: settings.host,
      console: CONSOLE_PORT,
    },
    withLogger(logger),
    withConsoleChannel(new TcpConsoleChannel({ timeoutMs: settings.consoleTimeoutMs, logger }))
  );

  if (createResult.isErr()) {
    console.error("Failed to create device:", createResult.error.message);
    process.exit(1);
  }

  const device = createResult.unwrap();
  console.log(`   Device: ${device.name} (id ${device.id})`);
  console.log(`   Working directory: ${device.workingDir}`);

  // Step 2: Bind port 0 to a UDP tunnel
  console.log("\n2. Binding port 0...");
  const bindResult = device.addPortBinding(0, 0, udpTunnel(20001, "127.0.0.1", 30001));
  if (bindResult.isErr()) {
    console.error("Failed to bind:", bindResult.error.message);
    await device.delete();
    process.exit(1);
  }
  console.log(`   Command: ${device.commandLine().unwrap()}`);

  // Step 3: Start
  console.log("\n3. Starting vpcs...");
  const startResult = await device.start();
  if (startResult.isErr()) {
    console.error("Failed to start:", startResult.error.message);
    await device.delete();
    process.exit(1);
  }

  // vpcs opens its console shortly after exec
  await sleep(500);
  console.log(`   Running: ${await device.isRunning()}`);
  console.log(`   PID: ${device.getPid()}`);

  // Step 4: Stop and delete
  console.log("\n4. Deleting device...");
  await device.delete();

  const output = await device.readCapturedOutput();
  if (output) {
    console.log(`   Captured output:\n${output.split("\n").map((l) => "      " + l).join("\n")}`);
  }

  console.log("\n=== Example Complete ===");
}

main().catch((err) => {
  console.error("Example failed:", err);
  process.exit(1);
});
