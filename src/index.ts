import "dotenv/config";
import { loadConfig } from "./config.ts";
import { createDiscoveryFetcher } from "./discovery.ts";
import { DeviceManager } from "./device-manager.ts";
import { CommandDispatcher } from "./dispatcher.ts";
import { createMcpServer } from "./mcp-server.ts";
import { describeError, NoValidDevicesError } from "./errors.ts";
import { consoleDiagnostics } from "./types.ts";

// ============================================
// START
// ============================================

async function main() {
  const config = loadConfig();

  const deviceManager = new DeviceManager({
    discover: createDiscoveryFetcher({ url: config.discoveryUrl, timeoutMs: config.timeoutMs }),
    diagnostics: consoleDiagnostics,
    client: { timeoutMs: config.timeoutMs, retryDelayMs: config.retryDelayMs },
  });
  const registry = await deviceManager.load(config.devices);
  const dispatcher = new CommandDispatcher(deviceManager);

  // Non-fatal: a device may still be booting
  for (const { profile, client } of registry.listAll()) {
    if (await client.probe()) {
      consoleDiagnostics.info(`Device '${profile.alias}': ${profile.ip} (${profile.family}, ${profile.resolution}px)`);
    } else {
      consoleDiagnostics.warn(`Device '${profile.alias}' at ${profile.ip} did not answer the connection check`);
    }
  }

  const createServer = () => createMcpServer(deviceManager, dispatcher, config.defaults);

  if (process.argv.includes("--stdio")) {
    const { startStdio } = await import("./stdio.ts");
    await startStdio(createServer());
  } else {
    const { startHttp } = await import("./http.ts");
    await startHttp(createServer, deviceManager, dispatcher, config.defaults, config.port);
  }
}

main().catch((e: unknown) => {
  console.error(`[pixoo-gateway] Startup failed: ${describeError(e)}`);
  if (e instanceof NoValidDevicesError) {
    for (const failure of e.failures) console.error(`  ${failure.message}`);
  }
  process.exit(1);
});
