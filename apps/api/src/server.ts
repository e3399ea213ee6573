import { buildServer } from "./app.js";
import { loadConfig } from "./config.js";
import { registerShutdown } from "./shutdown.js";

const config = loadConfig();
const server = await buildServer({ config });
registerShutdown(server, { timeoutMs: config.shutdownTimeoutMs });

try {
  await server.listen({ port: config.port, host: config.host });
  server.log.info({ policy: server.admission.currentLimit(), sweepIntervalMs: config.sweepIntervalMs }, "Admission control active");
} catch (err) {
  server.log.error({ err }, "Failed to start server");
  process.exit(1);
}
