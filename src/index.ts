import "dotenv/config";
import { loadSettings } from "./config/settings.js";
import { createApp } from "./lib/app.js";
import { createServer } from "./server.js";

const main = async (): Promise<void> => {
  const settings = loadSettings();
  const ctx = createApp(settings, { defaultMetrics: true });
  const server = createServer(ctx);

  if (!settings.worker) {
    console.warn("WORKER is not set, collect requests will be refused");
  }

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.log(`${signal} received, waiting for running jobs to finish...`);
    await server.close();
    await ctx.close();
    console.log("Connections closed");
  };

  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((err) => {
      console.error("Shutdown failed:", err);
      process.exitCode = 1;
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  await server.listen({ port: settings.port, host: "0.0.0.0" });
  console.log(`Collector listening on :${settings.port}${settings.routePrefix || "/"} (worker: ${settings.worker ?? "none"})`);
};

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
