import { createApp } from "./app";
import { auditLog } from "./audit";
import { loadConfig } from "./config";
import { loadSeed } from "./seed";
import { ActivityStore } from "./store";

const config = loadConfig();
const store = new ActivityStore(loadSeed(config.seedPath));
const app = createApp({ store, config });

const server = app.listen(config.port, config.host, () => {
  auditLog(undefined, "listening", { host: config.host, port: config.port, activities: store.size() });
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    auditLog(undefined, "shutdown", { signal });
    server.close((error) => {
      if (error) {
        console.error("Activities API shutdown error", error);
        process.exitCode = 1;
      }
    });
  });
}
