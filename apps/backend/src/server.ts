import { loadAdoptionRecords, isLoadError } from "@core";
import { createApp } from "./app";
import { ConfigError, loadConfig } from "./config";

function main(): void {
  const config = loadConfig();
  const recordSet = loadAdoptionRecords(config.dataPath);
  const app = createApp({ recordSet, config });

  app.listen(config.port, () => {
    console.log(`[Server] Shelter forecast API running on port ${config.port}`);
    console.log(`[Server] Serving ${recordSet.records.length} records from ${recordSet.source}`);
  });
}

try {
  main();
} catch (error: unknown) {
  if (error instanceof ConfigError || isLoadError(error)) {
    console.error(`[Server] Startup failed: ${error.message}`);
    process.exitCode = 1;
  } else {
    throw error;
  }
}
