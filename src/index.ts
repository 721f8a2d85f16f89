import { createApp } from "./app";
import { loadConfig } from "./config";
import { GeoLookupResult } from "./models/geo-data";
import { AccessGate } from "./services/access-gate";
import { BlockListStore } from "./services/block-list-store";
import { CountryCatalog } from "./services/country-catalog";
import { createDefaultProviders } from "./services/geo-providers";
import { GeoResolver } from "./services/geo-resolver";
import { LookupCache } from "./services/lookup-cache";

async function main() {
  const config = loadConfig();

  const catalog = await CountryCatalog.load(config.countryDataFile);
  const resolver = new GeoResolver(
    createDefaultProviders({
      lookupTimeoutMs: config.geoLookupTimeoutMs,
      echoTimeoutMs: config.ipEchoTimeoutMs,
      ipInfoToken: config.ipInfoToken,
    }),
    new LookupCache<GeoLookupResult>(config.geoCacheTtlMs)
  );
  // In memory only: the list starts empty and is lost on restart
  const blockList = new BlockListStore();
  const gate = new AccessGate(resolver, blockList, {
    unknownCountryPolicy: config.unknownCountryPolicy,
  });

  const app = createApp({ resolver, blockList, catalog, gate });

  // Start the server
  const server = app.listen(config.port, () => {
    const base = `http://localhost:${config.port}`;
    console.log(`Geo-blocking server is running on port ${config.port}`);
    console.log(`Unknown-country policy: fail-${config.unknownCountryPolicy}`);
    console.log(`API endpoints:`);
    console.log(`- GET  ${base}/api/ip-info`);
    console.log(`- GET  ${base}/api/test-access (geo-blocked)`);
    console.log(`- POST ${base}/api/simulate-vpn`);
    console.log(`- POST ${base}/api/block-countries`);
    console.log(`- POST ${base}/api/validate-blocking`);
    console.log(`- GET  ${base}/health`);
  });

  // Clean shutdown function
  const shutdown = () => {
    console.log("Shutting down gracefully...");
    server.close((err) => {
      if (err) {
        console.error("Error during shutdown:", err);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  // Listen for termination signals to close connections
  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
