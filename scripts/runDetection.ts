import { createDetectionRunner } from "../lib/analysis";
import { loadDetectionConfig } from "../lib/config";
import { connectDetectionStore, redactDatabaseUrl } from "../lib/db/client";

async function main() {
  const tenantIds = process.argv.slice(2);
  if (tenantIds.length === 0) {
    console.error("Usage: npm run detect -- <tenantId> [tenantId...]");
    process.exit(1);
  }

  const databaseUrl = process.env.DATABASE_URL;
  console.log("DATABASE_URL (redacted):", redactDatabaseUrl(databaseUrl));
  if (!databaseUrl) {
    console.error("ERROR: DATABASE_URL is not set");
    process.exit(1);
  }

  const config = loadDetectionConfig();
  console.log("Detection config:", config);

  const { store, close } = connectDetectionStore(databaseUrl);
  const runner = createDetectionRunner({ store, config });

  try {
    // Different tenants share nothing, so they can run side by side
    const results = await Promise.allSettled(tenantIds.map((id) => runner.run(id)));

    let failed = 0;
    results.forEach((result, i) => {
      if (result.status === "fulfilled") {
        const s = result.value;
        console.log(
          `Tenant ${s.tenantId}: ${s.newAnomalyCount} new anomalies ` +
            `(${s.baselinesComputed} baselines, ${s.durationMs}ms)`
        );
      } else {
        failed++;
        console.error(`Tenant ${tenantIds[i]}: detection failed:`, result.reason);
      }
    });

    if (failed > 0) process.exitCode = 1;
  } finally {
    await close();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
