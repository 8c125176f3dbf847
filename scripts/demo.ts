import { executeDetection } from "../lib/analysis";
import { loadDetectionConfig } from "../lib/config";
import { createDemoStore, DEMO_COMPANY_NAME, DEMO_TENANT_ID } from "../lib/demo/demoData";
import { formatMoney } from "../lib/analysis/format";

async function main() {
  const config = loadDetectionConfig();
  const store = createDemoStore();

  console.log(`Running detection for ${DEMO_COMPANY_NAME} (tenant ${DEMO_TENANT_ID})`);
  const summary = await executeDetection({ store, config }, DEMO_TENANT_ID);

  const anomalies = await store.listAnomalies(DEMO_TENANT_ID);
  for (const a of anomalies) {
    console.log(
      `- [${a.severity}] ${a.kind} ${formatMoney(a.amount)}` +
        `${a.shouldAlert ? " (alert)" : ""}: ${a.description}`
    );
  }
  console.log(
    `${summary.newAnomalyCount} new anomalies from ${summary.baselinesComputed} vendor baselines`
  );
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
