/**
 * Console rendering of budget alerts.
 */

import type { Alert } from "../budget/types";

const MARKERS: Record<Alert["severity"], string> = { high: "!!", medium: " !" };

/** Print alerts to console, most severe first as given. */
export function printAlerts(alerts: Alert[]): void {
  if (alerts.length === 0) return;
  console.log("\n--- Alerts ---\n");
  for (const alert of alerts) {
    console.log(`  ${MARKERS[alert.severity]} [${alert.category}] ${alert.message}`);
  }
}
