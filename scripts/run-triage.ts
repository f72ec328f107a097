#!/usr/bin/env npx tsx
/**
 * Gene-Pair Triage Runner
 *
 * Usage:
 *   npx tsx scripts/run-triage.ts run --input pairs.csv --output triage_results.xlsx
 *   npx tsx scripts/run-triage.ts run --input pairs.xlsx --profile conservative --disable-ai
 *   npx tsx scripts/run-triage.ts dump-profiles ./profiles
 *
 * Environment:
 *   TRIAGE_AI_API_KEY - API key for narrative generation (optional)
 *   TRIAGE_CONFIG_ENV_OVERRIDES - on | off | allowlist:VAR1,VAR2
 *   TRIAGE_DEBUG_LOG_FILE - "true" to also append logs to debug-triage.log
 */

import { main } from "../src/lib/triage-cli";

main(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
