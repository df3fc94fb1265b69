#!/usr/bin/env node

import { runScrape } from "../jobs/orchestrator";

async function main() {
  try {
    console.log(
      "========================================\n",
      "🚀 Starting conference scrape",
      "\n========================================"
    );
    const reporter = await runScrape();
    process.exit(reporter.getCounts().eventsFailed > 0 ? 1 : 0);
  } catch (err) {
    console.error("💥 Fatal scrape error:", err);
    process.exit(1);
  }
}

void main();
