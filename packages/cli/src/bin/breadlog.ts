#!/usr/bin/env node
import { hideBin } from "yargs/helpers";

import { run } from "../run.js";

const controller = new AbortController();
for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => controller.abort());
}

process.exitCode = await run(hideBin(process.argv), { signal: controller.signal });
