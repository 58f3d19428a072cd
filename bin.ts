#!/usr/bin/env tsx
import main from "./src/index.ts";

main()
  .then((exitCode) => process.exit(exitCode))
  .catch((error) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
