#!/usr/bin/env tsx
import { RunTempDBCLI, createCLIConsoleLogger } from "../src/lib/built-in-cli";

// Start a temp PostgreSQL server and keep it until Ctrl+C:
//   npm run temp-db -- start --db myapp_test --verbosity 2
RunTempDBCLI({
  logger: createCLIConsoleLogger(),
}).catch(() => {
  // RunTempDBCLI already logged the error
  process.exit(1);
});
