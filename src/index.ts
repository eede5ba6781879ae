#!/usr/bin/env node
import { runCli } from "./adapters/cli/main";

async function bootstrap() {
  process.exitCode = await runCli();
}

bootstrap().catch((err) => {
  console.error("Error fatal:", err);
  process.exit(1);
});
