import { createCliProgram } from "./cli";
import { RepodataError } from "./repodata/errors";
import { logger } from "./utils/logger";

async function main(): Promise<void> {
  await createCliProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  if (error instanceof RepodataError) {
    logger.error(error.message);
  } else {
    logger.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
  }
  process.exitCode = 1;
});
