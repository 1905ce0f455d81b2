/**
 * Seeds the demo family into the Firestore emulator.
 *
 * Usage:
 *   npm run seed -w functions
 *
 * FIRESTORE_EMULATOR_HOST and GCLOUD_PROJECT default to the local emulator
 * and a demo project; set them to target something else.
 */

import * as logger from "firebase-functions/logger";
import { loadAppConfig } from "../src/config/appConfig";
import { createFirestoreGateway } from "../src/config/firebase";
import { handleSeedDemo } from "../src/seed/seedDemo";

process.env.FIRESTORE_EMULATOR_HOST ??= "localhost:8080";
process.env.GCLOUD_PROJECT ??= "demo-little-years";

async function main(): Promise<void> {
  const gateway = createFirestoreGateway(loadAppConfig());
  try {
    const result = await handleSeedDemo(gateway);
    logger.info(`Inserted ${result.inserted.length} documents`, { ids: result.inserted });
  } finally {
    await gateway.close();
  }
}

main().catch((error: unknown) => {
  logger.error("Seeding failed", error);
  process.exitCode = 1;
});
