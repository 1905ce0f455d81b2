import { getApps, initializeApp } from "firebase-admin/app";
import { getFirestore } from "firebase-admin/firestore";
import { FirestoreGateway } from "../storage/firestoreGateway";
import type { AppConfig } from "./appConfig";

export function createFirestoreGateway(config: Pick<AppConfig, "databaseId">): FirestoreGateway {
  const app = getApps()[0] ?? initializeApp();
  const firestore = config.databaseId ? getFirestore(app, config.databaseId) : getFirestore(app);
  firestore.settings({ ignoreUndefinedProperties: true });
  return new FirestoreGateway(firestore);
}
