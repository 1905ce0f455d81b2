import { setGlobalOptions } from "firebase-functions/v2";
import { onRequest } from "firebase-functions/v2/https";
import { loadAppConfig } from "./config/appConfig";
import { createFirestoreGateway } from "./config/firebase";
import { createApiHandler } from "./http/router";

const config = loadAppConfig();

setGlobalOptions({ region: config.region, maxInstances: config.maxInstances });

const gateway = createFirestoreGateway(config);

export const api = onRequest({ cors: true }, createApiHandler({ gateway }));
