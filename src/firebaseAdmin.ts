import admin from "firebase-admin";
import { logWarn } from "./logger";

// Idempotent firebase-admin initialization.
// Expects credentials via GOOGLE_APPLICATION_CREDENTIALS or FIREBASE_SERVICE_ACCOUNT.
// Safe to import without credentials (firestore will be null).

let app: admin.app.App | null = null;
let firestoreInstance: admin.firestore.Firestore | null = null;
let warned = false;

function warnOnce(message: string, err: unknown) {
  if (warned) return;
  logWarn(message, err);
  warned = true;
}

function getCredential(): admin.credential.Credential | undefined {
  const inline = process.env.FIREBASE_SERVICE_ACCOUNT;
  if (!inline) return undefined;
  try {
    const parsed: admin.ServiceAccount = JSON.parse(inline);
    return admin.credential.cert(parsed);
  } catch (err) {
    warnOnce("[firebase-admin] Failed to parse FIREBASE_SERVICE_ACCOUNT JSON", err);
    return undefined;
  }
}

function initApp(): admin.app.App | null {
  if (app) return app;
  try {
    const credential = getCredential();
    app = credential ? admin.initializeApp({ credential }) : admin.initializeApp();
    return app;
  } catch (err) {
    warnOnce("[firebase-admin] init failed; event mirroring disabled", err);
    return null;
  }
}

export function getFirestore(): admin.firestore.Firestore | null {
  if (firestoreInstance) return firestoreInstance;
  const initialized = initApp();
  if (!initialized) return null;
  firestoreInstance = admin.firestore(initialized);
  firestoreInstance.settings({ ignoreUndefinedProperties: true });
  return firestoreInstance;
}
