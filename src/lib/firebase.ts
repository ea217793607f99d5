// -----------------------------------------------------------------------------
// Firebase Admin SDK initialization
// - Lazily creates one Firestore instance (`getDb`) for the metadata writer
// - Chooses credentials from GOOGLE_APPLICATION_CREDENTIALS (if the file exists),
//   otherwise falls back to Application Default Credentials (ADC).
// -----------------------------------------------------------------------------

import { initializeApp, applicationDefault, cert } from "firebase-admin/app";
import { getFirestore, type Firestore } from "firebase-admin/firestore";
import fs from "node:fs";

let db: Firestore | null = null;

export function getDb(projectId?: string): Firestore {
  if (db) return db;

  const credentialsPath = process.env.GOOGLE_APPLICATION_CREDENTIALS;
  const credential =
    credentialsPath && fs.existsSync(credentialsPath)
      ? cert(credentialsPath)
      : applicationDefault();

  initializeApp({ credential, projectId });
  db = getFirestore();
  return db;
}
