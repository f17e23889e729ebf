import fs from 'node:fs';
import admin from 'firebase-admin';
import { z } from 'zod';
import { getEnv } from './env.js';

let app: admin.app.App | undefined;
let firestore: admin.firestore.Firestore | undefined;

const serviceAccountSchema = z
  .object({
    project_id: z.string().min(1),
    client_email: z.string().min(1),
    private_key: z.string().min(1)
  })
  .transform(
    (v): admin.ServiceAccount => ({ projectId: v.project_id, clientEmail: v.client_email, privateKey: v.private_key })
  );

function readServiceAccount(json: string): admin.ServiceAccount {
  return serviceAccountSchema.parse(JSON.parse(json));
}

function initFirebaseApp(): admin.app.App {
  if (app) return app;

  const env = getEnv();

  if (env.FIREBASE_SERVICE_ACCOUNT_JSON) {
    app = admin.initializeApp({
      credential: admin.credential.cert(readServiceAccount(env.FIREBASE_SERVICE_ACCOUNT_JSON))
    });
    return app;
  }

  if (env.FIREBASE_SERVICE_ACCOUNT_PATH) {
    const json = fs.readFileSync(env.FIREBASE_SERVICE_ACCOUNT_PATH, { encoding: 'utf8' });
    app = admin.initializeApp({
      credential: admin.credential.cert(readServiceAccount(json))
    });
    return app;
  }

  // Application default credentials (GOOGLE_APPLICATION_CREDENTIALS)
  app = admin.initializeApp({
    credential: admin.credential.applicationDefault(),
    projectId: env.FIREBASE_PROJECT_ID
  });
  return app;
}

export function getFirestore(): admin.firestore.Firestore {
  if (firestore) return firestore;
  initFirebaseApp();
  firestore = admin.firestore();
  // Optional response fields are left undefined rather than stripped.
  firestore.settings({ ignoreUndefinedProperties: true });
  return firestore;
}
