import * as admin from 'firebase-admin';
import { z } from 'zod';
import { createLogger } from './logger';

const log = createLogger('Firestore');

let initialized = false;
export function initAdmin() {
  if (!initialized) {
    if (admin.apps.length === 0) {
      admin.initializeApp();
    }
    initialized = true;
  }
}

export function getFirestoreDb() {
  initAdmin();
  return admin.firestore();
}

/**
 * Reads every document a query returns, keeping the ones that match the
 * schema. Malformed documents are logged and skipped.
 */
export async function readQuery<T>(
  query: admin.firestore.Query,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  label: string
): Promise<T[]> {
  const snap = await query.get();
  const out: T[] = [];
  for (const doc of snap.docs) {
    const parsed = schema.safeParse(doc.data());
    if (parsed.success) {
      out.push(parsed.data);
    } else {
      log.warn('skipping malformed document', { collection: label, id: doc.id, issues: parsed.error.issues.length });
    }
  }
  return out;
}

export function readCollection<T>(
  db: admin.firestore.Firestore,
  collection: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T[]> {
  return readQuery(db.collection(collection), schema, collection);
}

export async function readDocument<T>(
  db: admin.firestore.Firestore,
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T | undefined> {
  const snap = await db.doc(path).get();
  if (!snap.exists) return undefined;
  return schema.parse(snap.data());
}
