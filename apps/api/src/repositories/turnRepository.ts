import admin from 'firebase-admin';
import { getFirestore } from '../firebase.js';
import type { CompositeResponse } from '../types.js';

export interface TurnArchive {
  recordTurn(response: CompositeResponse): Promise<void>;
}

/**
 * Archives each finalized turn under `sessions/{sessionId}/turns/{turn}` and
 * keeps a summary on the session document.
 */
export function createFirestoreTurnArchive(): TurnArchive {
  return {
    async recordTurn(response) {
      const db = getFirestore();
      const now = admin.firestore.Timestamp.now();

      const sessionRef = db.collection('sessions').doc(response.sessionId);
      const turnRef = sessionRef.collection('turns').doc(String(response.turn));
      const batch = db.batch();

      batch.set(
        sessionRef,
        {
          lastTurn: response.turn,
          lastKind: response.kind,
          turnCount: admin.firestore.FieldValue.increment(1),
          updatedAt: now
        },
        { merge: true }
      );

      batch.set(turnRef, {
        turn: response.turn,
        kind: response.kind,
        summary: response.summary,
        totalFound: response.totalFound,
        properties: response.properties,
        map: response.map,
        commentary: response.commentary,
        text: response.text,
        createdAt: response.createdAt,
        archivedAt: now
      });

      await batch.commit();
    }
  };
}
