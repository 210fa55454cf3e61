/**
 * Polystore - Document Store Example
 *
 * This example demonstrates:
 * - Building a store from DOCUMENT_STORE_* variables (or an in-memory default)
 * - Insert, find, update and delete inside one connection scope
 * - Bulk operations and health checks
 *
 * Usage:
 *   npx tsx document-store.ts
 *   DOCUMENT_STORE_FRAMEWORK=mongodb DOCUMENT_STORE_CONNECTION__HOST=localhost \
 *     DOCUMENT_STORE_CONNECTION__DATABASE=demo npx tsx document-store.ts
 */

import { DocumentStore, createDocumentStoreRegistry, isStoreError } from '@polystore/core';
import { registerMongoDocumentStore } from '@polystore/storage-mongodb';

const registry = createDocumentStoreRegistry();
registerMongoDocumentStore(registry);

function createStore(): DocumentStore {
  if (process.env.DOCUMENT_STORE_FRAMEWORK) {
    return DocumentStore.fromEnv({ registry, logLevel: 'debug' });
  }
  return new DocumentStore({ framework: 'memory', connection: { host: 'localhost' } }, { registry, logLevel: 'debug' });
}

async function main() {
  const store = createStore();
  console.log(`Document store: ${store.framework} (${store.config.connectionUri})\n`);

  const health = await store.healthCheck();
  console.log(`Health: ${health.status} in ${health.latency}ms\n`);

  await store.withConnection(async (db) => {
    const id = await db.insert('users', { name: 'Ada', team: 'engines', score: 10 });
    console.log(`Inserted user ${id}`);

    const ids = await db.bulkInsert('users', [
      { name: 'Grace', team: 'compilers', score: 7 },
      { name: 'Edsger', team: 'compilers', score: 4 },
    ]);
    console.log(`Inserted ${ids.length} more users`);

    const updated = await db.bulkUpdate('users', { team: 'compilers' }, [{ $inc: { score: 1 } }, { active: true }]);
    console.log(`Bulk update touched ${updated} documents`);

    const compilers = await db.find('users', { team: 'compilers' }, { projection: ['name', 'score'] });
    console.log('Compiler team:', compilers);

    const removed = await db.delete('users', { score: { $lt: 6 } });
    console.log(`Removed ${removed} low scorers`);

    const cleared = await db.bulkDelete('users', [{ team: 'engines' }, { team: 'compilers' }]);
    console.log(`Cleared ${cleared} remaining users`);
  });
}

main().catch((error) => {
  if (isStoreError(error)) {
    console.error(`Store error [${error.code}]:`, error.message);
  } else {
    console.error('Fatal error:', error);
  }
  process.exit(1);
});
