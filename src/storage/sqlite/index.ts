export { SQLiteClient, type SQLiteClientConfig } from './client.js';
export { SQLiteKnowledgeStore, type SQLiteStoreOptions } from './storage.js';
export { SCHEMA, SCHEMA_VERSION } from './schema.js';
