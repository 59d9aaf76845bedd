import { openDatabase, type DatabaseHandle } from '../../src/db/index.js';

/** Private in-memory database with the schema applied */
export function openTestDatabase(): DatabaseHandle {
  return openDatabase(':memory:');
}
