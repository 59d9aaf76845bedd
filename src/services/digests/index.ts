export { SqliteDigestLog, type DigestLog, type DigestLogEntry } from './log.js';
