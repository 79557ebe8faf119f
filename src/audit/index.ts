export {
  ClassificationLogger,
  ClassificationLogEntrySchema,
  type ClassificationLogEntry,
} from './classification-logger.js';
