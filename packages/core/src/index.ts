/**
 * Canopy Core - a generic ordered tree with shared node handles
 *
 * Nodes are linked by id only. A `Tree` owns an ordered node collection and
 * offers structural queries, removal strategies, subtree extraction and
 * grafting, three traversal orders, an outline renderer and a record codec.
 */

// Tree model
export * from './entities/index.js';

// Records and codec
export * from './schemas/index.js';
export * from './serialization/index.js';

// Errors
export * from './errors/index.js';

// Identifiers
export {
  type IdentifierGenerator,
  SequentialIdGenerator,
  EpochIdGenerator,
  createIdGenerator,
  defaultIdGenerator,
} from './utils/id-generator.js';

// Configuration and logging
export { cfg, configSchema, type AppConfig } from './utils/config.js';
export {
  LoggerFactory,
  createModuleLogger,
  logger,
  logError,
} from './utils/logger.js';
