export { sanitizeNode, sanitizeNodeEffect, type NodeOptions } from './sanitize.ts';
export {
  joinNodes,
  sanitizeNodes,
  sanitizePath,
  sanitizePathEffect,
  splitPath,
  type Flavor,
  type NodesOptions,
  type PathOptions,
  type WarnSink,
} from './path.ts';
export {
  ContradictionError,
  LengthExceededError,
  UnsupportedPathError,
  isPathSanitizeError,
  type PathSanitizeError,
} from './errors.ts';
export { MAX_NODE_LENGTH } from './length.ts';
export { loadConfig, ConfigError, type SanitizeConfig } from './config.ts';
