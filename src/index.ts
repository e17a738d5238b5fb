export { PathIdentifier, type MatrixComponents } from './domain/value-objects/PathIdentifier.js';
export { PathRational } from './domain/value-objects/PathRational.js';
export { comparePaths } from './domain/value-objects/PathOrder.js';
export { parsePathText, formatPathText, PATH_SEPARATOR } from './domain/value-objects/PathText.js';
export { PATH_OFFSET, MAX_PATH_ELEMENT } from './domain/value-objects/PathOffset.js';
export { U64_MAX } from './domain/value-objects/U64.js';
export {
  toPathElement,
  toPathVector,
  type PathElement,
  type PathVector,
} from './domain/value-objects/PathElement.js';
export {
  PathFracError,
  PathParseError,
  InvalidPathElementError,
  InvalidLabelError,
  PathNotFoundError,
  PathOverflowError,
  MalformedPathIdentifierError,
  type ErrorClassification,
} from './domain/errors/DomainErrors.js';
export type { StoredPath } from './domain/entities/StoredPath.js';
export type { PathStorePort } from './domain/ports/PathStorePort.js';
export { CodecUseCase } from './application/CodecUseCase.js';
export { RegistryUseCase } from './application/RegistryUseCase.js';
export type { PathDescription } from './application/dto/PathDescription.js';
export type { PathComparison } from './application/dto/PathComparison.js';
export type { StoredPathView } from './application/dto/StoredPathView.js';
export { DatabaseManager } from './infrastructure/sqlite/DatabaseManager.js';
export { SqlitePathStore } from './infrastructure/sqlite/SqlitePathStore.js';
export { loadConfig, type PathFracConfig, type PartialConfig } from './config/ConfigLoader.js';
export { Logger, type LogLevel } from './shared/Logger.js';
