/**
 * colonysim
 * Library entry point: graph, roster, engine and map I/O
 */

// Core types
export * from './core/types';

// Simulation
export { ColonyGraph } from './core/colony-graph';
export { AntRoster } from './core/ant-roster';
export { SimulationEngine, DEFAULT_MAX_TICKS } from './core/simulation-engine';
export type { SimulationOptions, SimulationResult } from './core/simulation-engine';
export { MovePool, resolveMove } from './core/move-pool';
export type { Move, MoveRequest, MovePoolOptions } from './core/move-pool';
export { SeededRandom, createRandom, generateSeed, pickIndex } from './core/random';
export type { RandomSource } from './core/random';

// Events
export { EventBus, createEventBus } from './core/event-bus';
export type { EventMap, EventName, EventPayload, EventHandler } from './core/event-bus';

// Maps
export { parseMap, loadMapFile } from './core/map-parser';
export type { ParseOptions } from './core/map-parser';
export { formatMap, formatColony, summarizeMap } from './core/map-format';
export type { MapSummary } from './core/map-format';
export { generateGridMap, gridColonyName } from './core/map-generator';
export type { GridMapOptions } from './core/map-generator';

// Errors
export {
  SimulationError,
  MapParseError,
  InvalidConfigurationError,
  UnknownColonyError,
  describeError,
  exitCodeFor,
} from './core/errors';
export type { SimulationErrorKind } from './core/errors';

// Configuration
export { ConfigLoader, loadConfig, getConfig, setConfig, resetConfig } from './core/config';
export type { ConfigLoaderOptions, SettingsFile } from './core/config';

// Infrastructure
export { Logger, ScopedLogger, getLogger, initLogger, closeLogger } from './infra/logger';
export type { LoggerConfig, LogContext, InitLoggerOptions } from './infra/logger';
