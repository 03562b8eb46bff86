/**
 * Core Type Definitions
 * Runtime-validated configuration; domain contracts live in @colonysim/types
 */

import { z } from 'zod';
import type { LogLevel, PlacementPolicy } from '@colonysim/types';

export type {
  AgentId,
  AgentPosition,
  ColonyName,
  DestructionEvent,
  Direction,
  LogLevel,
  PlacementPolicy,
  SimulationState,
  TerminationReason,
  TickReport,
  Tunnel,
} from '@colonysim/types';

// ---------------------------------------------------------------------------
// Enumerations
// ---------------------------------------------------------------------------

export const PLACEMENT_POLICIES = ['distinct', 'shared'] as const satisfies readonly PlacementPolicy[];
export const PlacementPolicySchema = z.enum(PLACEMENT_POLICIES);

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[];
export const LogLevelSchema = z.enum(LOG_LEVELS);

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export const ConfigSchema = z.object({
  dataDir: z.string().min(1),
  debug: z.boolean().default(false),
  logLevel: LogLevelSchema.default('info'),
  /** Cap for runs where ants keep circling without ever meeting. */
  maxTicks: z.number().int().positive().default(10_000),
  /** `distinct`: one ant per colony at start. `shared`: ants may start together. */
  placement: PlacementPolicySchema.default('distinct'),
  moveConcurrency: z.number().int().min(1).max(64).default(4),
  moveChunkSize: z.number().int().positive().default(1024),
  /** Fixed seed for reproducible runs; a fresh one is generated when absent. */
  seed: z.string().min(1).optional(),
});

export type Config = z.infer<typeof ConfigSchema>;
