/**
 * Execution Engine Types
 *
 * Service-level contracts, timeouts and logger factory shared by the
 * coordinator, the saga and the engine facade. Domain records live in
 * @xarb/types.
 */

import type {
  BalanceConfig,
  BridgeSelectionConfig,
  CrossChainConfig,
  FilterConfig,
  GasTierConfig,
  RiskConfig,
} from '@xarb/config';
import { createPinoLogger } from '@xarb/core';
import type { ILogger } from '@xarb/core';
import type {
  BridgeProvider,
  ChainClient,
  DexRouter,
  ExecutionRecord,
  ExecutionResult,
  FilterVerdict,
  OpportunityScanner,
  PriceFeed,
  StrandedFundsReport,
  WalletKeyring,
} from '@xarb/types';

// =============================================================================
// Logger (for DI)
// =============================================================================

export type { ILogger };

/**
 * Create a service logger with the specified name.
 *
 * @example
 * const logger = createServiceLogger('bridge-selector');
 * logger.info('Bridge selected', { bridge: 'across' });
 */
export function createServiceLogger(name: string): ILogger {
  return createPinoLogger(name);
}

let typesLogger: ILogger | null = null;
function getTypesLogger(): ILogger {
  if (!typesLogger) {
    typesLogger = createServiceLogger('execution-engine-types');
  }
  return typesLogger;
}

// =============================================================================
// Timeouts
// =============================================================================

/**
 * Parse and validate a millisecond timeout from the environment.
 * Non-numeric values fall back to the default; out-of-range values clamp.
 */
export function parseEnvTimeout(
  envVar: string,
  defaultValue: number,
  min = 100,
  max = 3_600_000,
  env: NodeJS.ProcessEnv = process.env
): number {
  const raw = env[envVar];
  if (raw === undefined || raw === '') {
    return defaultValue;
  }

  const parsed = parseInt(raw, 10);

  if (Number.isNaN(parsed)) {
    getTypesLogger().warn('Invalid timeout value (NaN)', {
      envVar,
      value: raw,
      default: defaultValue,
    });
    return defaultValue;
  }

  if (parsed < min) {
    getTypesLogger().warn('Timeout below minimum', { envVar, value: parsed, min, using: min });
    return min;
  }

  if (parsed > max) {
    getTypesLogger().warn('Timeout above maximum', { envVar, value: parsed, max, using: max });
    return max;
  }

  return parsed;
}

/**
 * Hard ceiling on one coordinated execution. A cross-chain trade includes a
 * bridge wait, so this is minutes rather than seconds.
 * Environment: EXECUTION_TIMEOUT_MS (default: 300000)
 */
export const EXECUTION_TIMEOUT_MS = parseEnvTimeout('EXECUTION_TIMEOUT_MS', 300_000, 1000, 3_600_000);

/**
 * Wait for a transaction receipt.
 * Environment: TRANSACTION_TIMEOUT_MS (default: 120000)
 */
export const TRANSACTION_TIMEOUT_MS = parseEnvTimeout('TRANSACTION_TIMEOUT_MS', 120_000, 1000, 600_000);

/**
 * How long shutdown waits for the in-flight execution to unwind.
 * Environment: SHUTDOWN_TIMEOUT_MS (default: 30000)
 */
export const SHUTDOWN_TIMEOUT_MS = parseEnvTimeout('SHUTDOWN_TIMEOUT_MS', 30_000, 1000, 120_000);

// =============================================================================
// Coordinator
// =============================================================================

/** Abort reason the coordinator gives when an execution overruns its timeout */
export const EXECUTION_TIMEOUT_ABORT_REASON = 'execution timeout';

/**
 * Work run under the execution lock. Must resolve to a structured result;
 * a throw is converted by the coordinator. The signal fires on timeout and
 * on shutdown. `deadline` is the epoch ms at which the coordinator gives up.
 */
export type ExecutionCallback = (signal: AbortSignal, deadline: number) => Promise<ExecutionResult>;

export interface CoordinatedExecutionResult {
  /** Null when the call was blocked and no record was created */
  executionId: string | null;
  blocked: boolean;
  timedOut: boolean;
  result: ExecutionResult;
  record?: ExecutionRecord;
  /**
   * Set when timed out: the callback's own result once it unwinds after the
   * abort, or null if it rejects.
   */
  settled?: Promise<ExecutionResult | null>;
}

// =============================================================================
// Engine
// =============================================================================

/**
 * Collaborators injected into the engine.
 */
export interface ExecutionEngineDeps {
  chainClients: ReadonlyMap<string, ChainClient>;
  dexRouter: DexRouter;
  bridgeProviders: ReadonlyMap<string, BridgeProvider>;
  keyring: WalletKeyring;
  priceFeed: PriceFeed;
  /** Enables the scan loop when present */
  scanner?: OpportunityScanner;
  logger?: ILogger;
}

/**
 * Per-component overrides on top of the env-built defaults.
 */
export interface ExecutionEngineComponentConfig {
  filter?: Partial<FilterConfig>;
  gasTiers?: Readonly<GasTierConfig>;
  balance?: Partial<BalanceConfig>;
  bridgeSelection?: Partial<BridgeSelectionConfig>;
  crossChain?: Partial<CrossChainConfig>;
  risk?: Partial<RiskConfig>;
}

export interface ExecutionEngineConfig extends ExecutionEngineComponentConfig {
  executionTimeoutMs: number;
  transactionTimeoutMs: number;
  shutdownTimeoutMs: number;
  /** Background loop intervals; 0 disables a loop */
  scanIntervalMs: number;
  bridgeCostRefreshIntervalMs: number;
  pendingTxWatchIntervalMs: number;
  reportIntervalMs: number;
  /** Name recorded on executions the scan loop starts */
  initiator: string;
}

export const DEFAULT_ENGINE_CONFIG: Readonly<ExecutionEngineConfig> = Object.freeze({
  executionTimeoutMs: EXECUTION_TIMEOUT_MS,
  transactionTimeoutMs: TRANSACTION_TIMEOUT_MS,
  shutdownTimeoutMs: SHUTDOWN_TIMEOUT_MS,
  scanIntervalMs: 5_000,
  bridgeCostRefreshIntervalMs: 10 * 60 * 1000,
  pendingTxWatchIntervalMs: 60_000,
  reportIntervalMs: 5 * 60 * 1000,
  initiator: 'scanner',
});

/**
 * What happened to one opportunity of a submitted batch.
 *
 * - `filtered`: invalid, stale, duplicate, slow or unprofitable
 * - `risk-halted`: the governor vetoed the batch before this one ran
 * - `blocked`: another execution held the lock
 * - `executed`: ran through the saga (see `result`)
 * - `superseded`: viable, but a higher-priority opportunity ran instead
 */
export type OpportunityDisposition = 'filtered' | 'risk-halted' | 'blocked' | 'executed' | 'superseded';

export interface OpportunityOutcome {
  opportunityId: string;
  disposition: OpportunityDisposition;
  reason?: string;
  verdict?: FilterVerdict;
  result?: ExecutionResult;
}

export interface BatchSubmissionResult {
  outcomes: OpportunityOutcome[];
  /** Result of the execution that ran, if any */
  executed?: ExecutionResult;
}

/**
 * Returned by shutdown().
 */
export interface ShutdownReport {
  strandedFunds: StrandedFundsReport[];
  /** Ids of executions aborted by the shutdown */
  abandonedExecutions: string[];
  /** False when the aborted execution had not unwound within the shutdown timeout */
  drained: boolean;
}
