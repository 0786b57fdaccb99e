/**
 * Risk Governor
 *
 * Circuit breaker over realized trading outcomes. Trading halts when
 * consecutive failures reach the ceiling or the day's realized loss reaches
 * its limit, and stays halted until an operator calls reset().
 *
 * States:
 * - CLOSED: trading permitted
 * - HALTED: every permits() call returns false
 *
 * The daily loss window rolls over at `dailyResetHourUtc`. Rolling over
 * clears the accumulator but does not lift a halt.
 */

import { RISK_CONFIG } from '@xarb/config';
import { getErrorMessage } from '@xarb/core';
import type { ILogger } from '@xarb/core';
import type { RiskCounters, RiskOutcome } from '@xarb/types';

// =============================================================================
// Types
// =============================================================================

export type RiskGovernorState = 'CLOSED' | 'HALTED';

export type HaltCause = 'consecutive_failures' | 'daily_loss' | 'emergency_stop';

export interface RiskGovernorEvent {
  previousState: RiskGovernorState;
  newState: RiskGovernorState;
  reason: string;
  cause: HaltCause | null;
  timestamp: number;
  counters: RiskCounters;
}

export interface RiskGovernorMetrics {
  totalSuccesses: number;
  totalFailures: number;
  timesTripped: number;
  lastTrippedAt: number | null;
}

export interface RiskGovernorStatus {
  state: RiskGovernorState;
  enabled: boolean;
  counters: RiskCounters;
  haltCause: HaltCause | null;
  haltReason: string | null;
  lastStateChange: number;
  limits: {
    maxConsecutiveFailures: number;
    maxDailyLossUsd: number;
  };
  metrics: RiskGovernorMetrics;
}

export interface RiskGovernorOptions {
  logger: ILogger;
  onStateChange?: (event: RiskGovernorEvent) => void;
  /** Default: RISK_MAX_CONSECUTIVE_FAILURES (3) */
  maxConsecutiveFailures?: number;
  /** Default: RISK_MAX_DAILY_LOSS_USD (100) */
  maxDailyLossUsd?: number;
  /** Default: 0 (midnight UTC) */
  dailyResetHourUtc?: number;
  enabled?: boolean;
}

export interface RiskGovernor {
  /** Whether a new trade may start. Rolls the daily window first. */
  permits(): boolean;
  record(outcome: RiskOutcome): void;
  /** Lift a halt and clear consecutive failures; the daily loss is kept */
  reset(): void;
  emergencyStop(reason: string): void;

  getState(): RiskGovernorState;
  getCounters(): RiskCounters;
  getStatus(): RiskGovernorStatus;
  isEnabled(): boolean;

  enable(): void;
  disable(): void;
  stop(): void;
}

// =============================================================================
// Implementation
// =============================================================================

const HOUR_MS = 60 * 60 * 1000;

/**
 * UTC date (YYYY-MM-DD) of the daily window containing `timestamp`.
 */
export function dailyWindowDate(timestamp: number, resetHourUtc = 0): string {
  return new Date(timestamp - resetHourUtc * HOUR_MS).toISOString().slice(0, 10);
}

/**
 * Create a risk governor instance.
 *
 * @throws Error if the limits are invalid
 */
export function createRiskGovernor(options: RiskGovernorOptions): RiskGovernor {
  const {
    logger,
    onStateChange,
    maxConsecutiveFailures = RISK_CONFIG.maxConsecutiveFailures,
    maxDailyLossUsd = RISK_CONFIG.maxDailyLossUsd,
    dailyResetHourUtc = RISK_CONFIG.dailyResetHourUtc,
    enabled: initialEnabled = RISK_CONFIG.enabled,
  } = options;

  if (maxConsecutiveFailures < 1) {
    throw new Error('Risk governor maxConsecutiveFailures must be at least 1');
  }
  if (maxDailyLossUsd <= 0) {
    throw new Error('Risk governor maxDailyLossUsd must be positive');
  }
  if (dailyResetHourUtc < 0 || dailyResetHourUtc > 23) {
    throw new Error('Risk governor dailyResetHourUtc must be between 0 and 23');
  }

  let state: RiskGovernorState = 'CLOSED';
  let enabled = initialEnabled;
  let haltCause: HaltCause | null = null;
  let haltReason: string | null = null;
  let lastStateChange = Date.now();

  const counters: RiskCounters = {
    consecutiveFailures: 0,
    dailyLossUsd: 0,
    lastResetDate: dailyWindowDate(Date.now(), dailyResetHourUtc),
  };

  let totalSuccesses = 0;
  let totalFailures = 0;
  let timesTripped = 0;
  let lastTrippedAt: number | null = null;

  // ===========================================================================
  // Private
  // ===========================================================================

  function emitStateChange(previousState: RiskGovernorState, newState: RiskGovernorState, reason: string): void {
    if (!onStateChange) return;

    const event: RiskGovernorEvent = {
      previousState,
      newState,
      reason,
      cause: haltCause,
      timestamp: Date.now(),
      counters: { ...counters },
    };

    try {
      onStateChange(event);
    } catch (error) {
      logger.error('Risk governor state change listener failed', {
        error: getErrorMessage(error),
        event,
      });
    }
  }

  function transitionTo(newState: RiskGovernorState, reason: string, cause: HaltCause | null): void {
    if (state === newState) return;

    const previousState = state;
    const now = Date.now();
    state = newState;
    lastStateChange = now;
    haltCause = cause;
    haltReason = newState === 'HALTED' ? reason : null;

    if (newState === 'HALTED') {
      timesTripped++;
      lastTrippedAt = now;
      logger.error('Risk governor halted trading', { reason, cause, ...counters });
    } else {
      logger.info('Risk governor resumed trading', { reason, ...counters });
    }

    emitStateChange(previousState, newState, reason);
  }

  function rollDailyWindow(): void {
    const today = dailyWindowDate(Date.now(), dailyResetHourUtc);
    if (today !== counters.lastResetDate) {
      logger.info('Daily loss window rolled over', {
        previousDate: counters.lastResetDate,
        date: today,
        dailyLossUsd: counters.dailyLossUsd,
      });
      counters.dailyLossUsd = 0;
      counters.lastResetDate = today;
    }
  }

  function checkLimits(): void {
    if (counters.consecutiveFailures >= maxConsecutiveFailures) {
      transitionTo(
        'HALTED',
        `Consecutive failures (${counters.consecutiveFailures}) reached limit (${maxConsecutiveFailures})`,
        'consecutive_failures'
      );
    } else if (counters.dailyLossUsd >= maxDailyLossUsd) {
      transitionTo(
        'HALTED',
        `Daily loss $${counters.dailyLossUsd.toFixed(2)} reached limit $${maxDailyLossUsd.toFixed(2)}`,
        'daily_loss'
      );
    }
  }

  // ===========================================================================
  // Public
  // ===========================================================================

  function permits(): boolean {
    rollDailyWindow();
    if (!enabled) return true;
    return state === 'CLOSED';
  }

  function record(outcome: RiskOutcome): void {
    rollDailyWindow();

    if (outcome.success) {
      totalSuccesses++;
      counters.consecutiveFailures = 0;
    } else {
      totalFailures++;
      counters.consecutiveFailures++;
    }

    if (outcome.pnlUsd < 0) {
      counters.dailyLossUsd += Math.abs(outcome.pnlUsd);
    }

    logger.debug('Risk governor recorded outcome', {
      success: outcome.success,
      pnlUsd: outcome.pnlUsd,
      ...counters,
    });

    if (state === 'CLOSED') {
      checkLimits();
    }
  }

  function reset(): void {
    logger.warn('Risk governor reset by operator', { previousState: state, ...counters });
    counters.consecutiveFailures = 0;
    rollDailyWindow();
    transitionTo('CLOSED', 'Manual reset', null);
    // A daily loss still over the limit trips again immediately
    checkLimits();
  }

  function emergencyStop(reason: string): void {
    if (state === 'HALTED') {
      haltReason = `Emergency stop: ${reason}`;
      haltCause = 'emergency_stop';
      return;
    }
    transitionTo('HALTED', `Emergency stop: ${reason}`, 'emergency_stop');
  }

  function getState(): RiskGovernorState {
    return state;
  }

  function getCounters(): RiskCounters {
    return { ...counters };
  }

  function getStatus(): RiskGovernorStatus {
    return {
      state,
      enabled,
      counters: getCounters(),
      haltCause,
      haltReason,
      lastStateChange,
      limits: { maxConsecutiveFailures, maxDailyLossUsd },
      metrics: { totalSuccesses, totalFailures, timesTripped, lastTrippedAt },
    };
  }

  function isEnabled(): boolean {
    return enabled;
  }

  function enable(): void {
    if (enabled) return;
    enabled = true;
    logger.info('Risk governor enabled', { state });
  }

  function disable(): void {
    if (!enabled) return;
    enabled = false;
    logger.warn('Risk governor disabled - all executions will be permitted', { state });
  }

  function stop(): void {
    logger.info('Risk governor stopped', { state, ...counters, timesTripped });
  }

  logger.info('Risk governor initialized', {
    maxConsecutiveFailures,
    maxDailyLossUsd,
    dailyResetHourUtc,
    enabled: initialEnabled,
  });

  return {
    permits,
    record,
    reset,
    emergencyStop,
    getState,
    getCounters,
    getStatus,
    isEnabled,
    enable,
    disable,
    stop,
  };
}
