/**
 * Risk controls: the profitability gate and the risk governor.
 */

export {
  ProfitabilityGate,
  categorizeGas,
  classifyChain,
  inferOperation,
} from './profitability-gate';
export type { ProfitabilityDecision } from './profitability-gate';

export { createRiskGovernor, dailyWindowDate } from './risk-governor';
export type {
  RiskGovernor,
  RiskGovernorEvent,
  RiskGovernorMetrics,
  RiskGovernorOptions,
  RiskGovernorState,
  RiskGovernorStatus,
  HaltCause,
} from './risk-governor';
