export {
  withTimeout,
  withTimeoutDefault,
  sleep,
  AbortedError,
  abortReason,
  throwIfAborted,
  raceAbort,
  TimeoutError,
} from './async-utils';
