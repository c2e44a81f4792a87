export {
  EmulatorStateSupervisor,
  StateSupervisorOptions,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_PROBE_TIMEOUT_MS
} from './state-supervisor';
export { toStatusPayload, uptimeSeconds } from './status-payload';
