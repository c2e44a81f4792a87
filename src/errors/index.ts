export {
  AgentError,
  AgentErrorCode,
  invalidInput,
  invalidOperation,
  probeUnavailable,
  isAgentError,
  errorMessage
} from './agent-error';
