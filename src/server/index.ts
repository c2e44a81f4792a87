export { createAgentApp, AgentAppDependencies } from './http-app';
export { AgentServer, AgentServerOptions } from './agent-server';
export { StatusBroadcaster, StatusSocket, Envelope, EnvelopeType, ErrorPayload } from './status-broadcaster';
export {
  modeRequestSchema,
  devStateRequestSchema,
  devErrorRequestSchema,
  parseBody,
  ModeRequest,
  DevStateRequest,
  DevErrorRequest
} from './request-schemas';
