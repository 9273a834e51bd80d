/**
 * @loopwatch/scenario-runner — Public API
 *
 *   import { ScenarioRunner, SimulatedAgent } from '@loopwatch/scenario-runner'
 */

export { ScenarioRunner, DEFAULT_TIMEOUT_MS } from './runner'
export type { RunnerConfig, RunnerDeps } from './runner'
export { RunLifecycle, IllegalTransitionError } from './lifecycle'
export {
  NormalPurchaseDriver,
  ContradictoryMandateDriver,
  PaymentRetryStormDriver,
  createDrivers,
  DEFAULT_DRIVER_CONFIG,
  CONTRADICTORY_MANDATE,
} from './scenarios'
export type { ScenarioDriver, DriverConfig } from './scenarios'
export { AgentInvocationError, ROLE_LABELS } from './agent'
export type { AgentInvoker, AgentPayload, AgentReply, AgentRole } from './agent'
export { HttpAgentInvoker, defaultEndpoints, buildA2AMessage } from './http-agent'
export type { HttpAgentConfig, A2AMessage } from './http-agent'
export { SimulatedAgent } from './simulated-agent'
export type { SimulatedAgentConfig } from './simulated-agent'
export { pause, untilAborted } from './pause'
