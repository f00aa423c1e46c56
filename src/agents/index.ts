import { AgentRegistry } from "../core/Registry.js";
import { FallRiskAgent } from "./FallRiskAgent.js";
import { HeartRateAgent } from "./HeartRateAgent.js";

export { FallRiskAgent, fallRiskScore } from "./FallRiskAgent.js";
export { HeartRateAgent } from "./HeartRateAgent.js";

/**
 * Register the agents shipped with the runtime
 */
export function registerBuiltinAgents(registry: AgentRegistry = new AgentRegistry()): AgentRegistry {
  return registry
    .register(HeartRateAgent.agentClass, (context) => new HeartRateAgent(context))
    .register(FallRiskAgent.agentClass, (context) => new FallRiskAgent(context));
}
