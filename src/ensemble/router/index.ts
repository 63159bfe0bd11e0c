export { DecisionRouter, FunctionRouter, roundRobinRouter, stopRouter, toRouter } from "./router.js";
export { DEFAULT_ROUTER_PERSONA, RoutingAgent, STOP_TOKEN, matchCandidate } from "./routingAgent.js";
export type { RoutingAgentConfig } from "./routingAgent.js";
export { DEFAULT_SEMANTIC_THRESHOLD, SemanticRouter, cosineSimilarity } from "./semantic.js";
export type { SemanticRouteTarget, SemanticRouterConfig } from "./semantic.js";
export { routerDescriptorSchema } from "./types.js";
export type {
  DecideOptions,
  LastResult,
  Router,
  RouterDescriptor,
  RouterFunction,
  RouterLike,
  RouterResult
} from "./types.js";
