export {
  evaluateLink,
  validateLinkState,
  checkLayer2,
  checkLayer3,
} from "./LinkStateValidator";

export type {
  EndpointFacts,
  LayerResult,
  LinkEvaluation,
  ValidationReason,
} from "./LinkStateValidator";
