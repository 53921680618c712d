/**
 * Services barrel file
 */
export { FactsIngestService } from "./FactsIngestService";
export type { IngestResult, FactsIngestServiceOptions } from "./FactsIngestService";

export { LinkValidationService } from "./LinkValidationService";
export type { LinkValidationResult, LinkValidationServiceOptions } from "./LinkValidationService";

export { TopologyService } from "./TopologyService";
export type { TopologyServiceOptions } from "./TopologyService";
