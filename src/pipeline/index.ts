export { createPublishPipeline } from "./pipeline";
export { buildJobReport } from "./report";
export type { PublishPipeline, PublishPipelineDeps } from "./pipeline";
export type { JobOutcome, JobStatus } from "./types";
