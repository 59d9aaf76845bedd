export { DigestPipeline, formatDigest, truncateText, type DigestPipelineOptions } from "./digest-pipeline.js";
export { Poller, type PollerOptions, type PollSummary } from "./poller.js";
